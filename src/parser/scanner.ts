/**
 * Documentation Scanner
 *
 * Single forward pass over one package's `go doc -all` text. The
 * classifier decides what each line is; this loop only accumulates
 * records and advances the cursor.
 */

import { classifyLine } from './classifier.js';
import type { ScanOptions, ScanResult } from './types.js';

/**
 * Split documentation text into lines (LF or CRLF).
 */
export function splitLines(docText: string): string[] {
  return docText.split(/\r?\n/);
}

/**
 * Scan documentation text into function and type records.
 *
 * Needs no package metadata. Empty text yields empty record lists.
 */
export function scanDocText(docText: string, options: ScanOptions = {}): ScanResult {
  const lines = splitLines(docText);
  const result: ScanResult = {
    declaredPackage: '',
    functions: [],
    types: [],
    skippedLines: 0,
  };

  let index = 0;
  while (index < lines.length) {
    const classification = classifyLine(lines, index, options);

    switch (classification.kind) {
      case 'package':
        if (result.declaredPackage && result.declaredPackage !== classification.name) {
          options.logger?.debug?.(
            `package clause at line ${index + 1} replaces '${result.declaredPackage}' with '${classification.name}'`
          );
        }
        result.declaredPackage = classification.name;
        index++;
        break;

      case 'function':
        result.functions.push(classification.record);
        index++;
        break;

      case 'type':
        result.types.push(classification.record);
        index = classification.nextIndex;
        break;

      case 'skip':
        result.skippedLines++;
        index++;
        break;
    }
  }

  options.logger?.debug?.(
    `scanned ${lines.length} lines: ${result.functions.length} functions, ${result.types.length} types, ${result.skippedLines} skipped`
  );

  return result;
}
