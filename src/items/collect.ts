/**
 * API Items
 *
 * Flattens parsed packages into one item per documented symbol. Items
 * are what the document store files and what the `list` command prints.
 */

import { formatFunctionChunk, formatTypeChunk } from '../chunker/formatter.js';
import type { FunctionRecord, PackageRecord, TypeKind, TypeRecord } from '../parser/types.js';

export type ApiItemKind = 'function' | 'method' | 'type';

/**
 * One documented symbol with its package context.
 */
export interface ApiItem {
  /** `importPath:signature` or `importPath:type:Name` */
  itemId: string;
  kind: ApiItemKind;
  name: string;
  signature: string;
  package: string;
  importPath: string;
  receiver: string;
  params: string;
  returns: string;
  /** Set for types only */
  typeKind?: TypeKind;
  fields: readonly string[];
  methods: readonly string[];
  sourceDescription: string;
}

/**
 * An item paired with the text that documents it.
 */
export interface DocEntry {
  item: ApiItem;
  content: string;
}

export function functionItem(pkg: PackageRecord, fn: FunctionRecord): ApiItem {
  return {
    itemId: `${pkg.importPath}:${fn.signature}`,
    kind: fn.receiver ? 'method' : 'function',
    name: fn.name,
    signature: fn.signature,
    package: pkg.name,
    importPath: pkg.importPath,
    receiver: fn.receiver,
    params: fn.params,
    returns: fn.returns,
    fields: [],
    methods: [],
    sourceDescription: fn.description,
  };
}

export function typeItem(pkg: PackageRecord, type: TypeRecord): ApiItem {
  return {
    itemId: `${pkg.importPath}:type:${type.name}`,
    kind: 'type',
    name: type.name,
    signature: `type ${type.name} ${type.kind}`,
    package: pkg.name,
    importPath: pkg.importPath,
    receiver: '',
    params: '',
    returns: '',
    typeKind: type.kind,
    fields: type.fields,
    methods: type.methods,
    sourceDescription: type.description,
  };
}

/**
 * Pair every symbol with its chunk text. Per package: functions first,
 * then types, matching the chunk formatter's order.
 */
export function collectDocEntries(packages: readonly PackageRecord[]): DocEntry[] {
  const entries: DocEntry[] = [];
  for (const pkg of packages) {
    for (const fn of pkg.functions) {
      entries.push({ item: functionItem(pkg, fn), content: formatFunctionChunk(pkg.name, fn) });
    }
    for (const type of pkg.types) {
      entries.push({ item: typeItem(pkg, type), content: formatTypeChunk(pkg.name, type) });
    }
  }
  return entries;
}

export function collectApiItems(packages: readonly PackageRecord[]): ApiItem[] {
  return collectDocEntries(packages).map((entry) => entry.item);
}

/**
 * Cap a list at `max` entries; 0 or less means no limit.
 */
export function limitItems<T>(items: readonly T[], max: number): T[] {
  return max > 0 && items.length > max ? items.slice(0, max) : [...items];
}
