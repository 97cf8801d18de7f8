/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for any field a user's
 * config.toml leaves out. The loader merges user config ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  parser: {
    description_gap: 4,
    continuation_indent: 10,
  },

  output: {
    dir: 'docs/generated',
    max_items: 0, // no limit
    generator: 'godoc-extract',
  },
};

/**
 * Config file template (TOML format)
 * Written to config.toml on first run
 */
export const CONFIG_TEMPLATE = `# godoc-extract configuration

# Parser heuristics
# description_gap: a run of this many spaces splits "signature    description"
# continuation_indent: top-level lines indented this far are wrapped text
[parser]
description_gap = ${DEFAULT_CONFIG.parser.description_gap}
continuation_indent = ${DEFAULT_CONFIG.parser.continuation_indent}

# Document store
[output]
dir = "${DEFAULT_CONFIG.output.dir}"
max_items = ${DEFAULT_CONFIG.output.max_items}  # 0 = no limit
generator = "${DEFAULT_CONFIG.output.generator}"
`;
