/**
 * Configuration Schema
 *
 * Defines the shape of config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Parser heuristics
 */
export const ParserConfigSchema = z.object({
  description_gap: z
    .number()
    .int()
    .min(1)
    .max(16)
    .describe('Spaces that separate a signature from its inline description (1-16, default 4)'),
  continuation_indent: z
    .number()
    .int()
    .min(1)
    .max(64)
    .describe('Leading spaces that mark a top-level continuation line (1-64, default 10)'),
});

/**
 * Document store output
 */
export const OutputConfigSchema = z.object({
  dir: z.string().min(1).describe('Directory the export command writes documents to'),
  max_items: z
    .number()
    .int()
    .min(0)
    .describe('Maximum number of items to process (0 = no limit)'),
  generator: z.string().min(1).describe('Generator name recorded in document front matter'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  parser: ParserConfigSchema,
  output: OutputConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
