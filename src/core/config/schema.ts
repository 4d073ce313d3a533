/**
 * Configuration schema. Run options only: layer rules are compiled in and
 * never read from configuration.
 */
import { z } from 'zod';
import { STRICTNESS_PROFILES } from '../registry/types.js';

export const UnreadableFilePolicySchema = z.enum(['skip', 'fail']);

export const ConfigSchema = z.object({
  /** Layer to check */
  layer: z.string().min(1).default('core'),
  /** Built-in rule set */
  profile: z.enum(STRICTNESS_PROFILES).default('full'),
  /** Dependency manifest, relative to the project root */
  manifest: z.string().min(1).default('Cargo.toml'),
  /** Machine report output path, relative to the project root */
  report: z.string().min(1).default('architecture_report.json'),
  unreadable_files: UnreadableFilePolicySchema.default('skip'),
  /** Files scanned at once (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  /** Globs excluded from every layer file set */
  ignore: z.array(z.string()).default(['**/target/**']),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Schema for the file contents. An empty file (parsed as null) means defaults.
 */
export const ConfigFileSchema = z.preprocess((val) => val ?? {}, ConfigSchema);
