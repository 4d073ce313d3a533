/**
 * Manifest detector - checks `[dependencies]` of a Cargo manifest against a
 * layer's forbidden packages and features.
 *
 * Which features a crate enables by default is not recorded in the manifest,
 * so a feature-restricted dependency that keeps its defaults is reported as a
 * POTENTIAL_VIOLATION rather than passed or failed outright.
 */
import { parse } from 'smol-toml';
import { z } from 'zod';
import { fileExists, readTextFile, resolvePath, toPosixPath } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { WILDCARD, type LayerRule } from '../registry/types.js';
import { createViolation, type Violation } from '../report/types.js';
import { layerLabel } from './source.js';

export const DEFAULT_MANIFEST = 'Cargo.toml';

/**
 * The parts of a dependency entry the detector reads. A bare version string
 * (`serde = "1"`) keeps default features.
 */
const DependencyEntrySchema = z.union([
  z.string(),
  z.object({
    features: z.array(z.string()).optional(),
    'default-features': z.boolean().optional(),
    default_features: z.boolean().optional(),
  }),
]);

type DependencyEntry = z.infer<typeof DependencyEntrySchema>;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function keepsDefaultFeatures(entry: DependencyEntry): boolean {
  if (typeof entry === 'string') {
    return true;
  }
  return (entry['default-features'] ?? entry.default_features) !== false;
}

/**
 * Check manifest content. Pure; `file` is only used to label violations.
 */
export function scanManifest(file: string, content: string, rule: LayerRule): Violation[] {
  const label = layerLabel(rule.name);
  const parseError = (reason: string): Violation =>
    createViolation(file, 0, 'MANIFEST_PARSE_ERROR', `Failed to parse ${file}: ${reason}`);

  let manifest: Record<string, unknown>;
  try {
    manifest = parse(content);
  } catch (error) {
    // smol-toml appends a code frame after the first line
    return [parseError(errorMessage(error).split('\n')[0])];
  }

  const dependencies = manifest['dependencies'];
  if (dependencies === undefined) {
    return [];
  }
  if (!isTable(dependencies)) {
    return [parseError('[dependencies] is not a table')];
  }

  const violations: Violation[] = [];
  for (const [name, rawEntry] of Object.entries(dependencies)) {
    const restriction = rule.forbiddenDependencies.get(name);
    if (restriction === undefined) {
      continue;
    }

    if (restriction === WILDCARD) {
      violations.push(
        createViolation(
          file,
          0,
          'FORBIDDEN_DEPENDENCY',
          `${label} modules cannot use forbidden dependency '${name}'`
        )
      );
      continue;
    }

    const parsed = DependencyEntrySchema.safeParse(rawEntry);
    if (!parsed.success) {
      violations.push(parseError(`invalid entry for dependency '${name}': ${formatZodError(parsed.error)}`));
      continue;
    }

    const entry = parsed.data;
    if (typeof entry !== 'string' && entry.features !== undefined) {
      for (const feature of restriction) {
        if (entry.features.includes(feature)) {
          violations.push(
            createViolation(
              file,
              0,
              'FORBIDDEN_FEATURE',
              `${label} modules cannot use forbidden feature '${feature}' of '${name}'`
            )
          );
        }
      }
    } else if (keepsDefaultFeatures(entry)) {
      violations.push(
        createViolation(
          file,
          0,
          'POTENTIAL_VIOLATION',
          `${label} modules use '${name}' with default features - verify no forbidden features: ${restriction.join(', ')}`
        )
      );
    }
  }

  return violations;
}

/**
 * Read and check the manifest. A missing manifest yields no violations; an
 * unreadable one yields a MANIFEST_PARSE_ERROR.
 */
export async function detectManifest(
  manifestPath: string,
  rule: LayerRule,
  options: { projectRoot: string }
): Promise<Violation[]> {
  const file = toPosixPath(manifestPath);
  const absolutePath = resolvePath(options.projectRoot, manifestPath);

  if (!(await fileExists(absolutePath))) {
    return [];
  }

  let content: string;
  try {
    content = await readTextFile(absolutePath);
  } catch (error) {
    return [
      createViolation(file, 0, 'MANIFEST_PARSE_ERROR', `Failed to parse ${file}: ${errorMessage(error)}`),
    ];
  }

  return scanManifest(file, content, rule);
}
