/**
 * `rules` - print the compiled-in layer rules of a profile.
 */
import { Command } from 'commander';
import { registryForProfile } from '../../core/registry/registry.js';
import { WILDCARD, type ApiPattern, type LayerRule } from '../../core/registry/types.js';
import { logger } from '../../utils/logger.js';

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

function formatPatterns(heading: string, patterns: readonly Readonly<ApiPattern>[]): string[] {
  const lines = [`  ${heading}:`];
  if (patterns.length === 0) {
    lines.push('    (none)');
  }
  for (const { pattern, description } of patterns) {
    lines.push(`    /${pattern}/ ${description}`);
  }
  return lines;
}

/**
 * Text form of one layer rule.
 */
export function formatLayerRule(rule: LayerRule): string {
  const lines: string[] = [];
  lines.push(`Layer: ${rule.name}`);
  lines.push(`  Files: ${list(rule.filePatterns)}`);
  lines.push(`  Forbidden imports: ${list(rule.forbiddenImports)}`);
  lines.push(`  Forbidden std imports: ${list(rule.forbiddenStdImports)}`);
  lines.push(`  Std prefix match: ${rule.stdPrefixMatch}`);

  lines.push('  Forbidden dependencies:');
  if (rule.forbiddenDependencies.size === 0) {
    lines.push('    (none)');
  }
  for (const [name, restriction] of rule.forbiddenDependencies) {
    lines.push(
      restriction === WILDCARD
        ? `    ${name} (any)`
        : `    ${name} (features: ${restriction.join(', ')})`
    );
  }

  lines.push(...formatPatterns('Import patterns', rule.importPatterns));
  lines.push(...formatPatterns('API patterns', rule.apiPatterns));

  return lines.join('\n');
}

/**
 * JSON-friendly form of one layer rule.
 */
export function layerRuleToJSON(rule: LayerRule): Record<string, unknown> {
  return {
    name: rule.name,
    file_patterns: rule.filePatterns,
    forbidden_imports: rule.forbiddenImports,
    forbidden_std_imports: rule.forbiddenStdImports,
    std_prefix_match: rule.stdPrefixMatch,
    forbidden_dependencies: Object.fromEntries(rule.forbiddenDependencies),
    import_patterns: rule.importPatterns,
    api_patterns: rule.apiPatterns,
  };
}

/**
 * Create the rules command.
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description('Show the built-in layer rules')
    .option('--profile <name>', 'Built-in rule set: full or simplified', 'full')
    .option('--json', 'Output in JSON format')
    .action((options: { profile: string; json?: boolean }) => {
      try {
        const registry = registryForProfile(options.profile);
        const rules = registry.layerNames().map((name) => registry.layerRuleFor(name));

        if (options.json) {
          console.log(JSON.stringify(rules.map(layerRuleToJSON), null, 2));
        } else {
          console.log(rules.map(formatLayerRule).join('\n\n'));
        }
      } catch (error) {
        logger.error('Failed to list rules', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
