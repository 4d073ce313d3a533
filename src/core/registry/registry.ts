/**
 * Rule registry - an immutable set of layer rules, built per invocation.
 */
import { RegistryError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { PROFILE_DEFINITIONS } from './profiles.js';
import {
  STRICTNESS_PROFILES,
  type DependencyRestriction,
  type LayerRule,
  type LayerRuleDefinition,
  type StrictnessProfile,
} from './types.js';

/**
 * Freeze a layer rule definition into a `LayerRule`.
 */
export function createLayerRule(definition: LayerRuleDefinition): LayerRule {
  const importPatterns = definition.importPatterns ?? [];
  const apiPatterns = definition.apiPatterns ?? [];

  for (const { pattern } of [...importPatterns, ...apiPatterns]) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new RegistryError(
        ErrorCodes.INVALID_PATTERN,
        `Layer '${definition.name}' has an invalid pattern '${pattern}': ${errorMessage(error)}`,
        { layer: definition.name, pattern }
      );
    }
  }

  const dependencies = new Map<string, DependencyRestriction>();
  for (const [name, restriction] of Object.entries(definition.forbiddenDependencies ?? {})) {
    dependencies.set(
      name,
      typeof restriction === 'string' ? restriction : Object.freeze([...restriction])
    );
  }

  return Object.freeze({
    name: definition.name,
    filePatterns: Object.freeze([...definition.filePatterns]),
    forbiddenImports: Object.freeze([...(definition.forbiddenImports ?? [])]),
    forbiddenStdImports: Object.freeze([...(definition.forbiddenStdImports ?? [])]),
    stdPrefixMatch: definition.stdPrefixMatch ?? 'substring',
    forbiddenDependencies: dependencies,
    importPatterns: Object.freeze(importPatterns.map((p) => Object.freeze({ ...p }))),
    apiPatterns: Object.freeze(apiPatterns.map((p) => Object.freeze({ ...p }))),
  });
}

/**
 * Immutable collection of layer rules. Layers are independent of one another.
 *
 * Example:
 * ```ts
 * const registry = new RuleRegistry([
 *   { name: 'core', filePatterns: ['src/core/**\/*.rs'], forbiddenImports: ['ui'] },
 * ]);
 * registry.layerRuleFor('core').forbiddenImports; // ['ui']
 * ```
 */
export class RuleRegistry {
  private readonly rules: ReadonlyMap<string, LayerRule>;

  constructor(definitions: readonly LayerRuleDefinition[]) {
    const rules = new Map<string, LayerRule>();
    for (const definition of definitions) {
      if (rules.has(definition.name)) {
        throw new RegistryError(
          ErrorCodes.DUPLICATE_LAYER,
          `Layer '${definition.name}' is defined more than once`,
          { layer: definition.name }
        );
      }
      rules.set(definition.name, createLayerRule(definition));
    }
    this.rules = rules;
    Object.freeze(this);
  }

  /**
   * Get the rule of a layer. Throws a RegistryError for unknown layers.
   */
  layerRuleFor(name: string): LayerRule {
    const rule = this.rules.get(name);
    if (!rule) {
      throw new RegistryError(
        ErrorCodes.UNKNOWN_LAYER,
        `Unknown layer '${name}' (known: ${this.layerNames().join(', ') || 'none'})`,
        { layer: name }
      );
    }
    return rule;
  }

  /**
   * Layer names in declaration order.
   */
  layerNames(): string[] {
    return Array.from(this.rules.keys());
  }
}

export function isStrictnessProfile(value: string): value is StrictnessProfile {
  return STRICTNESS_PROFILES.some((profile) => profile === value);
}

/**
 * Build a fresh registry holding the compiled-in rules of a profile.
 */
export function builtinRegistry(profile: StrictnessProfile = 'full'): RuleRegistry {
  return new RuleRegistry(PROFILE_DEFINITIONS[profile]);
}

/**
 * Like `builtinRegistry`, for a profile name that has not been validated yet.
 */
export function registryForProfile(profile: string): RuleRegistry {
  if (!isStrictnessProfile(profile)) {
    throw new RegistryError(
      ErrorCodes.UNKNOWN_PROFILE,
      `Unknown strictness profile '${profile}' (known: ${STRICTNESS_PROFILES.join(', ')})`,
      { profile }
    );
  }
  return builtinRegistry(profile);
}
