/**
 * Types for layer rules.
 */
/** Marks a dependency as wholly forbidden. */
export const WILDCARD = '*';

/**
 * What a layer forbids about one external package: the whole package, or a
 * list of its features.
 */
export type DependencyRestriction = typeof WILDCARD | readonly string[];

/**
 * A regular expression applied to every line of a layer file.
 */
export interface ApiPattern {
  /** Regular expression source, compiled without flags */
  pattern: string;
  /** Verb phrase used in the violation detail, e.g. "uses tokio networking" */
  description: string;
}

/**
 * How a std deny-list prefix matches a line.
 *
 * - `substring`: the prefix appears anywhere in the line, so `std::path::Path`
 *   also flags `std::path::PathBuf`.
 * - `segment`: the prefix must end at an identifier boundary.
 */
export const STD_PREFIX_MATCHES = ['substring', 'segment'] as const;

export type StdPrefixMatch = (typeof STD_PREFIX_MATCHES)[number];

/**
 * Input shape for a layer rule.
 */
export interface LayerRuleDefinition {
  name: string;
  filePatterns: string[];
  forbiddenImports?: string[];
  forbiddenStdImports?: string[];
  /** Default `substring` */
  stdPrefixMatch?: StdPrefixMatch;
  forbiddenDependencies?: Record<string, DependencyRestriction>;
  importPatterns?: ApiPattern[];
  apiPatterns?: ApiPattern[];
}

/**
 * A protected layer and everything it forbids. Frozen once built.
 */
export interface LayerRule {
  readonly name: string;
  /** Ordered glob patterns selecting the layer's files */
  readonly filePatterns: readonly string[];
  /** Module tokens that must not be `use` targets */
  readonly forbiddenImports: readonly string[];
  /** Standard-library path prefixes too low-level for the layer */
  readonly forbiddenStdImports: readonly string[];
  readonly stdPrefixMatch: StdPrefixMatch;
  readonly forbiddenDependencies: ReadonlyMap<string, DependencyRestriction>;
  /** Line regexes reported as FORBIDDEN_IMPORT by the import scan */
  readonly importPatterns: readonly Readonly<ApiPattern>[];
  /** Line regexes reported as FORBIDDEN_API_USAGE by the pattern scan */
  readonly apiPatterns: readonly Readonly<ApiPattern>[];
}

/**
 * Named rule sets compiled into the program.
 *
 * - `full`: token-aware `use` checks, std deny-list gated on `use`/`extern`,
 *   feature-aware manifest checks and the API usage scan.
 * - `simplified`: a flat import regex list over every crate source file, flagging
 *   `std::fs::` and friends even without an import line, and a name-only
 *   dependency deny-list.
 */
export const STRICTNESS_PROFILES = ['full', 'simplified'] as const;

export type StrictnessProfile = (typeof STRICTNESS_PROFILES)[number];
