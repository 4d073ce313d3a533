/**
 * Error types and codes for layerguard.
 *
 * Detectors never throw: every fault they meet becomes a violation. These
 * errors only surface from configuration and rule lookup.
 */

/**
 * Base error class for all layerguard errors.
 */
export class LayerguardError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LayerguardError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LayerguardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Rule registry errors (unknown layer, unknown profile).
 */
export class RegistryError extends LayerguardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * System errors (file access, parse errors).
 */
export class SystemError extends LayerguardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'C001',

  // Registry
  UNKNOWN_LAYER: 'R001',
  UNKNOWN_PROFILE: 'R002',
  DUPLICATE_LAYER: 'R003',
  INVALID_PATTERN: 'R004',

  // System
  PARSE_ERROR: 'S001',
  WRITE_ERROR: 'S002',
} as const;

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
