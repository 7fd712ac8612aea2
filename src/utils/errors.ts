/**
 * @arch hexgraph.common.errors
 *
 * Error types and codes for hexgraph.
 * Data-quality problems in component metadata are reported as findings;
 * these errors cover programming and environment failures only.
 */

/**
 * Base error class for all hexgraph errors.
 */
export class HexGraphError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HexGraphError';
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
export class ConfigError extends HexGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Component registry misuse (registration after sealing).
 */
export class RegistryError extends HexGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * Validation engine misuse (unknown rule ids).
 */
export class ValidationError extends HexGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends HexGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Export adapter failures. Returned inside an ExportResult, not thrown.
 */
export class ExportError extends HexGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExportError';
  }
}

/**
 * Raised when a graph is assembled from parts that break its invariants.
 */
export class GraphIntegrityError extends HexGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GraphIntegrityError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'C001',

  // Registry
  REGISTRY_SEALED: 'G001',

  // Graph integrity
  UNKNOWN_EDGE_ENDPOINT: 'G002',
  DUPLICATE_NODE: 'G003',

  // Validation
  UNKNOWN_RULE: 'V001',

  // Export
  EXPORT_FAILED: 'X001',
  INVALID_GRAPH_DOCUMENT: 'X002',
  UNKNOWN_FORMAT: 'X003',

  // System errors
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  INVALID_MANIFEST: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
