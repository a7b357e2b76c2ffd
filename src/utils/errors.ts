/**
 * Error types and codes for colprint.
 * All errors thrown by the package extend ColprintError.
 */

/**
 * Base error class for all colprint errors.
 */
export class ColprintError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ColprintError';
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
export class ConfigError extends ColprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the output sink fails while a block is being written.
 * Whatever was written before the failure stays written.
 */
export class RenderError extends ColprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RenderError';
  }
}

/**
 * Bad CLI input (missing template, unreadable value file, invalid JSON).
 */
export class InputError extends ColprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends ColprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  INVALID_CONFIG: 'C001',
  CONFIG_LOAD_ERROR: 'C002',

  // Rendering
  RENDER_WRITE_FAILED: 'R001',

  // CLI input
  MISSING_TEMPLATE: 'I001',
  INVALID_JSON_VALUE: 'I002',
  UNREADABLE_VALUE_FILE: 'I003',

  // System
  PARSE_ERROR: 'S001',
} as const;
