/**
 * Structured Error Classes for dockship
 *
 * Stage operations report failures as Result values tagged with one of these codes.
 * The classes are thrown only by loaders used at the CLI boundary.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  SECRET_MISSING: 'SECRET_MISSING',

  // Build and publish errors
  DOCKER_BUILD_FAILED: 'DOCKER_BUILD_FAILED',
  DOCKER_TAG_FAILED: 'DOCKER_TAG_FAILED',
  REGISTRY_AUTH_FAILED: 'REGISTRY_AUTH_FAILED',
  DOCKER_PUSH_FAILED: 'DOCKER_PUSH_FAILED',

  // Descriptor errors
  DESCRIPTOR_INVALID: 'DESCRIPTOR_INVALID',
  DESCRIPTOR_MISMATCH: 'DESCRIPTOR_MISMATCH',

  // Remote deploy errors
  SSH_CONNECTION_FAILED: 'SSH_CONNECTION_FAILED',
  UPLOAD_FAILED: 'UPLOAD_FAILED',
  READINESS_TIMEOUT: 'READINESS_TIMEOUT',
  REMOTE_COMMAND_FAILED: 'REMOTE_COMMAND_FAILED',
  HEALTH_CHECK_FAILED: 'HEALTH_CHECK_FAILED',

  // File system errors
  FILE_EXISTS: 'FILE_EXISTS',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all dockship errors
 */
export class DockshipError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'DockshipError';
    this.code = code;
    this.details = details || {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigurationError extends DockshipError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.CONFIG_INVALID, details, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * One or more required secrets are not set
 */
export class SecretError extends DockshipError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required secrets: ${missing.join(', ')}`, ErrorCodes.SECRET_MISSING, { missing });
    this.name = 'SecretError';
    this.missing = missing;
  }
}

export function isDockshipError(error: unknown): error is DockshipError {
  return error instanceof DockshipError;
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
