/**
 * Base error class for compilebox packages.
 * Carries a stable machine-readable code plus optional details.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid or missing environment configuration
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Caller-supplied input that cannot be processed (blank source, path escapes, ...)
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Server-side fault: filesystem, process spawning, I/O.
 * Distinct from the submitter's code being wrong.
 */
export class InfrastructureError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'INFRASTRUCTURE_ERROR', details);
    this.name = 'InfrastructureError';
  }
}

/**
 * Message of anything thrown, Error or not.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
