import { BaseError } from './errors.js';

/**
 * Response envelope returned by every compilebox tool
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  error?: string;
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
  data?: T;
}

export function createSuccess<T>(data: T): StandardResponse<T> {
  return { success: true, data };
}

export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): StandardResponse<never> {
  const response: StandardResponse<never> = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error response from a caught exception.
 * BaseError subclasses keep their code; record-shaped details are passed through,
 * anything else is wrapped as `{ value }`.
 */
export function createErrorFromException(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): StandardResponse<never> {
  if (error instanceof BaseError) {
    const response = createError(error.message, error.code);
    if (error.details !== undefined) {
      response.errorDetails = isRecord(error.details) ? { ...error.details } : { value: error.details };
    }
    if (includeStack && error.stack) {
      response.errorDetails = { ...response.errorDetails, stack: error.stack };
    }
    return response;
  }

  if (error instanceof Error) {
    const response = createError(error.message, 'INTERNAL_ERROR');
    if (includeStack && error.stack) {
      response.errorDetails = { stack: error.stack };
    }
    return response;
  }

  if (typeof error === 'string') {
    return createError(error, 'UNKNOWN_ERROR');
  }

  return createError(String(error) || 'Unknown error occurred', 'UNKNOWN_ERROR');
}
