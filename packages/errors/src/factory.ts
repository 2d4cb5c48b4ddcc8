/**
 * Error construction and normalization
 */

import { AppError, ErrorContext } from './base-error';
import {
  InvalidInputError,
  NotFoundError,
  InvalidStateError,
  InternalServerError,
  AuthenticationError,
  ConversionError,
  RecognitionError,
} from './errors';

export class ErrorFactory {
  static invalidInput(message: string, context?: ErrorContext): InvalidInputError {
    return new InvalidInputError(message, context);
  }

  static notFound(message: string, context?: ErrorContext): NotFoundError {
    return new NotFoundError(message, context);
  }

  static invalidState(message: string, context?: ErrorContext): InvalidStateError {
    return new InvalidStateError(message, context);
  }

  static internalServer(message: string, context?: ErrorContext): InternalServerError {
    return new InternalServerError(message, context);
  }

  static authentication(message: string, context?: ErrorContext): AuthenticationError {
    return new AuthenticationError(message, context);
  }

  static conversion(message: string, context?: ErrorContext): ConversionError {
    return new ConversionError(message, context);
  }

  static recognition(message: string, context?: ErrorContext): RecognitionError {
    return new RecognitionError(message, context);
  }

  static jobNotFound(jobId: string): NotFoundError {
    return new NotFoundError(`Job ${jobId} not found`, { jobId });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

/**
 * Error test by shape. Errors raised by Node core fail `instanceof Error`
 * when seen from another realm, such as a test sandbox.
 */
export function isErrorLike(value: unknown): value is Error {
  if (value instanceof Error) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * The `code` of a system or library error (ENOENT, ECONNABORTED, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  if (isErrorLike(error)) {
    return error.message.trim() || error.name;
  }
  return String(error);
}

/**
 * Body parsers reject malformed JSON with an error typed 'entity.parse.failed'
 */
function isBodyParseError(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Normalizes any thrown value for the HTTP error handler
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (isErrorLike(error) && isBodyParseError(error)) {
    return new InvalidInputError('Request body is not valid JSON');
  }

  if (isErrorLike(error)) {
    return new InternalServerError(errorMessage(error), { originalError: error.name });
  }

  return new InternalServerError('An unexpected error occurred', { error: String(error) });
}
