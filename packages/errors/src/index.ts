/**
 * @pageline/errors
 * Error hierarchy shared by the Pageline services
 */

export { AppError, ErrorSeverity } from './base-error';
export type { ErrorBody, ErrorContext, ErrorKind } from './base-error';
export {
  InvalidInputError,
  NotFoundError,
  InvalidStateError,
  InternalServerError,
  AuthenticationError,
  ConversionError,
  RecognitionError,
  ERROR_KINDS,
} from './errors';
export {
  ErrorFactory,
  isAppError,
  isOperationalError,
  isErrorLike,
  errorCode,
  errorMessage,
  toAppError,
} from './factory';
