/**
 * Request errors raised by the control surface, job errors raised while a job runs
 */

import { AppError, ErrorContext, ErrorKind, ErrorSeverity } from './base-error';

export const ERROR_KINDS = {
  invalidInput: {
    code: 'INVALID_INPUT',
    statusCode: 400,
    severity: ErrorSeverity.LOW,
    suggestion: 'Check the request fields and try again',
  },
  notFound: {
    code: 'NOT_FOUND',
    statusCode: 404,
    severity: ErrorSeverity.LOW,
    suggestion: 'Check the job id',
  },
  invalidState: {
    code: 'INVALID_STATE',
    statusCode: 409,
    severity: ErrorSeverity.MEDIUM,
    suggestion: 'Check the job status before repeating the request',
  },
  internal: {
    code: 'INTERNAL_SERVER_ERROR',
    statusCode: 500,
    severity: ErrorSeverity.HIGH,
  },
  authentication: {
    code: 'AUTHENTICATION_FAILURE',
    statusCode: 401,
    severity: ErrorSeverity.MEDIUM,
    suggestion: 'Check the recognition service API key and secret key',
  },
  conversion: {
    code: 'CONVERSION_FAILURE',
    statusCode: 422,
    severity: ErrorSeverity.MEDIUM,
    suggestion: 'Check that the document is a readable PDF',
  },
  recognition: {
    code: 'RECOGNITION_FAILURE',
    statusCode: 502,
    severity: ErrorSeverity.MEDIUM,
    suggestion: 'Retry the failed pages once the recognition service is reachable',
  },
} satisfies Record<string, ErrorKind>;

export class InvalidInputError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.invalidInput, message, context);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.notFound, message, context);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.invalidState, message, context);
  }
}

export class InternalServerError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.internal, message, context, false);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.authentication, message, context);
  }
}

export class ConversionError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.conversion, message, context);
  }
}

export class RecognitionError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(ERROR_KINDS.recognition, message, context);
  }
}
