import { v4 as uuidv4 } from 'uuid';

export type ErrorContext = Record<string, unknown>;

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * What every error of one kind shares
 */
export interface ErrorKind {
  code: string;
  statusCode: number;
  severity: ErrorSeverity;
  suggestion?: string;
}

/**
 * JSON body sent for a failed request
 */
export interface ErrorBody {
  success: false;
  error: string;
  message: string;
  errorId: string;
  timestamp: string;
  statusCode: number;
  severity: ErrorSeverity;
  suggestion?: string;
  context?: ErrorContext;
}

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly severity: ErrorSeverity;
  readonly suggestion?: string;
  readonly errorId: string = uuidv4();
  readonly timestamp: Date = new Date();

  constructor(
    kind: ErrorKind,
    message: string,
    readonly context?: ErrorContext,
    /** false for faults in the service itself rather than in the request or a dependency */
    readonly isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    this.code = kind.code;
    this.statusCode = kind.statusCode;
    this.severity = kind.severity;
    this.suggestion = kind.suggestion;
    Error.captureStackTrace(this, new.target);
  }

  /** Context is left out in production */
  toJSON(): ErrorBody {
    return {
      success: false,
      error: this.code,
      message: this.message,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      statusCode: this.statusCode,
      severity: this.severity,
      suggestion: this.suggestion,
      context: process.env.NODE_ENV === 'production' ? undefined : this.context,
    };
  }
}
