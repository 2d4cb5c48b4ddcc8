/**
 * @pageline/logger
 */

export { createLogger } from './logger';
export {
  createLoggerMiddleware,
  createRequestContextMiddleware,
  createRequestLoggingMiddleware,
  getRequestLogger,
  CORRELATION_ID_HEADER,
  REQUEST_ID_HEADER,
} from './middleware/request-context';
export type { RequestLoggingOptions } from './middleware/request-context';
export type { Logger, LoggerConfig, LogFormat, LogLevel, LogMetadata } from './types';
