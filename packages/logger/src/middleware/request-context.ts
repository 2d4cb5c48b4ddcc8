/**
 * Per-request logging for Express
 *
 * Each request gets a request id (echoed as X-Request-Id) and a child logger
 * carrying it. An incoming X-Request-Id or X-Correlation-Id is reused.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../types';

export const REQUEST_ID_HEADER = 'x-request-id';
export const CORRELATION_ID_HEADER = 'x-correlation-id';

export interface RequestLoggingOptions {
  /** Paths whose completion is not logged (probes) */
  skipPaths?: string[];
}

const requestLoggers = new WeakMap<Response, Logger>();

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

/**
 * Logger bound to the current request, or `fallback` outside one
 */
export function getRequestLogger(res: Response, fallback: Logger): Logger {
  return requestLoggers.get(res) ?? fallback;
}

export function createRequestContextMiddleware(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId =
      headerValue(req, REQUEST_ID_HEADER) ?? headerValue(req, CORRELATION_ID_HEADER) ?? uuidv4();

    requestLoggers.set(res, logger.child({ requestId }));
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}

export function createRequestLoggingMiddleware(logger: Logger, options: RequestLoggingOptions = {}): RequestHandler {
  const skipPaths = new Set(options.skipPaths ?? []);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.has(req.path)) {
      next();
      return;
    }

    const startedAt = process.hrtime.bigint();
    const { method } = req;
    const url = req.originalUrl;

    res.on('finish', () => {
      const requestLogger = getRequestLogger(res, logger);
      const metadata = {
        method,
        url,
        statusCode: res.statusCode,
        durationMs: Number((process.hrtime.bigint() - startedAt) / 1000000n),
      };

      if (res.statusCode >= 500) {
        requestLogger.error('Request failed', metadata);
      } else if (res.statusCode >= 400) {
        requestLogger.warn('Request rejected', metadata);
      } else {
        requestLogger.info('Request handled', metadata);
      }
    });

    next();
  };
}

/**
 * Request context then request logging, in mounting order
 */
export function createLoggerMiddleware(logger: Logger, options: RequestLoggingOptions = {}): RequestHandler[] {
  return [createRequestContextMiddleware(logger), createRequestLoggingMiddleware(logger, options)];
}
