/**
 * Express application for the OCR jobs API
 */

import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import multer from 'multer';
import { ErrorFactory, toAppError } from '@pageline/errors';
import { createLoggerMiddleware, getRequestLogger } from '@pageline/logger';
import { createHealthRouter } from './routes/health.routes';
import { createJobsRouter } from './routes/jobs.routes';
import { JobService } from './services/JobService';
import { logger } from './utils/logger';

export interface AppOptions {
  runsDir: string;
  maxUploadBytes: number;
  nodeEnv: string;
}

export function createExpressApp(service: JobService, options: AppOptions): Application {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(cors({
    origin: options.nodeEnv === 'production' ? false : '*',
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Request ids and request logging
  app.use(...createLoggerMiddleware(logger, { skipPaths: ['/health', '/health/ready'] }));

  app.use('/ocr/api', createJobsRouter(service, { maxUploadBytes: options.maxUploadBytes }));
  app.use('/', createHealthRouter(service, options.runsDir));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'NOT_FOUND',
      message: `Endpoint ${req.method} ${req.path} not found`,
    });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const appError =
      err instanceof multer.MulterError
        ? ErrorFactory.invalidInput(`Upload rejected: ${err.message}`, { field: err.field, code: err.code })
        : toAppError(err);

    const requestLogger = getRequestLogger(res, logger);
    const metadata = {
      code: appError.code,
      errorId: appError.errorId,
      method: req.method,
      path: req.path,
    };

    if (appError.statusCode >= 500) {
      requestLogger.error(appError.message, { ...metadata, error: err });
    } else {
      requestLogger.warn(appError.message, metadata);
    }

    res.status(appError.statusCode).json(appError.toJSON());
  });

  return app;
}
