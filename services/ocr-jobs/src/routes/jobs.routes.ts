/**
 * Jobs Routes for the OCR jobs API
 *
 * Endpoints (mounted under /ocr/api):
 * - POST   /jobs              - Upload a PDF or page images and start a job
 * - GET    /jobs              - List jobs, newest first, optionally by status
 * - GET    /jobs/:id          - Job status projection
 * - DELETE /jobs/:id          - Request cancellation
 * - POST   /jobs/:id/retry    - Retry the pages that failed
 * - GET    /jobs/:id/download - Download the result table (CSV)
 * - GET    /queue/stats       - Job counts per status
 */

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { JobStatus, JobStatusView } from '../models/job.model';
import {
  validateListJobs,
  validateRequest,
  validateRetryJob,
  validateStartJob,
} from '../middleware/validation.middleware';
import { JobService, StartDocument, UploadedFile } from '../services/JobService';
import { logger } from '../utils/logger';

export interface JobsRouterOptions {
  maxUploadBytes: number;
}

type StatusResponse = JobStatusView & { downloadUrl: string | null };

function formField(req: Request, name: string): string | undefined {
  const source: unknown = req.body;
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, name);
  return typeof value === 'string' ? value : undefined;
}

function intField(req: Request, name: string): number | undefined {
  const source: unknown = req.body;
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, name);
  return typeof value === 'number' ? value : undefined;
}

function uploadedFiles(req: Request, field: string): UploadedFile[] {
  const files = req.files;
  if (!files || Array.isArray(files)) {
    return [];
  }
  return (files[field] ?? []).map((file) => ({ originalName: file.originalname, buffer: file.buffer }));
}

function startDocument(req: Request): StartDocument {
  const mode = formField(req, 'input_mode') ?? 'pdf';
  if (mode === 'images') {
    return { mode: 'images', files: uploadedFiles(req, 'image_files') };
  }
  return { mode: 'pdf', file: uploadedFiles(req, 'pdf_file')[0] };
}

function credentials(req: Request): { apiKey: string; secretKey: string } {
  return {
    apiKey: formField(req, 'api_key') ?? '',
    secretKey: formField(req, 'secret_key') ?? '',
  };
}

function withDownloadUrl(req: Request, view: JobStatusView): StatusResponse {
  return {
    ...view,
    downloadUrl: view.downloadAvailable ? `${req.baseUrl}/jobs/${view.jobId}/download` : null,
  };
}

function parseStatus(value: unknown): JobStatus | undefined {
  return Object.values(JobStatus).find((status) => status === value);
}

export function createJobsRouter(service: JobService, options: JobsRouterOptions): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes },
  });

  /**
   * POST /jobs
   *
   * multipart fields: input_mode (pdf|images), pdf_file or image_files,
   * api_key, secret_key, layout, language_type, dpi
   */
  router.post(
    '/jobs',
    upload.fields([
      { name: 'pdf_file', maxCount: 1 },
      { name: 'image_files' },
    ]),
    validateStartJob,
    validateRequest,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { jobId } = await service.start({
          document: startDocument(req),
          credentials: credentials(req),
          layout: formField(req, 'layout'),
          languageHint: formField(req, 'language_type'),
          resolution: intField(req, 'dpi'),
        });

        res.status(202).json({ success: true, jobId });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /jobs?status=&limit=
   */
  router.get('/jobs', validateListJobs, validateRequest, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const limit = Number(req.query.limit ?? 100);
      const jobs = service
        .list({ status: parseStatus(req.query.status), limit })
        .map((view) => withDownloadUrl(req, view));

      res.json({ success: true, jobs, count: jobs.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/jobs/:id', (req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json(withDownloadUrl(req, service.status(req.params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/jobs/:id', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const view = service.cancel(req.params.id);
      res.json({ success: true, jobId: view.jobId, message: 'Cancellation requested' });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /jobs/:id/retry
   *
   * Accepts JSON or form fields: api_key, secret_key, layout
   */
  router.post(
    '/jobs/:id/retry',
    upload.none(),
    validateRetryJob,
    validateRequest,
    (req: Request, res: Response, next: NextFunction): void => {
      try {
        const { jobId } = service.retry(req.params.id, {
          credentials: credentials(req),
          layout: formField(req, 'layout'),
        });
        res.status(202).json({ success: true, jobId });
      } catch (error) {
        next(error);
      }
    }
  );

  router.get('/jobs/:id/download', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const target = await service.download(req.params.id);

      logger.info('Result table download', { jobId: req.params.id, fileName: target.fileName });

      res.setHeader('X-Job-Id', req.params.id);
      res.download(target.location, target.fileName, (error) => {
        if (!error) {
          return;
        }
        if (res.headersSent) {
          logger.warn('Result table download interrupted', { jobId: req.params.id, error: error.message });
        } else {
          next(error);
        }
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/queue/stats', (_req: Request, res: Response): void => {
    res.json({ success: true, stats: service.stats() });
  });

  return router;
}
