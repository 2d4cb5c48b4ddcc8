/**
 * Health Routes
 *
 * - GET /health       - Liveness probe
 * - GET /health/ready - Readiness: the runs directory is writable
 */

import { Router, Request, Response } from 'express';
import { constants as fsConstants, promises as fs } from 'fs';
import { errorMessage } from '@pageline/errors';
import { JobService } from '../services/JobService';

export function createHealthRouter(service: JobService, runsDir: string): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      service: 'ocr-jobs',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/health/ready', async (_req: Request, res: Response): Promise<void> => {
    try {
      await fs.mkdir(runsDir, { recursive: true });
      await fs.access(runsDir, fsConstants.W_OK);
      res.json({ status: 'ready', jobs: service.stats() });
    } catch (error) {
      res.status(503).json({ status: 'not_ready', error: errorMessage(error) });
    }
  });

  return router;
}
