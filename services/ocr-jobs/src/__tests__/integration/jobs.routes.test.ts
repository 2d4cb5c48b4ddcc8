/**
 * OCR jobs API integration tests
 *
 * The full Express app over supertest, with the renderer and recognizer
 * replaced by in-process fakes and results written to a temp directory.
 */

import { Application } from 'express';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { createExpressApp } from '../../app';
import { JobRunner } from '../../orchestration/JobRunner';
import { RetryRunner } from '../../orchestration/RetryRunner';
import { ImageSetRenderer } from '../../renderers/ImageSetRenderer';
import { RoutingRenderer } from '../../renderers/RoutingRenderer';
import { JobStore } from '../../repositories/JobStore';
import { JobService } from '../../services/JobService';
import { CSV_COLUMNS } from '../../storage/csv';
import { CsvResultStore } from '../../storage/ResultStore';
import { FakeRecognizer, FakeRenderer, silentLogger } from '../utils/fakes';

const MAX_UPLOAD_BYTES = 1024;

describe('OCR jobs API', () => {
  let runsDir: string;
  let store: JobStore;
  let recognizer: FakeRecognizer;
  let renderer: FakeRenderer;
  let service: JobService;
  let app: Application;

  beforeEach(async () => {
    runsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pageline-api-'));
    store = new JobStore();
    const results = new CsvResultStore();
    const logger = silentLogger();
    recognizer = new FakeRecognizer();
    renderer = new FakeRenderer(2);

    service = new JobService({
      store,
      runner: new JobRunner({
        store,
        renderer: new RoutingRenderer({ pdf: renderer, images: new ImageSetRenderer() }),
        recognizer,
        results,
        logger,
      }),
      retryRunner: new RetryRunner({ store, recognizer, results, logger }),
      runsDir,
      logger,
    });
    app = createExpressApp(service, { runsDir, maxUploadBytes: MAX_UPLOAD_BYTES, nodeEnv: 'test' });
  });

  afterEach(async () => {
    await service.drain();
    await fs.rm(runsDir, { recursive: true, force: true });
  });

  function startPdfJob() {
    return request(app)
      .post('/ocr/api/jobs')
      .field('api_key', 'test-key')
      .field('secret_key', 'test-secret')
      .attach('pdf_file', Buffer.from('%PDF-1.4 test'), 'My Doc.pdf');
  }

  async function finishedPdfJob(): Promise<string> {
    const res = await startPdfJob().expect(202);
    const jobId: string = res.body.jobId;
    await service.waitFor(jobId);
    return jobId;
  }

  describe('POST /ocr/api/jobs', () => {
    it('should accept a PDF and run the job', async () => {
      const res = await startPdfJob();

      expect(res.status).toBe(202);
      expect(res.body.success).toBe(true);
      expect(res.body.jobId).toMatch(/^[0-9a-f-]{36}$/);

      await service.waitFor(res.body.jobId);
      const status = await request(app).get(`/ocr/api/jobs/${res.body.jobId}`);

      expect(status.status).toBe(200);
      expect(status.body).toMatchObject({
        jobId: res.body.jobId,
        status: 'completed',
        phase: 'completed',
        progress: 100,
        pagesTotal: 2,
        pagesDone: 2,
        rowsTotal: 2,
        failedPagesCount: 0,
        canCancel: false,
        canRetry: false,
        downloadAvailable: true,
        downloadUrl: `/ocr/api/jobs/${res.body.jobId}/download`,
      });
    });

    it('should accept page images', async () => {
      const res = await request(app)
        .post('/ocr/api/jobs')
        .field('input_mode', 'images')
        .field('api_key', 'test-key')
        .field('secret_key', 'test-secret')
        .field('layout', 'horizontal')
        .field('dpi', '150')
        .attach('image_files', Buffer.from('b'), 'page 2.png')
        .attach('image_files', Buffer.from('a'), 'page 1.png');

      expect(res.status).toBe(202);
      await service.waitFor(res.body.jobId);
      expect(recognizer.attempts).toEqual(['0001_page_2.png', '0002_page_1.png']);
    });

    it('should reject missing credentials', async () => {
      const res = await request(app)
        .post('/ocr/api/jobs')
        .field('secret_key', 'test-secret')
        .attach('pdf_file', Buffer.from('%PDF-1.4 test'), 'doc.pdf');

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ success: false, error: 'INVALID_INPUT', message: 'api_key is required' });
    });

    it('should reject a resolution out of range', async () => {
      const res = await startPdfJob().field('dpi', '50');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('dpi must be an integer between 72 and 600');
    });

    it('should use the defaults for empty dpi and language_type fields', async () => {
      const res = await startPdfJob().field('dpi', '').field('language_type', '');

      expect(res.status).toBe(202);
      await service.waitFor(res.body.jobId);
      expect(store.require(res.body.jobId).options).toEqual({ layout: 'auto', languageHint: 'CHN_ENG', resolution: 300 });
    });

    it('should pass any printable language_type through', async () => {
      const res = await startPdfJob().field('language_type', ' CHN-ENG.v2 ');

      expect(res.status).toBe(202);
      await service.waitFor(res.body.jobId);
      expect(store.require(res.body.jobId).options.languageHint).toBe('CHN-ENG.v2');
    });

    it('should reject a language_type with control characters', async () => {
      const res = await startPdfJob().field('language_type', 'CHN\tENG');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('language_type cannot contain control characters');
    });

    it('should reject an unknown layout', async () => {
      const res = await startPdfJob().field('layout', 'diagonal');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('layout must be one of auto, horizontal, vertical-rtl');
    });

    it('should reject a request without a document', async () => {
      const res = await request(app)
        .post('/ocr/api/jobs')
        .field('api_key', 'test-key')
        .field('secret_key', 'test-secret');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Upload a PDF file');
      expect(service.list()).toEqual([]);
    });

    it('should reject uploads over the size limit', async () => {
      const res = await request(app)
        .post('/ocr/api/jobs')
        .field('api_key', 'test-key')
        .field('secret_key', 'test-secret')
        .attach('pdf_file', Buffer.alloc(MAX_UPLOAD_BYTES * 2), 'big.pdf');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Upload rejected: File too large');
    });
  });

  describe('GET /ocr/api/jobs/:id', () => {
    it('should return 404 for an unknown job', async () => {
      const res = await request(app).get('/ocr/api/jobs/unknown-job');

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: 'NOT_FOUND', message: 'Job unknown-job not found' });
    });

    it('should report failed pages and offer a retry', async () => {
      recognizer.script('page_2.png', { error: 'request timed out' });
      const jobId = await finishedPdfJob();

      const res = await request(app).get(`/ocr/api/jobs/${jobId}`);

      expect(res.body).toMatchObject({
        status: 'completed_with_errors',
        failedPagesCount: 1,
        failedPages: [2],
        canRetry: true,
      });
    });

    it('should report a job that failed authentication without rows', async () => {
      recognizer.authError = 'invalid client';
      const jobId = await finishedPdfJob();

      const res = await request(app).get(`/ocr/api/jobs/${jobId}`);

      expect(res.body).toMatchObject({
        status: 'failed',
        pagesDone: 0,
        rowsTotal: 0,
        message: 'Authentication failed: invalid client',
        downloadAvailable: false,
        downloadUrl: null,
      });
    });
  });

  describe('DELETE /ocr/api/jobs/:id', () => {
    it('should acknowledge a cancellation', async () => {
      let release = (): void => undefined;
      renderer.gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const start = await startPdfJob().expect(202);

      const res = await request(app).delete(`/ocr/api/jobs/${start.body.jobId}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, jobId: start.body.jobId, message: 'Cancellation requested' });
      release();
      await service.waitFor(start.body.jobId);
      expect(service.status(start.body.jobId).status).toBe('canceled');
    });

    it('should refuse to cancel a finished job', async () => {
      const jobId = await finishedPdfJob();

      const res = await request(app).delete(`/ocr/api/jobs/${jobId}`);

      expect(res.status).toBe(409);
      expect(res.body.error).toBe('INVALID_STATE');
    });
  });

  describe('POST /ocr/api/jobs/:id/retry', () => {
    it('should retry the failed pages', async () => {
      recognizer.script('page_1.png', { error: 'boom' }, []);
      const jobId = await finishedPdfJob();

      const res = await request(app)
        .post(`/ocr/api/jobs/${jobId}/retry`)
        .send({ api_key: 'test-key', secret_key: 'test-secret' });

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ success: true, jobId });
      await service.waitFor(jobId);
      expect(service.status(jobId)).toMatchObject({ status: 'completed', failedPagesCount: 0 });
    });

    it('should refuse to retry a completed job', async () => {
      const jobId = await finishedPdfJob();

      const res = await request(app)
        .post(`/ocr/api/jobs/${jobId}/retry`)
        .send({ api_key: 'test-key', secret_key: 'test-secret' });

      expect(res.status).toBe(409);
      expect(res.body.message).toBe(`Job ${jobId} is completed and cannot be retried`);
    });

    it('should refuse a canceled job with nothing to retry', async () => {
      let release = (): void => undefined;
      renderer.gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const start = await startPdfJob().expect(202);
      const jobId: string = start.body.jobId;
      await request(app).delete(`/ocr/api/jobs/${jobId}`).expect(200);
      release();
      await service.waitFor(jobId);

      const res = await request(app)
        .post(`/ocr/api/jobs/${jobId}/retry`)
        .send({ api_key: 'test-key', secret_key: 'test-secret' });

      expect(res.status).toBe(409);
      expect(res.body.message).toBe(`Job ${jobId} has no failed pages to retry`);
    });

    it('should reject a malformed JSON body', async () => {
      const res = await request(app)
        .post('/ocr/api/jobs/any/retry')
        .set('Content-Type', 'application/json')
        .send('{"api_key": ');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Request body is not valid JSON');
    });

    it('should require credentials', async () => {
      const res = await request(app).post('/ocr/api/jobs/any/retry').send({ api_key: 'test-key' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('secret_key is required');
    });
  });

  describe('GET /ocr/api/jobs/:id/download', () => {
    it('should send the result table as an attachment', async () => {
      const jobId = await finishedPdfJob();

      const res = await request(app).get(`/ocr/api/jobs/${jobId}/download`);

      expect(res.status).toBe(200);
      expect(res.headers['x-job-id']).toBe(jobId);
      expect(res.headers['content-disposition']).toBe('attachment; filename="My_Doc_ocr.csv"');
      const lines = res.text.replace(/^\uFEFF/, '').split('\r\n');
      expect(lines[0]).toBe(CSV_COLUMNS.join(','));
      expect(lines).toHaveLength(4);
    });

    it('should refuse while no table exists', async () => {
      recognizer.authError = 'invalid client';
      const jobId = await finishedPdfJob();

      const res = await request(app).get(`/ocr/api/jobs/${jobId}/download`);

      expect(res.status).toBe(409);
      expect(res.body.message).toBe(`Job ${jobId} has no result table yet`);
    });
  });

  describe('listing and stats', () => {
    it('should list jobs filtered by status', async () => {
      const jobId = await finishedPdfJob();

      const completed = await request(app).get('/ocr/api/jobs?status=completed');
      const failed = await request(app).get('/ocr/api/jobs?status=failed');

      expect(completed.body.count).toBe(1);
      expect(completed.body.jobs[0].jobId).toBe(jobId);
      expect(failed.body).toEqual({ success: true, jobs: [], count: 0 });
    });

    it('should reject an unknown status filter', async () => {
      const res = await request(app).get('/ocr/api/jobs?status=paused');

      expect(res.status).toBe(400);
    });

    it('should count jobs per status', async () => {
      await finishedPdfJob();

      const res = await request(app).get('/ocr/api/queue/stats');

      expect(res.body).toEqual({
        success: true,
        stats: { queued: 0, running: 0, completed: 1, completed_with_errors: 0, failed: 0, canceled: 0 },
      });
    });
  });

  describe('health', () => {
    it('should answer liveness and readiness probes', async () => {
      const live = await request(app).get('/health');
      const ready = await request(app).get('/health/ready');

      expect(live.status).toBe(200);
      expect(live.body).toMatchObject({ status: 'ok', service: 'ocr-jobs' });
      expect(ready.status).toBe(200);
      expect(ready.body.status).toBe('ready');
    });
  });

  it('should answer unknown endpoints with 404', async () => {
    const res = await request(app).get('/ocr/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: 'NOT_FOUND',
      message: 'Endpoint GET /ocr/api/nothing-here not found',
    });
  });
});
