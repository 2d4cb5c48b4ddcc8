/**
 * Job Service - transport-agnostic control surface
 *
 * start / status / cancel / retry / download, plus list and stats. Runs are
 * launched on their own promise chain; the service keeps a handle to every
 * active run so callers can wait for it and shutdown can drain them.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ErrorFactory, errorMessage } from '@pageline/errors';
import type { Logger } from '@pageline/logger';
import { MAX_DPI, MIN_DPI } from '../config';
import {
  JobPhase,
  JobRecord,
  JobStatus,
  JobStatusView,
  LAYOUT_MODES,
  LayoutMode,
  QueueStats,
  RecognizerCredentials,
  isDownloadAvailable,
  toStatusView,
} from '../models/job.model';
import { JobRunner } from '../orchestration/JobRunner';
import { RetryRunner } from '../orchestration/RetryRunner';
import { SourceDocument } from '../renderers/PageRenderer';
import { JobFilter, JobStore } from '../repositories/JobStore';
import { extensionOf, isAllowedImage, jobPaths, safeFileName } from '../utils/files';
import { logger as serviceLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface UploadedFile {
  originalName: string;
  buffer: Buffer;
}

export type StartDocument =
  | { mode: 'pdf'; file?: UploadedFile }
  | { mode: 'images'; files: UploadedFile[] };

export interface StartJobRequest {
  document?: StartDocument;
  credentials: RecognizerCredentials;
  layout?: string;
  languageHint?: string;
  resolution?: number;
}

export interface RetryJobRequest {
  credentials: RecognizerCredentials;
  layout?: string;
}

export interface DownloadTarget {
  location: string;
  fileName: string;
}

export interface JobServiceDependencies {
  store: JobStore;
  runner: JobRunner;
  retryRunner: RetryRunner;
  runsDir: string;
  defaultLanguageHint?: string;
  defaultResolution?: number;
  logger?: Logger;
}

// ============================================================================
// Validation
// ============================================================================

function parseLayout(value: string | undefined): LayoutMode {
  const requested = value === undefined || value === '' ? 'auto' : value;
  const layout = LAYOUT_MODES.find((mode) => mode === requested);
  if (!layout) {
    throw ErrorFactory.invalidInput(`layout must be one of ${LAYOUT_MODES.join(', ')}`, { layout: value });
  }
  return layout;
}

function parseResolution(value: number): number {
  if (!Number.isInteger(value) || value < MIN_DPI || value > MAX_DPI) {
    throw ErrorFactory.invalidInput(`dpi must be an integer between ${MIN_DPI} and ${MAX_DPI}`, {
      dpi: value,
    });
  }
  return value;
}

function parseCredentials(credentials: RecognizerCredentials): RecognizerCredentials {
  const apiKey = credentials.apiKey.trim();
  const secretKey = credentials.secretKey.trim();
  if (!apiKey || !secretKey) {
    throw ErrorFactory.invalidInput('api_key and secret_key are required');
  }
  return { apiKey, secretKey };
}

/**
 * Uploaded files as they will be written to the job's input directory
 */
interface PlannedUpload {
  fileName: string;
  buffer: Buffer;
}

function planDocument(document: StartDocument | undefined): { kind: SourceDocument['kind']; files: PlannedUpload[] } {
  if (!document) {
    throw ErrorFactory.invalidInput('A PDF file or page images are required');
  }

  if (document.mode === 'pdf') {
    const { file } = document;
    if (!file || !file.originalName) {
      throw ErrorFactory.invalidInput('Upload a PDF file');
    }
    if (extensionOf(file.originalName) !== '.pdf') {
      throw ErrorFactory.invalidInput('Uploaded file is not a PDF', { fileName: file.originalName });
    }
    const stem = safeFileName(path.basename(file.originalName, path.extname(file.originalName))) || 'input';
    return { kind: 'pdf', files: [{ fileName: `${stem}.pdf`, buffer: file.buffer }] };
  }

  if (document.files.length === 0) {
    throw ErrorFactory.invalidInput('Upload one or more page images');
  }

  const files: PlannedUpload[] = [];
  document.files.forEach((file, index) => {
    if (!file.originalName || !isAllowedImage(file.originalName)) {
      return;
    }
    const ext = extensionOf(file.originalName);
    const position = index + 1;
    const stem =
      safeFileName(path.basename(file.originalName, path.extname(file.originalName))) || `image_${position}`;
    files.push({ fileName: `${String(position).padStart(4, '0')}_${stem}${ext}`, buffer: file.buffer });
  });

  if (files.length === 0) {
    throw ErrorFactory.invalidInput('No supported images uploaded (png, jpg, jpeg, bmp, tif, tiff, webp)');
  }

  return { kind: 'images', files };
}

// ============================================================================
// Service
// ============================================================================

export class JobService {
  private readonly store: JobStore;
  private readonly runner: JobRunner;
  private readonly retryRunner: RetryRunner;
  private readonly runsDir: string;
  private readonly defaultLanguageHint: string;
  private readonly defaultResolution: number;
  private readonly logger: Logger;
  private readonly active = new Map<string, Promise<void>>();

  constructor(deps: JobServiceDependencies) {
    this.store = deps.store;
    this.runner = deps.runner;
    this.retryRunner = deps.retryRunner;
    this.runsDir = deps.runsDir;
    this.defaultLanguageHint = deps.defaultLanguageHint ?? 'CHN_ENG';
    this.defaultResolution = deps.defaultResolution ?? 300;
    this.logger = deps.logger ?? serviceLogger;
  }

  /**
   * Validates the request, stores the uploads and launches the job.
   * Invalid requests are rejected before any job exists.
   */
  async start(request: StartJobRequest): Promise<{ jobId: string }> {
    const layout = parseLayout(request.layout);
    const resolution = parseResolution(request.resolution ?? this.defaultResolution);
    const credentials = parseCredentials(request.credentials);
    const planned = planDocument(request.document);
    const languageHint = request.languageHint?.trim() || this.defaultLanguageHint;

    const outputName =
      planned.kind === 'pdf' ? `${path.basename(planned.files[0].fileName, '.pdf')}_ocr.csv` : 'images_ocr.csv';

    const job = this.store.create({ outputName, options: { layout, languageHint, resolution } });
    const paths = jobPaths(this.runsDir, job.id);

    const saved: string[] = [];
    try {
      await fs.mkdir(paths.inputDir, { recursive: true });
      for (const file of planned.files) {
        const target = path.join(paths.inputDir, file.fileName);
        await fs.writeFile(target, file.buffer);
        saved.push(target);
      }
    } catch (error) {
      this.store.update(job.id, {
        status: JobStatus.FAILED,
        phase: JobPhase.FAILED,
        message: `Could not store upload: ${errorMessage(error)}`,
      });
      throw ErrorFactory.internalServer('Could not store the uploaded files', { jobId: job.id });
    }

    const document: SourceDocument =
      planned.kind === 'pdf' ? { kind: 'pdf', path: saved[0] } : { kind: 'images', paths: saved };

    this.logger.info('Job created', { jobId: job.id, kind: planned.kind, files: saved.length, layout, resolution });

    this.launch(job.id, 'run', () =>
      this.runner.run({
        jobId: job.id,
        document,
        credentials,
        imagesDir: planned.kind === 'pdf' ? paths.imagesDir : paths.inputDir,
        resultPath: paths.resultPath,
      })
    );

    return { jobId: job.id };
  }

  status(jobId: string): JobStatusView {
    return toStatusView(this.store.require(jobId));
  }

  cancel(jobId: string): JobStatusView {
    const job = this.store.requestCancel(jobId);
    this.logger.info('Job cancellation requested', { jobId });
    return toStatusView(job);
  }

  /**
   * Starts a retry run over the job's failed pages. Refused while a run is
   * active or when nothing failed.
   */
  retry(jobId: string, request: RetryJobRequest): { jobId: string } {
    const credentials = parseCredentials(request.credentials);
    const layout = request.layout === undefined || request.layout === '' ? undefined : parseLayout(request.layout);

    const { pages } = this.store.beginRetry(jobId);
    this.logger.info('Job retry started', { jobId, pages });

    this.launch(jobId, 'retry', () =>
      this.retryRunner.run({
        jobId,
        pages,
        credentials,
        layout,
        resultPath: jobPaths(this.runsDir, jobId).resultPath,
      })
    );

    return { jobId };
  }

  async download(jobId: string): Promise<DownloadTarget> {
    const job = this.store.require(jobId);
    if (!isDownloadAvailable(job)) {
      throw ErrorFactory.invalidState(`Job ${jobId} has no result table yet`, { jobId, status: job.status });
    }

    try {
      await fs.access(job.resultLocation);
    } catch {
      throw ErrorFactory.notFound(`Result table for job ${jobId} is missing`, { jobId });
    }

    return { location: job.resultLocation, fileName: job.outputName || `${jobId}_ocr.csv` };
  }

  list(filter: JobFilter = {}): JobStatusView[] {
    return this.store.list(filter).map(toStatusView);
  }

  stats(): QueueStats {
    return this.store.stats();
  }

  /**
   * Resolves once the job's current run (if any) has settled
   */
  async waitFor(jobId: string): Promise<void> {
    await this.active.get(jobId);
  }

  /**
   * Resolves once every active run has settled
   */
  async drain(): Promise<void> {
    await Promise.all([...this.active.values()]);
  }

  private launch(jobId: string, kind: 'run' | 'retry', work: () => Promise<JobRecord>): void {
    const task = work()
      .then(
        (job) => {
          this.logger.info(`Job ${kind} settled`, { jobId, status: job.status });
        },
        (error: unknown) => {
          this.logger.error(`Job ${kind} rejected`, { jobId, error });
        }
      )
      .finally(() => {
        if (this.active.get(jobId) === task) {
          this.active.delete(jobId);
        }
      });

    this.active.set(jobId, task);
  }
}
