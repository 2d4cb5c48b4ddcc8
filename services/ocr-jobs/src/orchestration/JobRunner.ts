/**
 * Job Runner
 *
 * Drives one job from queued to a terminal status:
 * 1. Authenticate with the recognizer (fatal on failure)
 * 2. Render every page to an image (fatal on failure)
 * 3. Recognize every page, recording per-page failures and moving on
 * 4. Persist the result table and settle on completed / completed_with_errors
 *
 * Cancellation is checked before each page is rendered and before each page is
 * recognized. Rows produced so far are kept when a job is canceled.
 *
 * Progress bands: authentication 1-3, conversion 5-45, recognition 45-98,
 * 100 only on completion.
 */

import { setTimeout as delay } from 'timers/promises';
import { errorMessage } from '@pageline/errors';
import type { Logger } from '@pageline/logger';
import { Recognizer } from '../clients/Recognizer';
import { RowBuilder } from '../layout/rows';
import { JobPhase, JobRecord, JobStatus, RecognizerCredentials, ResultRow } from '../models/job.model';
import { PageRenderer, SourceDocument } from '../renderers/PageRenderer';
import { JobStore, JobUpdate } from '../repositories/JobStore';
import { ResultStore } from '../storage/ResultStore';
import { logger as serviceLogger } from '../utils/logger';
import { CancellationToken, JobCancellationToken } from './CancellationToken';
import { PageProcessor, progressWithin } from './pages';

// ============================================================================
// Types
// ============================================================================

export interface RunnerDependencies {
  store: JobStore;
  recognizer: Recognizer;
  results: ResultStore;
  rowBuilder?: RowBuilder;
  logger?: Logger;
  /** Pause between page requests to the recognizer */
  pageIntervalMs?: number;
}

export interface JobRunnerDependencies extends RunnerDependencies {
  renderer: PageRenderer;
}

export interface RunRequest {
  jobId: string;
  document: SourceDocument;
  credentials: RecognizerCredentials;
  imagesDir: string;
  resultPath: string;
}

const CONVERT_START = 5;
const CONVERT_SPAN = 40;
const RECOGNIZE_START = 45;
const RECOGNIZE_SPAN = 53;
const RECOGNIZE_CAP = 98;

// ============================================================================
// Runner
// ============================================================================

export class JobRunner {
  private readonly store: JobStore;
  private readonly renderer: PageRenderer;
  private readonly recognizer: Recognizer;
  private readonly results: ResultStore;
  private readonly pages: PageProcessor;
  private readonly logger: Logger;
  private readonly pageIntervalMs: number;

  constructor(deps: JobRunnerDependencies) {
    this.store = deps.store;
    this.renderer = deps.renderer;
    this.recognizer = deps.recognizer;
    this.results = deps.results;
    this.pages = new PageProcessor(deps.recognizer, deps.rowBuilder ?? new RowBuilder());
    this.logger = deps.logger ?? serviceLogger;
    this.pageIntervalMs = deps.pageIntervalMs ?? 0;
  }

  /**
   * Runs the job to a terminal status and returns the final record.
   * Unexpected errors settle the job as failed; only an unknown job id rejects.
   */
  async run(request: RunRequest): Promise<JobRecord> {
    const { jobId } = request;
    const log = this.logger.child({ jobId });

    try {
      return await this.execute(request, log);
    } catch (error) {
      log.error('Job run aborted by unexpected error', { error });
      return this.settle(jobId, log, {
        status: JobStatus.FAILED,
        phase: JobPhase.FAILED,
        message: `Job failed: ${errorMessage(error)}`,
      });
    }
  }

  private async execute(request: RunRequest, log: Logger): Promise<JobRecord> {
    const { jobId, credentials } = request;
    const job = this.store.require(jobId);
    const { options } = job;
    const cancellation: CancellationToken = new JobCancellationToken(this.store, jobId);

    // Step 1: authenticate
    this.store.update(jobId, {
      status: JobStatus.RUNNING,
      phase: JobPhase.AUTHENTICATING,
      progress: 1,
      message: 'Authenticating with the recognition service',
    });

    let accessToken: string;
    try {
      accessToken = await this.recognizer.authenticate(credentials);
    } catch (error) {
      log.warn('Authentication failed', { error: errorMessage(error) });
      return this.fail(jobId, `Authentication failed: ${errorMessage(error)}`);
    }

    this.store.update(jobId, { progress: 3, message: 'Authenticated' });
    log.info('Authenticated with the recognition service');

    // Step 2: render pages
    let imagePaths: string[];
    try {
      const rendered = await this.convert(request, options.resolution, cancellation, log);
      if (rendered === undefined) {
        return this.cancel(jobId, log, 'Canceled during page conversion');
      }
      imagePaths = rendered;
    } catch (error) {
      log.warn('Page conversion failed', { error: errorMessage(error) });
      return this.fail(jobId, `Page conversion failed: ${errorMessage(error)}`);
    }

    const pagesTotal = imagePaths.length;
    this.store.update(jobId, {
      phase: JobPhase.RECOGNIZING,
      imagePaths,
      progress: RECOGNIZE_START,
      message: `Recognizing ${pagesTotal} page(s)`,
    });

    // Step 3: recognize pages
    const rows: ResultRow[] = [];
    const failedPages: number[] = [];

    for (let index = 0; index < pagesTotal; index++) {
      const pageNo = index + 1;

      if (cancellation.isCancellationRequested) {
        await this.persist(request, rows);
        return this.cancel(jobId, log, `Canceled after ${index} of ${pagesTotal} page(s)`, {
          rowsTotal: rows.length,
          failedPages,
        });
      }

      const outcome = await this.pages.process({
        pageNo,
        imagePath: imagePaths[index],
        accessToken,
        languageHint: options.languageHint,
        layout: options.layout,
      });

      if (outcome.ok) {
        rows.push(...outcome.rows);
        if (outcome.rows.length > 0) {
          await this.persist(request, rows);
        }
      } else {
        failedPages.push(pageNo);
        log.warn('Page recognition failed', { pageNo, reason: outcome.reason });
      }

      this.store.update(jobId, {
        pagesDone: pageNo,
        rowsTotal: rows.length,
        progress: Math.min(RECOGNIZE_CAP, progressWithin(RECOGNIZE_START, RECOGNIZE_SPAN, pageNo, pagesTotal)),
        message: `Recognized page ${pageNo}/${pagesTotal}`,
      });

      if (this.pageIntervalMs > 0 && pageNo < pagesTotal) {
        await delay(this.pageIntervalMs);
      }
    }

    // Step 4: finalize
    await this.persist(request, rows);

    const status = failedPages.length > 0 ? JobStatus.COMPLETED_WITH_ERRORS : JobStatus.COMPLETED;
    log.info('Job finished', { status, rowsTotal: rows.length, failedPages });

    return this.store.update(jobId, {
      status,
      phase: status === JobStatus.COMPLETED ? JobPhase.COMPLETED : JobPhase.COMPLETED_WITH_ERRORS,
      progress: 100,
      rowsTotal: rows.length,
      failedPages,
      message:
        failedPages.length > 0
          ? `Finished with ${rows.length} line(s); ${failedPages.length} page(s) failed`
          : `Finished with ${rows.length} line(s)`,
    });
  }

  /**
   * Renders every page. Resolves undefined when cancellation was observed.
   */
  private async convert(
    request: RunRequest,
    resolution: number,
    cancellation: CancellationToken,
    log: Logger
  ): Promise<string[] | undefined> {
    const { jobId, document, imagesDir } = request;
    const pagesTotal = await this.renderer.countPages(document);
    if (pagesTotal === 0) {
      throw new Error('Document has no pages');
    }

    this.store.update(jobId, {
      phase: JobPhase.CONVERTING,
      pagesTotal,
      progress: CONVERT_START,
      message: `Converting ${pagesTotal} page(s) to images`,
    });
    log.info('Converting pages', { pagesTotal, resolution });

    const imagePaths: string[] = [];
    for (let index = 0; index < pagesTotal; index++) {
      if (cancellation.isCancellationRequested) {
        return undefined;
      }

      imagePaths.push(await this.renderer.render(document, index, resolution, imagesDir));

      this.store.update(jobId, {
        convertDone: index + 1,
        progress: progressWithin(CONVERT_START, CONVERT_SPAN, index + 1, pagesTotal),
        message: `Converted page ${index + 1}/${pagesTotal}`,
      });
    }

    return imagePaths;
  }

  private async persist(request: RunRequest, rows: readonly ResultRow[]): Promise<void> {
    await this.results.write(request.resultPath, rows);
    this.store.update(request.jobId, { resultLocation: request.resultPath });
  }

  private fail(jobId: string, message: string): JobRecord {
    return this.store.update(jobId, { status: JobStatus.FAILED, phase: JobPhase.FAILED, message });
  }

  private cancel(jobId: string, log: Logger, message: string, extra: JobUpdate = {}): JobRecord {
    log.info('Job canceled', { message });
    return this.store.update(jobId, {
      ...extra,
      status: JobStatus.CANCELED,
      phase: JobPhase.CANCELED,
      message,
    });
  }

  /**
   * Last-resort terminal update; a store failure here is logged and the
   * latest known record returned.
   */
  private settle(jobId: string, log: Logger, patch: JobUpdate): JobRecord {
    try {
      return this.store.update(jobId, patch);
    } catch (error) {
      log.error('Could not record job failure', { error });
      return this.store.require(jobId);
    }
  }
}
