/**
 * Retry Runner
 *
 * Re-attempts only the pages JobStore.beginRetry claimed for the run; the
 * job is already in the retrying phase. Pages are recognized from the images
 * rendered by the first run. Recovered rows are merged into the persisted
 * table by read, drop, append, sort and a whole-table rewrite, so a retried
 * page never appears twice.
 */

import { setTimeout as delay } from 'timers/promises';
import { errorMessage } from '@pageline/errors';
import type { Logger } from '@pageline/logger';
import { Recognizer } from '../clients/Recognizer';
import { RowBuilder } from '../layout/rows';
import { JobPhase, JobRecord, JobStatus, LayoutMode, RecognizerCredentials, ResultRow } from '../models/job.model';
import { JobStore, JobUpdate } from '../repositories/JobStore';
import { ResultStore } from '../storage/ResultStore';
import { logger as serviceLogger } from '../utils/logger';
import { CancellationToken, JobCancellationToken } from './CancellationToken';
import { RunnerDependencies } from './JobRunner';
import { PageOutcome, PageProcessor, progressWithin } from './pages';

export interface RetryRequest {
  jobId: string;
  /** Pages claimed by beginRetry, ascending */
  pages: readonly number[];
  credentials: RecognizerCredentials;
  /** Overrides the layout the job was started with */
  layout?: LayoutMode;
  /** Used when the first run never persisted a table */
  resultPath: string;
}

const RETRY_START = 5;
const RETRY_SPAN = 93;

/**
 * Replaces the rows of the given pages with the recovered rows, ordered by
 * page then line.
 */
export function mergeRows(
  existing: readonly ResultRow[],
  replacedPages: readonly number[],
  recovered: readonly ResultRow[]
): ResultRow[] {
  const replaced = new Set(replacedPages);
  return [...existing.filter((row) => !replaced.has(row.pageNo)), ...recovered].sort(
    (a, b) => a.pageNo - b.pageNo || a.lineNo - b.lineNo
  );
}

export class RetryRunner {
  private readonly store: JobStore;
  private readonly recognizer: Recognizer;
  private readonly results: ResultStore;
  private readonly pages: PageProcessor;
  private readonly logger: Logger;
  private readonly pageIntervalMs: number;

  constructor(deps: RunnerDependencies) {
    this.store = deps.store;
    this.recognizer = deps.recognizer;
    this.results = deps.results;
    this.pages = new PageProcessor(deps.recognizer, deps.rowBuilder ?? new RowBuilder());
    this.logger = deps.logger ?? serviceLogger;
    this.pageIntervalMs = deps.pageIntervalMs ?? 0;
  }

  async run(request: RetryRequest): Promise<JobRecord> {
    const { jobId } = request;
    const log = this.logger.child({ jobId, retry: true });

    try {
      return await this.execute(request, log);
    } catch (error) {
      log.error('Retry run aborted by unexpected error', { error });
      try {
        return this.store.update(jobId, {
          status: JobStatus.FAILED,
          phase: JobPhase.FAILED,
          failedPages: [...request.pages],
          message: `Retry failed: ${errorMessage(error)}`,
        });
      } catch (updateError) {
        log.error('Could not record retry failure', { error: updateError });
        return this.store.require(jobId);
      }
    }
  }

  private async execute(request: RetryRequest, log: Logger): Promise<JobRecord> {
    const { jobId } = request;
    const job = this.store.require(jobId);
    const retryPages = [...request.pages];
    const total = retryPages.length;
    const layout = request.layout ?? job.options.layout;
    const location = job.resultLocation || request.resultPath;
    const cancellation: CancellationToken = new JobCancellationToken(this.store, jobId);

    let accessToken: string;
    try {
      accessToken = await this.recognizer.authenticate(request.credentials);
    } catch (error) {
      log.warn('Authentication failed', { error: errorMessage(error) });
      // the pages go back to failedPages, the job can be retried again
      return this.store.update(jobId, {
        status: JobStatus.FAILED,
        phase: JobPhase.FAILED,
        failedPages: retryPages,
        message: `Authentication failed: ${errorMessage(error)}`,
      });
    }

    this.store.update(jobId, { progress: RETRY_START, message: `Retrying ${total} page(s)` });
    log.info('Retrying failed pages', { pages: retryPages, layout });

    const recovered: ResultRow[] = [];
    const attempted: number[] = [];
    const stillFailed: number[] = [];

    for (let index = 0; index < total; index++) {
      const pageNo = retryPages[index];

      if (cancellation.isCancellationRequested) {
        const merged = await this.merge(jobId, location, attempted, recovered);
        log.info('Retry canceled', { attempted });
        return this.store.update(jobId, {
          status: JobStatus.CANCELED,
          phase: JobPhase.CANCELED,
          rowsTotal: merged.length,
          failedPages: [...stillFailed, ...retryPages.slice(index)],
          message: `Retry canceled after ${index} of ${total} page(s)`,
        });
      }

      const imagePath: string | undefined = job.imagePaths[pageNo - 1];
      const outcome: PageOutcome =
        imagePath === undefined
          ? { ok: false, pageNo, reason: `No rendered image for page ${pageNo}` }
          : await this.pages.process({
              pageNo,
              imagePath,
              accessToken,
              languageHint: job.options.languageHint,
              layout,
            });

      attempted.push(pageNo);
      if (outcome.ok) {
        recovered.push(...outcome.rows);
      } else {
        stillFailed.push(pageNo);
        log.warn('Page recognition failed again', { pageNo, reason: outcome.reason });
      }

      this.store.update(jobId, {
        retryDone: index + 1,
        progress: progressWithin(RETRY_START, RETRY_SPAN, index + 1, total),
        message: `Retried page ${pageNo} (${index + 1}/${total})`,
      });

      if (this.pageIntervalMs > 0 && index + 1 < total) {
        await delay(this.pageIntervalMs);
      }
    }

    const merged = await this.merge(jobId, location, retryPages, recovered);
    const status = stillFailed.length > 0 ? JobStatus.COMPLETED_WITH_ERRORS : JobStatus.COMPLETED;
    log.info('Retry finished', { status, recovered: total - stillFailed.length, stillFailed });

    const patch: JobUpdate = {
      status,
      phase: status === JobStatus.COMPLETED ? JobPhase.COMPLETED : JobPhase.COMPLETED_WITH_ERRORS,
      progress: 100,
      rowsTotal: merged.length,
      failedPages: stillFailed,
      message:
        stillFailed.length > 0
          ? `Retry finished; ${stillFailed.length} page(s) still failed`
          : `Retry finished; all ${total} page(s) recovered`,
    };
    return this.store.update(jobId, patch);
  }

  private async merge(
    jobId: string,
    location: string,
    replacedPages: readonly number[],
    recovered: readonly ResultRow[]
  ): Promise<ResultRow[]> {
    const existing = await this.results.read(location);
    const merged = mergeRows(existing, replacedPages, recovered);
    await this.results.write(location, merged);
    this.store.update(jobId, { resultLocation: location });
    return merged;
  }
}
