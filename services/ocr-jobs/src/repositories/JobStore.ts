/**
 * Job Store - single source of truth for job state
 *
 * Every method runs to completion on the event loop without awaiting, so each
 * call is a critical section over the whole job table. Records never leave the
 * store: callers get copies and request changes through `update`,
 * `requestCancel` and `beginRetry`.
 *
 * Guarded invariants:
 * - status only moves along the job state machine
 * - progress never decreases within a run (a retry run restarts at 0)
 * - pagesDone <= pagesTotal, convertDone <= pagesTotal, retryDone <= retryTotal
 * - imagePaths, once set, is never replaced
 * - failedPages is empty while a job is queued or running
 */

import { v4 as uuidv4 } from 'uuid';
import { ErrorFactory } from '@pageline/errors';
import {
  JobOptions,
  JobPhase,
  JobRecord,
  JobStatus,
  QueueStats,
  RETRYABLE_STATUSES,
  canCancel,
  isTerminal,
} from '../models/job.model';

export interface CreateJobRequest {
  outputName: string;
  options: JobOptions;
}

/**
 * Fields a runner may change. cancelRequested is not among them: it is set by
 * requestCancel and cleared by beginRetry only.
 */
export type JobUpdate = Partial<
  Pick<
    JobRecord,
    | 'status'
    | 'phase'
    | 'progress'
    | 'message'
    | 'pagesTotal'
    | 'convertDone'
    | 'pagesDone'
    | 'retryTotal'
    | 'retryDone'
    | 'rowsTotal'
    | 'failedPages'
    | 'imagePaths'
    | 'resultLocation'
  >
>;

/**
 * A job taken over for a retry run, with the pages the run owns
 */
export interface RetryClaim {
  job: JobRecord;
  pages: number[];
}

export interface JobFilter {
  status?: JobStatus;
  limit?: number;
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.QUEUED]: [JobStatus.RUNNING, JobStatus.FAILED, JobStatus.CANCELED],
  [JobStatus.RUNNING]: [
    JobStatus.RUNNING,
    JobStatus.COMPLETED,
    JobStatus.COMPLETED_WITH_ERRORS,
    JobStatus.FAILED,
    JobStatus.CANCELED,
  ],
  // Terminal jobs only leave through beginRetry
  [JobStatus.COMPLETED]: [],
  [JobStatus.COMPLETED_WITH_ERRORS]: [],
  [JobStatus.FAILED]: [],
  [JobStatus.CANCELED]: [],
};

function cloneJob(job: JobRecord): JobRecord {
  return {
    ...job,
    failedPages: [...job.failedPages],
    imagePaths: [...job.imagePaths],
    options: { ...job.options },
    createdAt: new Date(job.createdAt.getTime()),
    updatedAt: new Date(job.updatedAt.getTime()),
  };
}

function normalizePages(pages: readonly number[]): number[] {
  return [...new Set(pages)].sort((a, b) => a - b);
}

export class JobStore {
  private readonly jobs = new Map<string, JobRecord>();

  create(request: CreateJobRequest): JobRecord {
    const now = new Date();
    const job: JobRecord = {
      id: uuidv4(),
      status: JobStatus.QUEUED,
      phase: JobPhase.QUEUED,
      progress: 0,
      message: 'Job created',
      pagesTotal: 0,
      convertDone: 0,
      pagesDone: 0,
      retryTotal: 0,
      retryDone: 0,
      rowsTotal: 0,
      failedPages: [],
      imagePaths: [],
      resultLocation: '',
      outputName: request.outputName,
      options: { ...request.options },
      cancelRequested: false,
      createdAt: now,
      updatedAt: now,
    };

    this.jobs.set(job.id, job);
    return cloneJob(job);
  }

  get(jobId: string): JobRecord | undefined {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : undefined;
  }

  /**
   * Like get, but throws NotFoundError for unknown ids
   */
  require(jobId: string): JobRecord {
    return cloneJob(this.find(jobId));
  }

  update(jobId: string, patch: JobUpdate): JobRecord {
    const job = this.find(jobId);
    const next: JobRecord = { ...job, ...patch, updatedAt: new Date() };

    if (patch.status !== undefined && !TRANSITIONS[job.status].includes(patch.status)) {
      throw ErrorFactory.invalidState(`Job cannot move from ${job.status} to ${patch.status}`, {
        jobId,
        from: job.status,
        to: patch.status,
      });
    }

    if (patch.imagePaths !== undefined) {
      if (job.imagePaths.length > 0) {
        throw ErrorFactory.invalidState('Page images are fixed once conversion completes', { jobId });
      }
      next.imagePaths = [...patch.imagePaths];
    }

    if (patch.failedPages !== undefined) {
      next.failedPages = normalizePages(patch.failedPages);
    }

    if (patch.progress !== undefined) {
      next.progress = Math.min(100, Math.max(job.progress, Math.floor(patch.progress)));
    }

    if (next.pagesDone > next.pagesTotal || next.convertDone > next.pagesTotal) {
      throw ErrorFactory.invalidState('Page counters exceed the page total', {
        jobId,
        pagesTotal: next.pagesTotal,
        pagesDone: next.pagesDone,
        convertDone: next.convertDone,
      });
    }

    if (next.retryDone > next.retryTotal) {
      throw ErrorFactory.invalidState('Retry counter exceeds the retry total', {
        jobId,
        retryTotal: next.retryTotal,
        retryDone: next.retryDone,
      });
    }

    this.jobs.set(jobId, next);
    return cloneJob(next);
  }

  /**
   * Flags a queued or running job for cancellation. The runner observes the
   * flag at its next page boundary.
   */
  requestCancel(jobId: string): JobRecord {
    const job = this.find(jobId);

    if (!canCancel(job)) {
      throw ErrorFactory.invalidState(`Job ${jobId} is ${job.status} and cannot be canceled`, {
        jobId,
        status: job.status,
      });
    }

    const next: JobRecord = {
      ...job,
      cancelRequested: true,
      message: 'Cancellation requested',
      updatedAt: new Date(),
    };
    this.jobs.set(jobId, next);
    return cloneJob(next);
  }

  isCancelRequested(jobId: string): boolean {
    return this.find(jobId).cancelRequested;
  }

  /**
   * Atomically moves a terminal job with failed pages into a retry run and
   * hands the failed pages to the caller. The record's failedPages is cleared
   * until the run writes its outcome. A second call while that run is active
   * fails, so only one runner ever owns the job.
   */
  beginRetry(jobId: string): RetryClaim {
    const job = this.find(jobId);

    if (!RETRYABLE_STATUSES.includes(job.status)) {
      throw ErrorFactory.invalidState(`Job ${jobId} is ${job.status} and cannot be retried`, {
        jobId,
        status: job.status,
      });
    }

    if (job.failedPages.length === 0) {
      throw ErrorFactory.invalidState(`Job ${jobId} has no failed pages to retry`, { jobId });
    }

    const pages = [...job.failedPages];
    const next: JobRecord = {
      ...job,
      status: JobStatus.RUNNING,
      phase: JobPhase.RETRYING,
      progress: 0,
      message: `Retrying ${pages.length} failed page(s)`,
      retryTotal: pages.length,
      retryDone: 0,
      failedPages: [],
      cancelRequested: false,
      updatedAt: new Date(),
    };
    this.jobs.set(jobId, next);
    return { job: cloneJob(next), pages };
  }

  /**
   * Jobs matching the filter, newest first
   */
  list(filter: JobFilter = {}): JobRecord[] {
    const matching = [...this.jobs.values()]
      .filter((job) => filter.status === undefined || job.status === filter.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const limited = filter.limit !== undefined ? matching.slice(0, filter.limit) : matching;
    return limited.map(cloneJob);
  }

  stats(): QueueStats {
    const stats: QueueStats = {
      [JobStatus.QUEUED]: 0,
      [JobStatus.RUNNING]: 0,
      [JobStatus.COMPLETED]: 0,
      [JobStatus.COMPLETED_WITH_ERRORS]: 0,
      [JobStatus.FAILED]: 0,
      [JobStatus.CANCELED]: 0,
    };
    for (const job of this.jobs.values()) {
      stats[job.status] += 1;
    }
    return stats;
  }

  /**
   * Number of jobs that have not reached a terminal status
   */
  activeCount(): number {
    let active = 0;
    for (const job of this.jobs.values()) {
      if (!isTerminal(job.status)) {
        active += 1;
      }
    }
    return active;
  }

  private find(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw ErrorFactory.jobNotFound(jobId);
    }
    return job;
  }
}
