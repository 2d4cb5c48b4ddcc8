import { JobStore } from '../repositories/JobStore';

/**
 * Polled at page boundaries; nothing in flight is interrupted.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}

/**
 * Token backed by the job's cancelRequested flag in the store
 */
export class JobCancellationToken implements CancellationToken {
  constructor(
    private readonly store: JobStore,
    private readonly jobId: string
  ) {}

  get isCancellationRequested(): boolean {
    return this.store.isCancelRequested(this.jobId);
  }
}
