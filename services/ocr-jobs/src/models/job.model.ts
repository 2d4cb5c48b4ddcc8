/**
 * OCR Jobs Data Models
 */

export enum JobStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  COMPLETED_WITH_ERRORS = 'completed_with_errors',
  FAILED = 'failed',
  CANCELED = 'canceled'
}

export enum JobPhase {
  QUEUED = 'queued',
  AUTHENTICATING = 'authenticating',
  CONVERTING = 'converting',
  RECOGNIZING = 'recognizing',
  RETRYING = 'retrying',
  COMPLETED = 'completed',
  COMPLETED_WITH_ERRORS = 'completed_with_errors',
  FAILED = 'failed',
  CANCELED = 'canceled'
}

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.COMPLETED_WITH_ERRORS,
  JobStatus.FAILED,
  JobStatus.CANCELED,
];

export const RETRYABLE_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED_WITH_ERRORS,
  JobStatus.FAILED,
  JobStatus.CANCELED,
];

export type Layout = 'horizontal' | 'vertical-rtl';

export type LayoutMode = Layout | 'auto';

export const LAYOUT_MODES: readonly LayoutMode[] = ['auto', 'horizontal', 'vertical-rtl'];

/**
 * One recognized text span on a page, in image pixel coordinates
 */
export interface Fragment {
  left: number;
  top: number;
  width: number;
  height: number;
  text: string;
  confidence?: number;                  // 0-1 scale
}

/**
 * One line of the result table
 */
export interface ResultRow {
  imageFile: string;
  pageNo: number;                       // 1-based
  lineNo: number;                       // 1-based, unique within a page
  layout: Layout;
  left: number;
  top: number;
  width: number;
  height: number;
  confidence: string;                   // '' when the recognizer gave none
  text: string;
}

export interface JobOptions {
  layout: LayoutMode;
  languageHint: string;
  resolution: number;                   // DPI
}

export interface JobRecord {
  id: string;                           // UUID
  status: JobStatus;
  phase: JobPhase;
  progress: number;                     // 0-100
  message: string;
  pagesTotal: number;
  convertDone: number;
  pagesDone: number;
  retryTotal: number;
  retryDone: number;
  rowsTotal: number;
  failedPages: number[];                // ascending, 1-based
  imagePaths: string[];
  resultLocation: string;               // '' until the first write
  outputName: string;
  options: JobOptions;
  cancelRequested: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Credentials for the recognition service
 */
export interface RecognizerCredentials {
  apiKey: string;
  secretKey: string;
}

// Control surface response types
export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  phase: JobPhase;
  progress: number;
  message: string;
  pagesTotal: number;
  convertDone: number;
  pagesDone: number;
  retryTotal: number;
  retryDone: number;
  rowsTotal: number;
  failedPagesCount: number;
  failedPages: number[];
  canCancel: boolean;
  canRetry: boolean;
  downloadAvailable: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Job counts per status
 */
export type QueueStats = Record<JobStatus, number>;

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canCancel(job: Pick<JobRecord, 'status'>): boolean {
  return job.status === JobStatus.QUEUED || job.status === JobStatus.RUNNING;
}

export function canRetry(job: Pick<JobRecord, 'status' | 'failedPages'>): boolean {
  return RETRYABLE_STATUSES.includes(job.status) && job.failedPages.length > 0;
}

export function isDownloadAvailable(job: Pick<JobRecord, 'status' | 'resultLocation'>): boolean {
  return isTerminal(job.status) && job.resultLocation !== '';
}

export function toStatusView(job: JobRecord): JobStatusView {
  return {
    jobId: job.id,
    status: job.status,
    phase: job.phase,
    progress: job.progress,
    message: job.message,
    pagesTotal: job.pagesTotal,
    convertDone: job.convertDone,
    pagesDone: job.pagesDone,
    retryTotal: job.retryTotal,
    retryDone: job.retryDone,
    rowsTotal: job.rowsTotal,
    failedPagesCount: job.failedPages.length,
    failedPages: [...job.failedPages],
    canCancel: canCancel(job),
    canRetry: canRetry(job),
    downloadAvailable: isDownloadAvailable(job),
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}
