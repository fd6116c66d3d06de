// packages/core/src/jobs/job-status.ts — The JES status order

import type { JobStatus } from '../types/jobs.js';

/**
 * Natural lifecycle order of a job. A job never moves backwards through
 * this list, so a later index means an earlier status can no longer be seen.
 */
export const JOB_STATUS_ORDER: readonly JobStatus[] = ['INPUT', 'ACTIVE', 'OUTPUT'];

export const DEFAULT_JOB_STATUS: JobStatus = 'OUTPUT';

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUS_ORDER.some((s) => s === value);
}

/** Position of `status` in JOB_STATUS_ORDER, or -1 when unknown. */
export function statusOrderIndex(status: string): number {
  return JOB_STATUS_ORDER.findIndex((s) => s === status);
}

/** Statuses in which the job is queued or finished rather than executing. */
export function isRunningStatus(status: string): boolean {
  return status !== 'INPUT' && status !== 'OUTPUT';
}
