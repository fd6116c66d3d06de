// packages/core/src/types/jobs.ts — z/OS batch job model and monitor parameters

import type { CancellationToken } from '../engine/cancellation.js';

/** JES lifecycle phases, in the order a job passes through them. */
export type JobStatus = 'INPUT' | 'ACTIVE' | 'OUTPUT';

export interface JobStep {
  stepNumber: number;
  stepName: string;
  procStepName?: string;
  programName?: string;
  active: boolean;
  completion?: string;
  smfid?: string;
}

export interface Job {
  jobName: string;
  jobId: string;
  status?: string;
  owner?: string;
  type?: string;
  jobClass?: string;
  retCode?: string | null;
  subsystem?: string;
  phase?: number;
  phaseName?: string;
  url?: string;
  filesUrl?: string;
  jobCorrelator?: string;
  stepData?: JobStep[];
}

/** A spool file handle as listed under a job's `files` resource. */
export interface JobFile {
  jobName: string;
  jobId: string;
  id: number;
  ddName: string;
  stepName?: string;
  procStep?: string;
  fileClass?: string;
  byteCount?: number;
  recordCount?: number;
  recfm?: string;
  lrecl?: number;
  recordsUrl?: string;
}

export interface GetJobsFilter {
  owner?: string;
  prefix?: string;
  jobId?: string;
  maxJobs?: number;
}

export interface SubmitJclOptions {
  jclSymbols?: Record<string, string>;
  internalReaderRecfm?: 'F' | 'V';
  internalReaderLrecl?: number;
}

export interface SubmitDatasetOptions {
  jclSymbols?: Record<string, string>;
}

/** `1.0` asks JES for asynchronous processing, `2.0` for synchronous. */
export type ModifyVersion = '1.0' | '2.0';

export interface QueryOptions {
  signal?: AbortSignal;
}

export interface GetJobOptions extends QueryOptions {
  stepData?: boolean;
}

/**
 * Everything the monitor needs from the jobs REST API.
 * `JobGet` is the production implementation; tests supply stubs.
 */
export interface JobQueryFacade {
  getStatus(jobName: string, jobId: string, options?: QueryOptions): Promise<string>;
  getJob(jobName: string, jobId: string, options?: GetJobOptions): Promise<Job>;
  getJobsFiltered(jobId: string, jobName: string, options?: QueryOptions): Promise<Job[]>;
  getSpoolFiles(job: Job, options?: QueryOptions): Promise<JobFile[]>;
  getSpoolContent(file: JobFile, options?: QueryOptions): Promise<string>;
}

export interface MonitorDefaults {
  attempts: number;
  pollIntervalMs: number;
  lineLimit: number;
}

/** Polling options accepted by the per-call convenience methods. */
export interface WaitOptions extends Partial<MonitorDefaults> {
  cancellation?: CancellationToken;
}

export interface MonitorParams extends WaitOptions {
  jobName: string;
  jobId: string;
  status?: string;
  message?: string;
}

export interface ResolvedMonitorParams extends MonitorDefaults {
  readonly jobName: string;
  readonly jobId: string;
  readonly status: JobStatus;
  readonly message?: string;
  readonly cancellation?: CancellationToken;
}

export interface CheckResult {
  found: boolean;
  job: Job;
}

export type StepDataOutcome =
  | { kind: 'attached'; steps: JobStep[] }
  | { kind: 'unavailable'; reason: string };

export interface StatusWaitResult {
  job: Job;
  attempts: number;
  stepData: StepDataOutcome;
}
