// packages/core/src/jobs/job-monitor.ts — Poll a job until it reaches a status or prints a message

import { z } from 'zod';
import { CancellationError, type CancellationToken } from '../engine/cancellation.js';
import type { EventBus } from '../engine/event-bus.js';
import type { WaitKind } from '../types/events.js';
import type {
  CheckResult,
  Job,
  JobQueryFacade,
  MonitorDefaults,
  MonitorParams,
  QueryOptions,
  ResolvedMonitorParams,
  StatusWaitResult,
  StepDataOutcome,
  WaitOptions,
} from '../types/jobs.js';
import { DEFAULT_LINE_LIMIT, DEFAULT_MONITOR_ATTEMPTS, DEFAULT_POLL_INTERVAL_MS } from '../utils/constants.js';
import { JobStatusError, MonitorTimeoutError, NotFoundError, ValidationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { requireNonEmpty } from '../utils/validate.js';
import { DEFAULT_JOB_STATUS, JOB_STATUS_ORDER, isJobStatus, isRunningStatus, statusOrderIndex } from './job-status.js';

export const MONITOR_DEFAULTS: MonitorDefaults = {
  attempts: DEFAULT_MONITOR_ATTEMPTS,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  lineLimit: DEFAULT_LINE_LIMIT,
};

const INVALID_STATUS_MSG = 'Invalid status when checking for status ordering.';

const notBlank = (field: string) => z.string().regex(/\S/, `${field} not specified`);

const monitorParamsSchema = z.object({
  jobName: notBlank('job name'),
  jobId: notBlank('job id'),
  status: z.string().optional(),
  message: z.string().optional(),
  attempts: z.number().int().min(1, 'attempts must be at least 1'),
  pollIntervalMs: z.number().int().min(0, 'pollIntervalMs must not be negative'),
  lineLimit: z.number().int().min(1, 'lineLimit must be at least 1'),
});

export interface JobMonitorOptions {
  defaults?: Partial<MonitorDefaults>;
  logger?: Logger;
  eventBus?: EventBus;
}

/** Spool text as records, without the empty ones a trailing newline leaves. */
export function splitLines(output: string): string[] {
  const lines = output.split('\n');
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * True when `message` occurs in one of the last `lineLimit` lines.
 * Output shorter than the limit is scanned in full.
 */
export function findInTail(lines: readonly string[], message: string, lineLimit: number, logger?: Logger): boolean {
  const start = lines.length < lineLimit ? 0 : lines.length - lineLimit;
  for (let i = start; i < lines.length; i++) {
    logger?.debug(lines[i]);
    if (lines[i].includes(message)) {
      return true;
    }
  }
  return false;
}

/**
 * Waits for a job to enter a status, or for a message to show up in its
 * output, by polling the jobs REST API on a fixed interval.
 *
 * The natural status order is INPUT, ACTIVE, OUTPUT. Asking for a status the
 * job has already moved past returns straight away with the job's current
 * status, since it will never enter the requested one.
 *
 * Running out of attempts is an error for status waits (MonitorTimeoutError)
 * but a plain `false` for message waits: a message that never appears is an
 * expected outcome.
 */
export class JobMonitor {
  private readonly defaults: MonitorDefaults;
  private readonly logger: Logger;
  private readonly eventBus?: EventBus;

  constructor(
    private readonly jobs: JobQueryFacade,
    options?: JobMonitorOptions,
  ) {
    this.defaults = { ...MONITOR_DEFAULTS, ...options?.defaults };
    this.logger = options?.logger ?? silentLogger;
    this.eventBus = options?.eventBus;
  }

  // ── status waits ──

  async waitForStatus(
    jobName: string,
    jobId: string,
    status: string = DEFAULT_JOB_STATUS,
    options?: WaitOptions,
  ): Promise<StatusWaitResult> {
    return this.waitForStatusCommon({ ...options, jobName, jobId, status });
  }

  async waitForJobStatus(job: Job, status: string = DEFAULT_JOB_STATUS, options?: WaitOptions): Promise<StatusWaitResult> {
    return this.waitForStatusCommon({ ...options, jobName: job.jobName, jobId: job.jobId, status });
  }

  async waitForOutputStatus(jobName: string, jobId: string, options?: WaitOptions): Promise<StatusWaitResult> {
    return this.waitForStatus(jobName, jobId, 'OUTPUT', options);
  }

  async waitForJobOutputStatus(job: Job, options?: WaitOptions): Promise<StatusWaitResult> {
    return this.waitForJobStatus(job, 'OUTPUT', options);
  }

  async waitForStatusCommon(params: MonitorParams): Promise<StatusWaitResult> {
    const resolved = this.resolveParams(params, 'status');
    const { jobName, jobId, status, attempts, pollIntervalMs, cancellation } = resolved;

    this.logger.info(`Waiting for status "${status}"`);
    this.emit({ type: 'monitor.started', kind: 'status', jobName, jobId, target: status, maxAttempts: attempts, timestamp: '' });

    for (let attempt = 1; attempt <= attempts; attempt++) {
      cancellation?.throwIfCancelled();
      const check = await this.checkStatus(resolved);
      this.emit({
        type: 'monitor.poll',
        kind: 'status',
        jobName,
        jobId,
        attempt,
        maxAttempts: attempts,
        status: check.job.status,
        found: check.found,
        timestamp: '',
      });

      if (check.found) {
        const stepData = await this.fetchStepData(resolved);
        const job = stepData.kind === 'attached' ? { ...check.job, stepData: stepData.steps } : check.job;
        this.emit({
          type: 'monitor.completed',
          kind: 'status',
          jobName,
          jobId,
          attempts: attempt,
          found: true,
          status: job.status,
          timestamp: '',
        });
        return { job, attempts: attempt, stepData };
      }

      if (attempt < attempts) {
        await this.pause(pollIntervalMs, cancellation);
        this.logger.info(`Waiting for status "${status}"`);
      }
    }

    this.emit({ type: 'monitor.exhausted', kind: 'status', jobName, jobId, attempts, timestamp: '' });
    throw new MonitorTimeoutError(
      `Desired status "${status}" not seen for ${jobName}(${jobId}). The number of maximum attempts (${attempts}) reached.`,
      attempts,
    );
  }

  // ── message waits ──

  async waitForMessage(jobName: string, jobId: string, message: string, options?: WaitOptions): Promise<boolean> {
    return this.waitForMessageCommon({ ...options, jobName, jobId, message });
  }

  async waitForJobMessage(job: Job, message: string, options?: WaitOptions): Promise<boolean> {
    return this.waitForMessageCommon({ ...options, jobName: job.jobName, jobId: job.jobId, message });
  }

  async waitForMessageCommon(params: MonitorParams): Promise<boolean> {
    const resolved = this.resolveParams(params, 'message');
    const { jobName, jobId, attempts, pollIntervalMs, cancellation } = resolved;
    const message = resolved.message ?? '';

    this.logger.info(`Waiting for message "${message}"`);
    this.emit({ type: 'monitor.started', kind: 'message', jobName, jobId, target: message, maxAttempts: attempts, timestamp: '' });

    for (let attempt = 1; attempt <= attempts; attempt++) {
      cancellation?.throwIfCancelled();
      const found = await this.checkMessage(resolved, message);
      this.emit({ type: 'monitor.poll', kind: 'message', jobName, jobId, attempt, maxAttempts: attempts, found, timestamp: '' });

      if (found) {
        this.emit({ type: 'monitor.completed', kind: 'message', jobName, jobId, attempts: attempt, found: true, timestamp: '' });
        return true;
      }

      if (attempt < attempts) {
        await this.pause(pollIntervalMs, cancellation);
        if (!(await this.isRunning(jobName, jobId, { signal: cancellation?.signal }))) {
          this.logger.info(`${jobName}(${jobId}) is not running, message "${message}" was not found`);
          this.emit({ type: 'monitor.completed', kind: 'message', jobName, jobId, attempts: attempt, found: false, timestamp: '' });
          return false;
        }
        this.logger.info(`Waiting for message "${message}"`);
      }
    }

    this.emit({ type: 'monitor.exhausted', kind: 'message', jobName, jobId, attempts, timestamp: '' });
    return false;
  }

  // ── running state ──

  /** True while the job is neither queued for input nor finished on output. */
  async isRunning(jobName: string, jobId: string, options?: QueryOptions): Promise<boolean> {
    requireNonEmpty(jobName, 'job name');
    requireNonEmpty(jobId, 'job id');
    const status = await this.jobs.getStatus(jobName, jobId, options);
    return isRunningStatus(status);
  }

  async isJobRunning(job: Job, options?: QueryOptions): Promise<boolean> {
    return this.isRunning(job.jobName, job.jobId, options);
  }

  // ── internals ──

  /** Validate and back-fill defaults once, before any network call. */
  resolveParams(params: MonitorParams, kind: WaitKind): ResolvedMonitorParams {
    const parsed = monitorParamsSchema.safeParse({
      jobName: params.jobName,
      jobId: params.jobId,
      status: params.status,
      message: params.message,
      attempts: params.attempts ?? this.defaults.attempts,
      pollIntervalMs: params.pollIntervalMs ?? this.defaults.pollIntervalMs,
      lineLimit: params.lineLimit ?? this.defaults.lineLimit,
    });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue.message, issue.path.join('.'));
    }
    const values = parsed.data;

    if (kind === 'status' && values.message !== undefined) {
      throw new ValidationError('message cannot be combined with a status wait', 'message');
    }
    if (kind === 'message') {
      if (values.status !== undefined) {
        throw new ValidationError('status cannot be combined with a message wait', 'status');
      }
      if (!values.message) {
        throw new ValidationError('message not specified', 'message');
      }
    }

    const status = values.status ?? DEFAULT_JOB_STATUS;
    if (!isJobStatus(status)) {
      throw new ValidationError(
        `unsupported job status "${status}", expected one of ${JOB_STATUS_ORDER.join(', ')}`,
        'status',
      );
    }

    return { ...values, status, cancellation: params.cancellation };
  }

  private async checkStatus(params: ResolvedMonitorParams): Promise<CheckResult> {
    const job = await this.jobs.getJob(params.jobName, params.jobId, { signal: params.cancellation?.signal });
    const current = job.status;

    // no status on the document reads as OUTPUT
    if ((current ?? DEFAULT_JOB_STATUS) === params.status) {
      return { found: true, job };
    }

    const desiredIndex = statusOrderIndex(params.status);
    if (desiredIndex === -1) {
      throw new JobStatusError(INVALID_STATUS_MSG, params.status);
    }
    if (current === undefined) {
      throw new JobStatusError(`job status not specified for ${params.jobName}(${params.jobId})`);
    }
    const currentIndex = statusOrderIndex(current);
    if (currentIndex === -1) {
      throw new JobStatusError(INVALID_STATUS_MSG, current);
    }

    return { found: currentIndex > desiredIndex, job };
  }

  private async checkMessage(params: ResolvedMonitorParams, message: string): Promise<boolean> {
    const signal = params.cancellation?.signal;
    const [job] = await this.jobs.getJobsFiltered(params.jobId, params.jobName, { signal });
    if (!job) {
      throw new NotFoundError(`job ${params.jobName}(${params.jobId}) does not exist`, params.jobName, params.jobId);
    }

    const [file] = await this.jobs.getSpoolFiles(job, { signal });
    if (!file) {
      this.logger.debug(`${job.jobName}(${job.jobId}) has no spool files yet`);
      return false;
    }

    const output = await this.jobs.getSpoolContent(file, { signal });
    return findInTail(splitLines(output), message, params.lineLimit, this.logger);
  }

  /** Step detail is best-effort: a failure is reported, never thrown. */
  private async fetchStepData(params: ResolvedMonitorParams): Promise<StepDataOutcome> {
    try {
      const job = await this.jobs.getJob(params.jobName, params.jobId, {
        stepData: true,
        signal: params.cancellation?.signal,
      });
      return { kind: 'attached', steps: job.stepData ?? [] };
    } catch (error) {
      if (error instanceof CancellationError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Step data unavailable for ${params.jobName}(${params.jobId}): ${reason}`);
      return { kind: 'unavailable', reason };
    }
  }

  private async pause(ms: number, cancellation?: CancellationToken): Promise<void> {
    if (!cancellation) {
      await sleep(ms);
      return;
    }
    const completed = await cancellation.sleep(ms);
    if (!completed) {
      cancellation.throwIfCancelled();
    }
  }

  private emit(event: Parameters<EventBus['emitEvent']>[0]): void {
    this.eventBus?.emitEvent(event);
  }
}
