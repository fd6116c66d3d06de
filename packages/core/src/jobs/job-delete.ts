// packages/core/src/jobs/job-delete.ts — Purge a job and its spool output

import type { Job, ModifyVersion, QueryOptions } from '../types/jobs.js';
import { ValidationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { requireNonEmpty } from '../utils/validate.js';
import type { ZosmfRestClient } from '../rest/zosmf-rest-client.js';
import { ZosmfHeaders, headerOf } from '../rest/headers.js';
import { jobPath } from './job-get.js';
import { modifyResponseSchema, type ModifyResponse } from './schemas.js';

export const DEFAULT_DELETE_VERSION: ModifyVersion = '2.0';

export interface DeleteResult {
  statusCode: number;
  /** Present for synchronous (2.0) deletes that returned a body. */
  feedback?: ModifyResponse;
}

export class JobDelete {
  constructor(
    private readonly client: ZosmfRestClient,
    private readonly logger: Logger = silentLogger,
  ) {}

  async delete(
    jobName: string,
    jobId: string,
    version: string = DEFAULT_DELETE_VERSION,
    options?: QueryOptions,
  ): Promise<DeleteResult> {
    requireNonEmpty(jobName, 'job name');
    requireNonEmpty(jobId, 'job id');

    let versionHeader: Record<string, string>;
    if (version === '1.0') {
      this.logger.debug('version 1.0 specified, request will be processed asynchronously');
      versionHeader = headerOf(ZosmfHeaders.JOB_MODIFY_VERSION_1);
    } else if (version === '2.0') {
      this.logger.debug('version 2.0 specified, request will be processed synchronously');
      versionHeader = headerOf(ZosmfHeaders.JOB_MODIFY_VERSION_2);
    } else {
      throw new ValidationError(`invalid version specified: ${version}`, 'version');
    }

    const response = await this.client.deleteJson(jobPath(jobName, jobId), {
      headers: versionHeader,
      signal: options?.signal,
    });

    if (!response.body.trim()) {
      return { statusCode: response.statusCode };
    }
    // Feedback is informational; a body we cannot read does not undo the delete.
    const parsed = safeParseFeedback(response.body);
    if (!parsed.ok) {
      this.logger.warn(`Delete of ${jobName}(${jobId}) returned unreadable feedback: ${parsed.reason}`);
      return { statusCode: response.statusCode };
    }
    return { statusCode: response.statusCode, feedback: parsed.value };
  }

  async deleteJob(job: Job, version: string = DEFAULT_DELETE_VERSION, options?: QueryOptions): Promise<DeleteResult> {
    return this.delete(job.jobName, job.jobId, version, options);
  }
}

function safeParseFeedback(body: string): { ok: true; value: ModifyResponse } | { ok: false; reason: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  const result = modifyResponseSchema.safeParse(raw);
  return result.success ? { ok: true, value: result.data } : { ok: false, reason: result.error.message };
}
