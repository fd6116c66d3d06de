// packages/core/src/jobs/job-submit.ts — Submit JCL text or a JCL data set

import type { Job, QueryOptions, SubmitDatasetOptions, SubmitJclOptions } from '../types/jobs.js';
import { DEFAULT_INTRDR_LRECL, DEFAULT_INTRDR_RECFM } from '../utils/constants.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { requireIntInRange, requireNonEmpty } from '../utils/validate.js';
import type { ZosmfRestClient } from '../rest/zosmf-rest-client.js';
import {
  INTRDR_LRECL_HEADER,
  INTRDR_RECFM_HEADER,
  ZosmfHeaders,
  headerOf,
  jclSymbolHeaders,
} from '../rest/headers.js';
import { JOBS_RESOURCE } from './constants.js';
import { jobSchema } from './schemas.js';

/** `HLQ.JCL(MEMBER)` or `'HLQ.JCL(MEMBER)'` to the `//'HLQ.JCL(MEMBER)'` form z/OSMF expects. */
export function toDatasetReference(dataset: string): string {
  const bare = requireNonEmpty(dataset, 'dataset').trim().replace(/^'|'$/g, '');
  return `//'${bare}'`;
}

export class JobSubmit {
  constructor(
    private readonly client: ZosmfRestClient,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Submit in-stream JCL through the internal reader. */
  async submitJcl(jcl: string, options?: SubmitJclOptions & QueryOptions): Promise<Job> {
    requireNonEmpty(jcl, 'jcl');
    const lrecl = requireIntInRange(options?.internalReaderLrecl ?? DEFAULT_INTRDR_LRECL, 'internalReaderLrecl', 1, 32760);
    const headers = {
      ...headerOf(ZosmfHeaders.INTRDR_CLASS_A),
      ...headerOf(ZosmfHeaders.INTRDR_MODE_TEXT),
      [INTRDR_RECFM_HEADER]: options?.internalReaderRecfm ?? DEFAULT_INTRDR_RECFM,
      [INTRDR_LRECL_HEADER]: String(lrecl),
      ...jclSymbolHeaders(options?.jclSymbols),
    };
    const job = await this.client.putText(JOBS_RESOURCE, jcl, jobSchema, { headers, signal: options?.signal });
    this.logger.info(`Submitted ${job.jobName}(${job.jobId})`);
    return job;
  }

  /** Submit the JCL held in a data set or PDS member. */
  async submitDataset(dataset: string, options?: SubmitDatasetOptions & QueryOptions): Promise<Job> {
    const file = toDatasetReference(dataset);
    const job = await this.client.putJson(JOBS_RESOURCE, { file }, jobSchema, {
      headers: jclSymbolHeaders(options?.jclSymbols),
      signal: options?.signal,
    });
    this.logger.info(`Submitted ${job.jobName}(${job.jobId}) from ${file}`);
    return job;
  }
}
