// packages/core/src/jobs/job-get.ts — Read-side z/OSMF jobs API

import type {
  GetJobOptions,
  GetJobsFilter,
  Job,
  JobFile,
  JobQueryFacade,
  QueryOptions,
} from '../types/jobs.js';
import { DEFAULT_MAX_JOBS } from '../utils/constants.js';
import { encodePathSegment } from '../utils/encode.js';
import { JobStatusError } from '../utils/errors.js';
import { requireIntInRange, requireNonEmpty } from '../utils/validate.js';
import type { ZosmfRestClient } from '../rest/zosmf-rest-client.js';
import {
  FILES_SEGMENT,
  JCL_FILE_ID,
  JOBS_RESOURCE,
  QUERY_JOBID,
  QUERY_MAX_JOBS,
  QUERY_OWNER,
  QUERY_PREFIX,
  QUERY_STEP_DATA,
  RECORDS_SEGMENT,
  WILDCARD,
} from './constants.js';
import { jobFileListSchema, jobListSchema, jobSchema } from './schemas.js';

export function jobPath(jobName: string, jobId: string, ...rest: string[]): string {
  const segments = [jobName, jobId, ...rest].map(encodePathSegment);
  return `${JOBS_RESOURCE}/${segments.join('/')}`;
}

export class JobGet implements JobQueryFacade {
  constructor(private readonly client: ZosmfRestClient) {}

  /** List jobs. Owner and prefix default to `*`, the job cap to 1000. */
  async getJobs(filter?: GetJobsFilter, options?: QueryOptions): Promise<Job[]> {
    const maxJobs = requireIntInRange(filter?.maxJobs ?? DEFAULT_MAX_JOBS, 'maxJobs', 1);
    return this.client.getJson(JOBS_RESOURCE, jobListSchema, {
      query: {
        [QUERY_OWNER]: filter?.owner ?? WILDCARD,
        [QUERY_PREFIX]: filter?.prefix ?? WILDCARD,
        [QUERY_MAX_JOBS]: maxJobs,
        [QUERY_JOBID]: filter?.jobId,
      },
      signal: options?.signal,
    });
  }

  /** Jobs matching an exact job id and a job name prefix, for any owner. */
  async getJobsFiltered(jobId: string, jobName: string, options?: QueryOptions): Promise<Job[]> {
    return this.getJobs(
      { owner: WILDCARD, jobId: requireNonEmpty(jobId, 'job id'), prefix: requireNonEmpty(jobName, 'job name') },
      options,
    );
  }

  async getJob(jobName: string, jobId: string, options?: GetJobOptions): Promise<Job> {
    requireNonEmpty(jobName, 'job name');
    requireNonEmpty(jobId, 'job id');
    return this.client.getJson(jobPath(jobName, jobId), jobSchema, {
      query: options?.stepData ? { [QUERY_STEP_DATA]: 'Y' } : undefined,
      signal: options?.signal,
    });
  }

  async getJobByJob(job: Job, options?: GetJobOptions): Promise<Job> {
    return this.getJob(job.jobName, job.jobId, options);
  }

  /** Current status string of a job. */
  async getStatus(jobName: string, jobId: string, options?: QueryOptions): Promise<string> {
    const job = await this.getJob(jobName, jobId, options);
    if (!job.status) {
      throw new JobStatusError(`job ${jobName}(${jobId}) returned no status`);
    }
    return job.status;
  }

  async getSpoolFiles(job: Job, options?: QueryOptions): Promise<JobFile[]> {
    return this.client.getJson(jobPath(job.jobName, job.jobId, FILES_SEGMENT), jobFileListSchema, {
      signal: options?.signal,
    });
  }

  async getSpoolContent(file: JobFile, options?: QueryOptions): Promise<string> {
    return this.client.getText(jobPath(file.jobName, file.jobId, FILES_SEGMENT, String(file.id), RECORDS_SEGMENT), {
      signal: options?.signal,
    });
  }

  /** Concatenated content of every spool file, each prefixed with its DD name. */
  async getSpoolContentAll(job: Job, options?: QueryOptions): Promise<string> {
    const files = await this.getSpoolFiles(job, options);
    const parts: string[] = [];
    for (const file of files) {
      const content = await this.getSpoolContent(file, options);
      parts.push(`!! ${file.ddName} (${file.stepName ?? '-'}) !!\n${content}`);
    }
    return parts.join('\n');
  }

  async getJcl(job: Job, options?: QueryOptions): Promise<string> {
    return this.client.getText(jobPath(job.jobName, job.jobId, FILES_SEGMENT, JCL_FILE_ID, RECORDS_SEGMENT), {
      signal: options?.signal,
    });
  }
}
