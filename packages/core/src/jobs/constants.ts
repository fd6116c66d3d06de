// packages/core/src/jobs/constants.ts — z/OSMF jobs REST resource paths

export const JOBS_RESOURCE = '/zosmf/restjobs/jobs';

export const FILES_SEGMENT = 'files';
export const RECORDS_SEGMENT = 'records';
export const JCL_FILE_ID = 'JCL';

export const QUERY_OWNER = 'owner';
export const QUERY_PREFIX = 'prefix';
export const QUERY_JOBID = 'jobid';
export const QUERY_MAX_JOBS = 'max-jobs';
export const QUERY_STEP_DATA = 'step-data';

/** Wildcard accepted by z/OSMF for owner and prefix filters. */
export const WILDCARD = '*';
