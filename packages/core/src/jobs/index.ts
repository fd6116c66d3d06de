// packages/core/src/jobs/index.ts -- barrel re-export

export { JobGet, jobPath } from './job-get.js';
export { JobSubmit, toDatasetReference } from './job-submit.js';
export { JobDelete, DEFAULT_DELETE_VERSION } from './job-delete.js';
export type { DeleteResult } from './job-delete.js';
export { JobMonitor, MONITOR_DEFAULTS, findInTail, splitLines } from './job-monitor.js';
export type { JobMonitorOptions } from './job-monitor.js';
export {
  JOB_STATUS_ORDER,
  DEFAULT_JOB_STATUS,
  isJobStatus,
  isRunningStatus,
  statusOrderIndex,
} from './job-status.js';
export { jobSchema, jobListSchema, jobFileSchema, jobFileListSchema, jobStepSchema } from './schemas.js';
export type { ModifyResponse } from './schemas.js';
export { JOBS_RESOURCE } from './constants.js';
