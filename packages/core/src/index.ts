// @zos-client/core - z/OSMF jobs REST client and job monitor

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Connection
  ZosConnection,
  // Jobs
  JobStatus,
  Job,
  JobStep,
  JobFile,
  GetJobsFilter,
  SubmitJclOptions,
  SubmitDatasetOptions,
  ModifyVersion,
  QueryOptions,
  GetJobOptions,
  JobQueryFacade,
  MonitorDefaults,
  WaitOptions,
  MonitorParams,
  ResolvedMonitorParams,
  CheckResult,
  StepDataOutcome,
  StatusWaitResult,
  // REST
  HttpMethod,
  ZosmfRequestType,
  HttpRequest,
  HttpResponse,
  HttpExecutor,
  // Events
  WaitKind,
  MonitorStartedEvent,
  MonitorPollEvent,
  MonitorCompletedEvent,
  MonitorExhaustedEvent,
  MonitorEvent,
  // Config
  ProfileConfig,
  MonitorConfig,
  HttpConfig,
  ClientConfig,
} from './types/index.js';

// Utilities
export {
  ConfigError,
  ValidationError,
  ZosmfRemoteError,
  NotFoundError,
  JobStatusError,
  MonitorTimeoutError,
  createLogger,
  silentLogger,
  sleep,
  requireNonEmpty,
  encodePathSegment,
  basicAuthHeader,
} from './utils/index.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './utils/index.js';
export {
  DEFAULT_MONITOR_ATTEMPTS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_LINE_LIMIT,
  DEFAULT_ZOSMF_PORT,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_JOBS,
} from './utils/constants.js';

// Engine
export { CancellationToken, CancellationError, EventBus } from './engine/index.js';

// REST
export { FetchExecutor, ZosmfRestClient, isHttpError, ZosmfHeaders, jclSymbolHeaders } from './rest/index.js';
export type { FetchExecutorOptions, ZosmfRequestOptions } from './rest/index.js';

// Jobs
export {
  JobGet,
  jobPath,
  JobSubmit,
  toDatasetReference,
  JobDelete,
  DEFAULT_DELETE_VERSION,
  JobMonitor,
  MONITOR_DEFAULTS,
  findInTail,
  splitLines,
  JOB_STATUS_ORDER,
  DEFAULT_JOB_STATUS,
  isJobStatus,
  isRunningStatus,
  statusOrderIndex,
  jobSchema,
  jobListSchema,
  jobFileSchema,
  jobFileListSchema,
  jobStepSchema,
  JOBS_RESOURCE,
} from './jobs/index.js';
export type { DeleteResult, JobMonitorOptions, ModifyResponse } from './jobs/index.js';

// Configuration
export {
  DEFAULT_CONFIG,
  clientConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  CONFIG_FILENAME,
  resolveConnection,
  selectProfile,
  ENV_HOST,
  ENV_PORT,
  ENV_USER,
  ENV_PASSWORD,
} from './config/index.js';
export type { ClientConfigInput } from './config/index.js';

// Client
export { createZosClient } from './client.js';
export type { ZosClient, ZosClientOptions } from './client.js';
