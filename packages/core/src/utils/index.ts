// packages/core/src/utils/index.ts -- barrel re-export

export {
  ConfigError,
  ValidationError,
  ZosmfRemoteError,
  NotFoundError,
  JobStatusError,
  MonitorTimeoutError,
} from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logger.js';
export { sleep } from './sleep.js';
export { requireNonEmpty, requireIntInRange } from './validate.js';
export { encodePathSegment, basicAuthHeader } from './encode.js';
