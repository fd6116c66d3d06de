// packages/core/src/config/defaults.ts

import type { ClientConfig } from '../types/config.js';
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_LINE_LIMIT,
  DEFAULT_MONITOR_ATTEMPTS,
  DEFAULT_POLL_INTERVAL_MS,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: ClientConfig = {
  profiles: {},
  defaults: {},
  monitor: {
    attempts: DEFAULT_MONITOR_ATTEMPTS,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    lineLimit: DEFAULT_LINE_LIMIT,
  },
  http: {
    timeoutMs: DEFAULT_HTTP_TIMEOUT_MS,
  },
  logLevel: 'warn',
};
