// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface ProfileConfig {
  host: string;
  port: number;
  user?: string;
  password?: string;
  basePath?: string;
  rejectUnauthorized: boolean;
}

export interface MonitorConfig {
  attempts: number;
  pollIntervalMs: number;
  lineLimit: number;
}

export interface HttpConfig {
  timeoutMs: number;
}

export interface ClientConfig {
  profiles: Record<string, ProfileConfig>;
  defaults: {
    profile?: string;
  };
  monitor: MonitorConfig;
  http: HttpConfig;
  logLevel: LogLevel;
}
