// packages/core/src/client.ts — Wire a connection into ready-to-use job APIs

import { EventBus } from './engine/event-bus.js';
import { JobDelete } from './jobs/job-delete.js';
import { JobGet } from './jobs/job-get.js';
import { JobMonitor } from './jobs/job-monitor.js';
import { JobSubmit } from './jobs/job-submit.js';
import { FetchExecutor } from './rest/fetch-executor.js';
import { ZosmfRestClient } from './rest/zosmf-rest-client.js';
import type { ZosConnection } from './types/connection.js';
import type { MonitorDefaults } from './types/jobs.js';
import type { HttpExecutor } from './types/rest.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface ZosClientOptions {
  /** Replaces the default node-fetch transport, e.g. with an in-process stub. */
  executor?: HttpExecutor;
  timeoutMs?: number;
  monitorDefaults?: Partial<MonitorDefaults>;
  logger?: Logger;
  eventBus?: EventBus;
}

export interface ZosClient {
  rest: ZosmfRestClient;
  jobs: JobGet;
  submit: JobSubmit;
  delete: JobDelete;
  monitor: JobMonitor;
  events: EventBus;
  /** Release pooled connections held by the default transport. */
  close(): void;
}

export function createZosClient(connection: ZosConnection, options?: ZosClientOptions): ZosClient {
  const logger = options?.logger ?? silentLogger;
  const events = options?.eventBus ?? new EventBus();
  let owned: FetchExecutor | undefined;
  let executor: HttpExecutor;
  if (options?.executor) {
    executor = options.executor;
  } else {
    owned = new FetchExecutor({ timeoutMs: options?.timeoutMs, rejectUnauthorized: connection.rejectUnauthorized });
    executor = owned;
  }

  const rest = new ZosmfRestClient(connection, executor, logger);
  const jobs = new JobGet(rest);

  return {
    rest,
    jobs,
    submit: new JobSubmit(rest, logger),
    delete: new JobDelete(rest, logger),
    monitor: new JobMonitor(jobs, { defaults: options?.monitorDefaults, logger, eventBus: events }),
    events,
    close: () => owned?.close(),
  };
}
