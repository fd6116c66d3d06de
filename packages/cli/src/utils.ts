// packages/cli/src/utils.ts — Shared plumbing for zosjobs commands

import {
  CancellationError,
  JOB_STATUS_ORDER,
  createLogger,
  createZosClient,
  isJobStatus,
  loadConfig,
  resolveConnection,
} from '@zos-client/core';
import type { CancellationToken, ClientConfig, JobStatus, ZosClient } from '@zos-client/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

export interface GlobalOptions {
  profile?: string;
  config?: string;
  verbose?: boolean;
}

export function globalsOf(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a non-negative integer');
  return Number.parseInt(value, 10);
}

/** Job status in any case, e.g. `output`. */
export function parseJobStatus(value: string): JobStatus {
  const status = value.toUpperCase();
  if (!isJobStatus(status)) {
    throw new InvalidArgumentError(`Allowed choices are ${JOB_STATUS_ORDER.join(', ')}.`);
  }
  return status;
}

/** Accumulates repeated `--symbol NAME=value` options. */
export function collectSymbol(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) throw new InvalidArgumentError(`Expected NAME=value, got "${value}"`);
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

export function loadCliConfig(globals: GlobalOptions): ClientConfig {
  return loadConfig({ configFile: globals.config });
}

/**
 * Build a client from config, profile and environment, run `fn`, and
 * release the connection pool whatever happens.
 */
export async function withClient<T>(
  globals: GlobalOptions,
  fn: (client: ZosClient, config: ClientConfig) => Promise<T>,
): Promise<T> {
  const config = loadCliConfig(globals);
  const logger = createLogger(globals.verbose ? 'debug' : config.logLevel, { scope: 'zosjobs' });
  const connection = resolveConnection(config, globals.profile);
  const client = createZosClient(connection, {
    timeoutMs: config.http.timeoutMs,
    monitorDefaults: config.monitor,
    logger,
  });
  try {
    return await fn(client, config);
  } finally {
    client.close();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function exitWithError(error: unknown): never {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(error instanceof CancellationError ? 130 : 1);
}

/** Cancel `token` on Ctrl-C. Returns a function that removes the handler. */
export function cancelOnInterrupt(token: CancellationToken): () => void {
  const handler = () => {
    console.error(chalk.dim('\nInterrupted, stopping...'));
    token.cancel('Interrupted');
  };
  process.once('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
}
