// packages/cli/src/commands/wait.ts — zosjobs wait / zosjobs wait-message

import { CancellationToken } from '@zos-client/core';
import type { WaitOptions, ZosClient } from '@zos-client/core';
import type { Command } from 'commander';

import { attachMonitorSpinner } from '../render.js';
import { cancelOnInterrupt, exitWithError, globalsOf, printJson, withClient } from '../utils.js';

interface PollOptions {
  attempts?: number;
  interval?: number;
  lineLimit?: number;
}

interface WaitStatusOptions extends PollOptions {
  status: string;
}

function toWaitOptions(options: PollOptions, cancellation: CancellationToken): WaitOptions {
  return {
    attempts: options.attempts,
    pollIntervalMs: options.interval,
    lineLimit: options.lineLimit,
    cancellation,
  };
}

/** Run one monitor call with a spinner and Ctrl-C cancellation attached. */
async function monitored<T>(
  client: ZosClient,
  options: PollOptions,
  run: (waitOptions: WaitOptions) => Promise<T>,
): Promise<T> {
  const token = new CancellationToken();
  const release = cancelOnInterrupt(token);
  const detach = attachMonitorSpinner(client.events);
  try {
    return await run(toWaitOptions(options, token));
  } finally {
    detach();
    release();
  }
}

export async function waitCommand(
  jobName: string,
  jobId: string,
  options: WaitStatusOptions,
  command: Command,
): Promise<void> {
  try {
    const result = await withClient(globalsOf(command), (client) =>
      monitored(client, options, (waitOptions) =>
        client.monitor.waitForStatus(jobName, jobId, options.status, waitOptions),
      ),
    );
    printJson(result);
  } catch (error) {
    exitWithError(error);
  }
}

export async function waitMessageCommand(
  jobName: string,
  jobId: string,
  message: string,
  options: PollOptions,
  command: Command,
): Promise<void> {
  try {
    const found = await withClient(globalsOf(command), (client) =>
      monitored(client, options, (waitOptions) => client.monitor.waitForMessage(jobName, jobId, message, waitOptions)),
    );
    printJson({ jobName, jobId, message, found });
    if (!found) {
      process.exitCode = 1;
    }
  } catch (error) {
    exitWithError(error);
  }
}
