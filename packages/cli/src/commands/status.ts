// packages/cli/src/commands/status.ts — zosjobs status

import type { Command } from 'commander';

import { exitWithError, globalsOf, printJson, withClient } from '../utils.js';

interface StatusOptions {
  steps?: boolean;
}

export async function statusCommand(
  jobName: string,
  jobId: string,
  options: StatusOptions,
  command: Command,
): Promise<void> {
  try {
    const job = await withClient(globalsOf(command), (client) =>
      client.jobs.getJob(jobName, jobId, { stepData: options.steps }),
    );
    printJson(job);
  } catch (error) {
    exitWithError(error);
  }
}
