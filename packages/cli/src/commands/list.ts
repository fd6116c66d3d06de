// packages/cli/src/commands/list.ts — zosjobs list

import type { Command } from 'commander';

import { exitWithError, globalsOf, printJson, withClient } from '../utils.js';

interface ListOptions {
  owner?: string;
  prefix?: string;
  jobId?: string;
  maxJobs: number;
}

export async function listCommand(options: ListOptions, command: Command): Promise<void> {
  try {
    const jobs = await withClient(globalsOf(command), (client) =>
      client.jobs.getJobs({
        owner: options.owner,
        prefix: options.prefix,
        jobId: options.jobId,
        maxJobs: options.maxJobs,
      }),
    );

    printJson(
      jobs.map((j) => ({
        jobName: j.jobName,
        jobId: j.jobId,
        owner: j.owner ?? null,
        status: j.status ?? null,
        retCode: j.retCode ?? null,
        jobClass: j.jobClass ?? null,
      })),
    );
  } catch (error) {
    exitWithError(error);
  }
}
