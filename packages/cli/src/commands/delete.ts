// packages/cli/src/commands/delete.ts — zosjobs delete

import type { Command } from 'commander';

import { exitWithError, globalsOf, printJson, withClient } from '../utils.js';

interface DeleteOptions {
  modifyVersion: string;
}

export async function deleteCommand(
  jobName: string,
  jobId: string,
  options: DeleteOptions,
  command: Command,
): Promise<void> {
  try {
    const result = await withClient(globalsOf(command), (client) =>
      client.delete.delete(jobName, jobId, options.modifyVersion),
    );
    printJson({ jobName, jobId, statusCode: result.statusCode, feedback: result.feedback ?? null });
  } catch (error) {
    exitWithError(error);
  }
}
