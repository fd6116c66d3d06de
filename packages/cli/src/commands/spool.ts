// packages/cli/src/commands/spool.ts — zosjobs spool / zosjobs jcl

import type { JobFile } from '@zos-client/core';
import type { Command } from 'commander';

import { exitWithError, globalsOf, printJson, withClient } from '../utils.js';

interface SpoolOptions {
  ddname?: string;
  all?: boolean;
}

/** Pick a spool file by DD name, case-insensitively. */
export function findSpoolFile(files: JobFile[], ddName: string): JobFile {
  const wanted = ddName.toUpperCase();
  const file = files.find((f) => f.ddName.toUpperCase() === wanted);
  if (!file) {
    const available = files.map((f) => f.ddName).join(', ') || '(none)';
    throw new Error(`No spool file with DD name ${wanted}. Available: ${available}`);
  }
  return file;
}

export async function spoolCommand(
  jobName: string,
  jobId: string,
  options: SpoolOptions,
  command: Command,
): Promise<void> {
  try {
    await withClient(globalsOf(command), async (client) => {
      const job = { jobName, jobId };
      if (options.all) {
        process.stdout.write(`${await client.jobs.getSpoolContentAll(job)}\n`);
        return;
      }

      const files = await client.jobs.getSpoolFiles(job);
      if (!options.ddname) {
        printJson(
          files.map((f) => ({
            id: f.id,
            ddName: f.ddName,
            stepName: f.stepName ?? null,
            procStep: f.procStep ?? null,
            recordCount: f.recordCount ?? null,
          })),
        );
        return;
      }

      const content = await client.jobs.getSpoolContent(findSpoolFile(files, options.ddname));
      process.stdout.write(content.endsWith('\n') ? content : `${content}\n`);
    });
  } catch (error) {
    exitWithError(error);
  }
}

export async function jclCommand(jobName: string, jobId: string, _options: unknown, command: Command): Promise<void> {
  try {
    const jcl = await withClient(globalsOf(command), (client) => client.jobs.getJcl({ jobName, jobId }));
    process.stdout.write(jcl.endsWith('\n') ? jcl : `${jcl}\n`);
  } catch (error) {
    exitWithError(error);
  }
}
