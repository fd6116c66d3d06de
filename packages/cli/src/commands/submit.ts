// packages/cli/src/commands/submit.ts — zosjobs submit

import { readFileSync } from 'node:fs';

import { CancellationToken } from '@zos-client/core';
import type { Job, ZosClient } from '@zos-client/core';
import type { Command } from 'commander';

import { attachMonitorSpinner } from '../render.js';
import { cancelOnInterrupt, exitWithError, globalsOf, printJson, withClient } from '../utils.js';

interface SubmitOptions {
  dataset?: string;
  symbol: Record<string, string>;
  recfm: 'F' | 'V';
  lrecl: number;
  wait?: boolean;
}

export type JclSource = { kind: 'text'; jcl: string } | { kind: 'dataset'; dataset: string };

/** Exactly one of a local file and a data set name must be given. */
export function resolveJclSource(file: string | undefined, dataset: string | undefined): JclSource {
  if (file && dataset) {
    throw new Error('Give either a local JCL file or --dataset, not both');
  }
  if (file) {
    return { kind: 'text', jcl: readFileSync(file, 'utf-8') };
  }
  if (dataset) {
    return { kind: 'dataset', dataset };
  }
  throw new Error('Give a local JCL file or --dataset <name>');
}

async function submitSource(client: ZosClient, source: JclSource, options: SubmitOptions): Promise<Job> {
  if (source.kind === 'dataset') {
    return client.submit.submitDataset(source.dataset, { jclSymbols: options.symbol });
  }
  return client.submit.submitJcl(source.jcl, {
    jclSymbols: options.symbol,
    internalReaderRecfm: options.recfm,
    internalReaderLrecl: options.lrecl,
  });
}

export async function submitCommand(file: string | undefined, options: SubmitOptions, command: Command): Promise<void> {
  try {
    const source = resolveJclSource(file, options.dataset);

    const output = await withClient(globalsOf(command), async (client) => {
      const job = await submitSource(client, source, options);
      if (!options.wait) {
        return job;
      }

      const token = new CancellationToken();
      const release = cancelOnInterrupt(token);
      const detach = attachMonitorSpinner(client.events);
      try {
        const result = await client.monitor.waitForJobOutputStatus(job, { cancellation: token });
        return result.job;
      } finally {
        detach();
        release();
      }
    });

    printJson(output);
  } catch (error) {
    exitWithError(error);
  }
}
