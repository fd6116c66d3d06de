// packages/cli/src/program.ts — Command tree for zosjobs

import { Command, Option } from 'commander';

import { JOB_STATUS_ORDER, VERSION } from '@zos-client/core';

import { deleteCommand } from './commands/delete.js';
import { listCommand } from './commands/list.js';
import { profilesAddCommand, profilesListCommand } from './commands/profiles.js';
import { jclCommand, spoolCommand } from './commands/spool.js';
import { statusCommand } from './commands/status.js';
import { submitCommand } from './commands/submit.js';
import { waitCommand, waitMessageCommand } from './commands/wait.js';
import { collectSymbol, parseJobStatus, parseNonNegativeInt, parsePositiveInt } from './utils.js';

function addPollOptions(command: Command): Command {
  return command
    .option('--attempts <n>', 'Maximum number of polls (default from config)', parsePositiveInt)
    .option('--interval <ms>', 'Delay between polls in milliseconds (default from config)', parseNonNegativeInt);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('zosjobs')
    .description('List, submit, inspect and wait on z/OS batch jobs through z/OSMF')
    .version(VERSION)
    .option('--profile <name>', 'Connection profile from .zosjobs.yml')
    .option('--config <path>', 'Config file to use instead of ./.zosjobs.yml')
    .option('--verbose', 'Enable debug logging');

  // ── Queries ──

  program
    .command('list')
    .description('List jobs')
    .option('--owner <owner>', 'Owner filter (default: any)')
    .option('--prefix <prefix>', 'Job name prefix, * allowed (default: any)')
    .option('--job-id <id>', 'Exact job id')
    .option('--max-jobs <n>', 'Maximum jobs returned', parsePositiveInt, 1000)
    .action(listCommand);

  program
    .command('status')
    .description('Show a job')
    .argument('<job-name>', 'Job name')
    .argument('<job-id>', 'Job id, e.g. JOB01234')
    .option('--steps', 'Include step data')
    .action(statusCommand);

  program
    .command('spool')
    .description('List spool files, or print one with --ddname')
    .argument('<job-name>', 'Job name')
    .argument('<job-id>', 'Job id')
    .option('--ddname <dd>', 'Print the spool file with this DD name')
    .option('--all', 'Print every spool file')
    .action(spoolCommand);

  program
    .command('jcl')
    .description('Print the JCL a job was submitted with')
    .argument('<job-name>', 'Job name')
    .argument('<job-id>', 'Job id')
    .action(jclCommand);

  // ── Changes ──

  program
    .command('submit')
    .description('Submit JCL from a local file or a data set')
    .argument('[file]', 'Local JCL file')
    .option('--dataset <name>', "Data set or member holding the JCL, e.g. 'IBMUSER.JCL(PAYROLL)'")
    .option('--symbol <NAME=value>', 'JCL symbol substitution (repeatable)', collectSymbol, {})
    .addOption(new Option('--recfm <format>', 'Internal reader record format').choices(['F', 'V']).default('F'))
    .option('--lrecl <n>', 'Internal reader record length', parsePositiveInt, 80)
    .option('--wait', 'Wait for the job to reach OUTPUT')
    .action(submitCommand);

  program
    .command('delete')
    .description('Cancel and purge a job')
    .argument('<job-name>', 'Job name')
    .argument('<job-id>', 'Job id')
    .addOption(
      new Option('--modify-version <version>', '1.0 processes asynchronously, 2.0 synchronously')
        .choices(['1.0', '2.0'])
        .default('2.0'),
    )
    .action(deleteCommand);

  // ── Monitoring ──

  addPollOptions(
    program
      .command('wait')
      .description('Wait until a job reaches a status')
      .argument('<job-name>', 'Job name')
      .argument('<job-id>', 'Job id')
      .addOption(
        new Option('--status <status>', 'Status to wait for')
          .choices([...JOB_STATUS_ORDER])
          .argParser(parseJobStatus)
          .default('OUTPUT'),
      ),
  ).action(waitCommand);

  addPollOptions(
    program
      .command('wait-message')
      .description('Wait until a message appears in the first spool file of a job')
      .argument('<job-name>', 'Job name')
      .argument('<job-id>', 'Job id')
      .argument('<message>', 'Text to look for'),
  )
    .option('--line-limit <n>', 'Only scan the last n lines (default from config)', parsePositiveInt)
    .action(waitMessageCommand);

  // ── Profiles ──

  const profiles = program.command('profiles').description('Manage connection profiles');

  profiles.command('list').description('List configured profiles').action(profilesListCommand);

  profiles
    .command('add')
    .description('Add or replace a profile in ./.zosjobs.yml')
    .argument('<name>', 'Profile name')
    .requiredOption('--host <host>', 'z/OSMF host name')
    .option('--port <port>', 'z/OSMF port', parsePositiveInt)
    .option('--user <user>', 'User id')
    .option('--base-path <path>', 'Path prefix in front of /zosmf, for API gateways')
    .option('--insecure', 'Do not verify the server certificate')
    .option('--default', 'Make this the default profile')
    .action(profilesAddCommand);

  return program;
}
