// packages/cli/src/commands/profiles.ts — zosjobs profiles list / add

import { DEFAULT_ZOSMF_PORT, loadConfig, validateConfig, writeConfig } from '@zos-client/core';
import type { ClientConfig, ProfileConfig } from '@zos-client/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { exitWithError, globalsOf, loadCliConfig, printJson } from '../utils.js';

export interface ProfileSummary {
  name: string;
  host: string;
  port: number;
  user: string | null;
  basePath: string | null;
  rejectUnauthorized: boolean;
  isDefault: boolean;
}

/** Profiles as printed by `profiles list`. Passwords never appear. */
export function summarizeProfiles(config: ClientConfig): ProfileSummary[] {
  return Object.entries(config.profiles).map(([name, p]) => ({
    name,
    host: p.host,
    port: p.port,
    user: p.user ?? null,
    basePath: p.basePath ?? null,
    rejectUnauthorized: p.rejectUnauthorized,
    isDefault: config.defaults.profile === name,
  }));
}

export async function profilesListCommand(_options: unknown, command: Command): Promise<void> {
  try {
    printJson(summarizeProfiles(loadCliConfig(globalsOf(command))));
  } catch (error) {
    exitWithError(error);
  }
}

interface AddOptions {
  host: string;
  port?: number;
  user?: string;
  basePath?: string;
  insecure?: boolean;
  default?: boolean;
}

/** Return a copy of `config` with profile `name` added or replaced. */
export function withProfile(config: ClientConfig, name: string, options: AddOptions): ClientConfig {
  const profile: ProfileConfig = {
    host: options.host,
    port: options.port ?? DEFAULT_ZOSMF_PORT,
    user: options.user,
    basePath: options.basePath,
    rejectUnauthorized: !options.insecure,
  };
  return validateConfig({
    ...config,
    profiles: { ...config.profiles, [name]: profile },
    defaults: options.default ? { ...config.defaults, profile: name } : config.defaults,
  });
}

export async function profilesAddCommand(name: string, options: AddOptions): Promise<void> {
  try {
    const cwd = process.cwd();
    const path = writeConfig(withProfile(loadConfig({ projectDir: cwd }), name, options), cwd);
    console.log(chalk.green(`Saved profile '${name}' to ${path}`));
    console.log(chalk.gray('Passwords are not stored; set ZOSMF_PASSWORD before running commands.'));
  } catch (error) {
    exitWithError(error);
  }
}
