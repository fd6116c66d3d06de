// packages/core/src/config/profiles.ts — Turn a configured profile into a connection

import type { ClientConfig, ProfileConfig } from '../types/config.js';
import type { ZosConnection } from '../types/connection.js';
import { DEFAULT_ZOSMF_PORT } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

export const ENV_HOST = 'ZOSMF_HOST';
export const ENV_PORT = 'ZOSMF_PORT';
export const ENV_USER = 'ZOSMF_USER';
export const ENV_PASSWORD = 'ZOSMF_PASSWORD';

type Env = Record<string, string | undefined>;

/**
 * Pick a profile: the one named, else `defaults.profile`, else the only one.
 */
export function selectProfile(config: ClientConfig, name?: string): { name: string; profile: ProfileConfig } | undefined {
  const names = Object.keys(config.profiles);
  const chosen = name ?? config.defaults.profile ?? (names.length === 1 ? names[0] : undefined);
  if (chosen === undefined) {
    return undefined;
  }
  const profile = config.profiles[chosen];
  if (!profile) {
    throw new ConfigError(`Profile "${chosen}" not found. Available: ${names.join(', ') || '(none)'}`, 'profiles');
  }
  return { name: chosen, profile };
}

/** Digits only; anything else is NaN and fails the range check. */
function parsePort(value: string): number {
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

/**
 * Build a ZosConnection from config and environment. Environment values
 * override the profile, so a password need never live in the config file.
 */
export function resolveConnection(config: ClientConfig, profileName?: string, env: Env = process.env): ZosConnection {
  const selected = selectProfile(config, profileName);
  if (!selected && !env[ENV_HOST]) {
    throw new ConfigError(`No profile configured and ${ENV_HOST} is not set`, 'profiles');
  }
  const profile = selected?.profile;
  const label = selected ? `profile "${selected.name}"` : 'environment';

  const host = env[ENV_HOST] || profile?.host;
  const user = env[ENV_USER] || profile?.user;
  const password = env[ENV_PASSWORD] || profile?.password;
  const envPort = env[ENV_PORT];
  const port = envPort ? parsePort(envPort) : (profile?.port ?? DEFAULT_ZOSMF_PORT);

  if (!host) throw new ConfigError(`No host for ${label}`, 'host');
  if (!user) throw new ConfigError(`No user for ${label}; set it in the profile or ${ENV_USER}`, 'user');
  if (!password) throw new ConfigError(`No password for ${label}; set ${ENV_PASSWORD}`, 'password');
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port for ${label}: ${envPort ?? port}`, 'port');
  }

  return {
    host,
    port,
    user,
    password,
    basePath: profile?.basePath,
    rejectUnauthorized: profile?.rejectUnauthorized ?? true,
  };
}
