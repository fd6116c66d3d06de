// packages/core/src/config/loader.ts

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ClientConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig, type ClientConfigInput } from './schema.js';

export const CONFIG_FILENAME = '.zosjobs.yml';

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/**
 * Load config with precedence: overrides > .zosjobs.yml > defaults.
 *
 * `configFile` points at an explicit file instead of `<projectDir>/.zosjobs.yml`;
 * an explicit file that does not exist is an error.
 */
export function loadConfig(options?: {
  projectDir?: string;
  configFile?: string;
  overrides?: ClientConfigInput;
  skipFile?: boolean;
}): ClientConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged = toRecord(structuredClone(DEFAULT_CONFIG));

  const configPath = options?.configFile ?? join(projectDir, CONFIG_FILENAME);
  if (options?.configFile && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${configPath} must contain a YAML mapping`);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, toRecord(options.overrides));
  }

  return validateConfig(merged);
}

/**
 * Write a config to .zosjobs.yml in the given directory.
 * Passwords are never written; supply them through ZOSMF_PASSWORD.
 */
export function writeConfig(config: ClientConfig, dir: string): string {
  const profiles = Object.fromEntries(
    Object.entries(config.profiles).map(([name, { password: _password, ...rest }]) => [name, rest]),
  );
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml({ ...config, profiles }, { lineWidth: 100 }), 'utf-8');
  return configPath;
}

export { deepMerge };
