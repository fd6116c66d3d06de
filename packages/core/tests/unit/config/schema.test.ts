import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { clientConfigSchema, validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('clientConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(clientConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('fills profile defaults', () => {
    const result = clientConfigSchema.safeParse({ profiles: { lab: { host: 'lab.example.test' } } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.profiles.lab).toEqual({ host: 'lab.example.test', port: 443, rejectUnauthorized: true });
      expect(result.data.monitor.lineLimit).toBe(1000);
    }
  });

  it('rejects an out-of-range port', () => {
    expect(clientConfigSchema.safeParse({ profiles: { lab: { host: 'h', port: 70000 } } }).success).toBe(false);
  });

  it('rejects an empty host', () => {
    expect(clientConfigSchema.safeParse({ profiles: { lab: { host: '' } } }).success).toBe(false);
  });

  it('rejects an unknown log level', () => {
    expect(clientConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
  });

  it('accepts a zero poll interval', () => {
    expect(clientConfigSchema.safeParse({ monitor: { pollIntervalMs: 0 } }).success).toBe(true);
  });
});

describe('validateConfig', () => {
  it('throws ConfigError naming the first bad field', () => {
    const error = (() => {
      try {
        validateConfig({ monitor: { pollIntervalMs: -1 } });
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ field: 'monitor.pollIntervalMs' });
  });

  it('returns parsed data', () => {
    expect(validateConfig({}).logLevel).toBe('warn');
  });
});
