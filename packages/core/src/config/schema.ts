// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_LINE_LIMIT,
  DEFAULT_MONITOR_ATTEMPTS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_ZOSMF_PORT,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const profileSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(DEFAULT_ZOSMF_PORT),
  user: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  basePath: z.string().optional(),
  rejectUnauthorized: z.boolean().default(true),
});

const monitorConfigSchema = z.object({
  attempts: z.number().int().positive().default(DEFAULT_MONITOR_ATTEMPTS),
  pollIntervalMs: z.number().int().nonnegative().default(DEFAULT_POLL_INTERVAL_MS),
  lineLimit: z.number().int().positive().default(DEFAULT_LINE_LIMIT),
});

const httpConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
});

export const clientConfigSchema = z
  .object({
    profiles: z.record(z.string(), profileSchema).default({}),
    defaults: z
      .object({
        profile: z.string().min(1).optional(),
      })
      .default({}),
    monitor: monitorConfigSchema.default({}),
    http: httpConfigSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  })
  .superRefine((data, ctx) => {
    const names = Object.keys(data.profiles);
    const defaultProfile = data.defaults.profile;
    if (defaultProfile && !names.includes(defaultProfile)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaults', 'profile'],
        message: `Default profile "${defaultProfile}" is not defined in profiles. Available: ${names.join(', ') || '(none)'}`,
      });
    }
  });

export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof clientConfigSchema> {
  const result = clientConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
