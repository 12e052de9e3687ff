// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_CHECK_IN_DAYS,
  DEFAULT_COMPUTER_GROUPS,
  DEFAULT_DB_PATH,
  DEFAULT_MOBILE_DEVICE_GROUPS,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const serverConfigSchema = z.object({
  name: z.string().default(''),
});

const catalogConfigSchema = z.object({
  snapshot: z.string().min(1).default('catalog.json'),
});

const devicesConfigSchema = z.object({
  // Resolved by resolveCheckInDays, which falls back to the default
  checkInDays: z.union([z.number(), z.string()]).default(DEFAULT_CHECK_IN_DAYS),
  defaultGroups: z
    .object({
      computer: z.array(z.string()).default([...DEFAULT_COMPUTER_GROUPS]),
      mobileDevice: z.array(z.string()).default([...DEFAULT_MOBILE_DEVICE_GROUPS]),
    })
    .default({}),
});

const nestingConfigSchema = z.object({
  onCycle: z.enum(['warn', 'fail']).default('warn'),
});

const outputConfigSchema = z.object({
  verbose: z.boolean().default(false),
});

const historyConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dbPath: z.string().min(1).default(DEFAULT_DB_PATH),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const projectConfigSchema = z
  .object({
    server: serverConfigSchema.default({}),
    catalog: catalogConfigSchema.default({}),
    devices: devicesConfigSchema.default({}),
    nesting: nestingConfigSchema.default({}),
    output: outputConfigSchema.default({}),
    history: historyConfigSchema.default({}),
    advanced: advancedConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    const { computer, mobileDevice } = data.devices.defaultGroups;
    for (const [key, groups] of [['computer', computer], ['mobileDevice', mobileDevice]] as const) {
      if (groups.some(name => name.trim() === '')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['devices', 'defaultGroups', key],
          message: 'Default group names must not be empty',
        });
      }
    }
  });

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof projectConfigSchema> {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, result.error.issues[0]?.path.join('.'));
  }
  return result.data;
}
