// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_HISTORY_ENTRIES,
  DEFAULT_LARGE_APP_BYTES,
  DEFAULT_MIN_ORPHAN_BYTES,
  DEFAULT_OLD_FILE_DAYS,
  DEFAULT_UNUSED_APP_DAYS,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const presetNameSchema = z.enum(['default', 'aggressive']);

const scanTargetsSchema = z.object({
  tempFiles: z.boolean().default(true),
  cacheFiles: z.boolean().default(true),
  logFiles: z.boolean().default(true),
  trash: z.boolean().default(true),
  languageFiles: z.boolean().default(false),
  oldFiles: z.boolean().default(true),
  launchAgents: z.boolean().default(true),
  loginItems: z.boolean().default(true),
  browserData: z.boolean().default(false),
  orphanedFiles: z.boolean().default(true),
  apps: z.boolean().default(true),
  privacy: z.boolean().default(true),
});

const directoryList = z.array(z.string().min(1)).default([]);

const scanDirectoriesSchema = z.object({
  temp: directoryList,
  caches: directoryList,
  logs: directoryList,
  trash: directoryList,
  downloads: directoryList,
  applications: directoryList,
  applicationSupport: directoryList,
  launchAgents: directoryList,
  loginItems: directoryList,
  browserCaches: directoryList,
  browserHistory: directoryList,
  downloadHistory: directoryList,
  recentDocuments: directoryList,
});

const scanConfigSchema = z.object({
  targets: scanTargetsSchema.default({}),
  directories: scanDirectoriesSchema.default({}),
  oldFileThresholdDays: z.number().int().positive().default(DEFAULT_OLD_FILE_DAYS),
  unusedAppThresholdDays: z.number().int().positive().default(DEFAULT_UNUSED_APP_DAYS),
  largeAppBytes: z.number().int().nonnegative().default(DEFAULT_LARGE_APP_BYTES),
  minOrphanBytes: z.number().int().nonnegative().default(DEFAULT_MIN_ORPHAN_BYTES),
  exclude: z.array(z.string()).default([]),
});

const fixConfigSchema = z.object({
  dryRun: z.boolean().default(false),
});

const historyConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxEntries: z.number().int().positive().max(10_000).default(DEFAULT_HISTORY_ENTRIES),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
});

export const diskcareConfigSchema = z
  .object({
    configVersion: z.number().int().positive().optional(),
    preset: presetNameSchema.optional(),
    scan: scanConfigSchema.default({}),
    fix: fixConfigSchema.default({}),
    history: historyConfigSchema.default({}),
    advanced: advancedConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    for (const pattern of data.scan.exclude) {
      if (pattern.startsWith('/') || pattern.startsWith('~')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scan', 'exclude'],
          message: `Exclude pattern "${pattern}" must be relative to the scanned directory`,
        });
      }
    }
  });

export type DiskcareConfigInput = z.input<typeof diskcareConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof diskcareConfigSchema> {
  const result = diskcareConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
