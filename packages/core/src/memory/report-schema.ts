// packages/core/src/memory/report-schema.ts — zod shapes for reports read back from storage

import { z } from 'zod';

const fileGroupSchema = z.object({
  name: z.string(),
  description: z.string(),
  paths: z.array(z.string()),
  size: z.number(),
  count: z.number(),
});

const appInfoSchema = z.object({
  appName: z.string(),
  bundleIdentifier: z.string(),
  path: z.string(),
  version: z.string().optional(),
  totalSize: z.number(),
  lastUsed: z.number().optional(),
});

const penaltyBreakdownSchema = z.object({
  disk: z.number(),
  cache: z.number(),
  junk: z.number(),
  app: z.number(),
  orphaned: z.number(),
  privacy: z.number(),
});

const penaltyCategorySchema = penaltyBreakdownSchema.keyof();

export const healthRatingSchema = z.enum(['excellent', 'good', 'fair', 'poor', 'critical']);

export const scanResultSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  healthScore: z.number().int().min(0).max(100),
  rating: healthRatingSchema,
  diskUsage: z
    .object({
      totalSpace: z.number(),
      usedSpace: z.number(),
      freeSpace: z.number(),
      homeDirectorySize: z.number(),
      cacheSize: z.number(),
      logSize: z.number(),
      tempSize: z.number(),
    })
    .optional(),
  junkFiles: z.object({
    tempFiles: fileGroupSchema,
    cacheFiles: fileGroupSchema,
    logFiles: fileGroupSchema,
    trashItems: fileGroupSchema,
    languageFiles: fileGroupSchema,
    oldFiles: fileGroupSchema,
  }),
  performanceIssues: z.object({
    launchAgents: fileGroupSchema,
    loginItems: fileGroupSchema,
    browserCaches: fileGroupSchema,
    memoryIssues: z.array(z.string()),
    diskFragmentation: z.number().optional(),
  }),
  appIssues: z.object({
    unusedApps: z.array(appInfoSchema),
    largeApps: z.array(appInfoSchema),
    duplicateApps: z.array(
      z.object({ appName: z.string(), versions: z.array(appInfoSchema), totalSize: z.number() }),
    ),
    orphanedFiles: z.array(
      z.object({
        path: z.string(),
        size: z.number(),
        type: z.enum(['app-support', 'cache', 'preferences', 'container', 'logs', 'launch-agent', 'other']),
        possibleSourceApp: z.string().optional(),
      }),
    ),
  }),
  privacyIssues: z.object({
    browserHistory: fileGroupSchema,
    downloadHistory: fileGroupSchema,
    recentDocuments: fileGroupSchema,
    clipboardData: fileGroupSchema,
  }),
  breakdown: penaltyBreakdownSchema,
  totalReclaimableSpace: z.number().nonnegative(),
});

export const recommendationSchema = z.object({
  id: z.string(),
  type: z.enum([
    'cache',
    'logs',
    'temp-files',
    'trash',
    'old-files',
    'language-files',
    'browser-cache',
    'launch-agents',
    'unused-apps',
    'duplicate-apps',
    'large-apps',
    'orphaned-files',
  ]),
  category: penaltyCategorySchema,
  title: z.string(),
  description: z.string(),
  actionable: z.boolean(),
  safeToFix: z.boolean(),
  spaceToReclaim: z.number().nonnegative(),
  affectedPaths: z.array(z.string()),
  scoreImpact: z.number().int().nonnegative(),
});

export const recommendationListSchema = z.array(recommendationSchema);
