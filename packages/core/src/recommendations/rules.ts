// packages/core/src/recommendations/rules.ts — One rule per finding type

import { emptiedFileGroup } from '../findings/file-group.js';
import { duplicateExtras, orphanedTotalSize, sumUniqueApps } from '../findings/categories.js';
import type { ScoreInput } from '../scoring/health-score.js';
import type {
  FileGroup,
  JunkCategory,
  PenaltyCategory,
  RecommendationType,
  ScanResult,
} from '../types/scan.js';
import { MB } from '../utils/constants.js';
import { formatBytes } from '../utils/format.js';

/** What a rule found in a scan result. */
export interface RuleFinding {
  /** Bytes, or an entity count for count-gated rules; compared with `threshold` */
  magnitude: number;
  spaceToReclaim: number;
  affectedPaths: string[];
  description: string;
}

export interface RecommendationRule {
  readonly type: RecommendationType;
  readonly category: PenaltyCategory;
  readonly title: string;
  readonly safeToFix: boolean;
  /** Emitted only when the magnitude is strictly greater. */
  readonly threshold: number;
  inspect(result: ScanResult): RuleFinding;
  /** The same findings with this rule's data fully remediated. */
  remediate(input: ScoreInput): ScoreInput;
}

function groupFinding(group: FileGroup, description: string): RuleFinding {
  return {
    magnitude: group.size,
    spaceToReclaim: group.size,
    affectedPaths: [...group.paths],
    description,
  };
}

function junkRule(
  type: RecommendationType,
  key: keyof JunkCategory,
  title: string,
  threshold: number,
  safeToFix: boolean,
  describe: (group: FileGroup) => string,
): RecommendationRule {
  return {
    type,
    category: 'junk',
    title,
    safeToFix,
    threshold,
    inspect: (result) => groupFinding(result.junkFiles[key], describe(result.junkFiles[key])),
    remediate: (input) => ({
      ...input,
      junkFiles: { ...input.junkFiles, [key]: emptiedFileGroup(input.junkFiles[key]) },
    }),
  };
}

/** Ordered; the position is the final sort key. */
export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  junkRule(
    'temp-files',
    'tempFiles',
    'Clear Temporary Files',
    50 * MB,
    true,
    (g) => `Remove ${g.count} temporary files (${formatBytes(g.size)}). These are safe to delete.`,
  ),
  junkRule(
    'cache',
    'cacheFiles',
    'Clear Application Caches',
    100 * MB,
    true,
    (g) => `Remove ${g.count} cache files (${formatBytes(g.size)}). Apps will rebuild their caches as needed.`,
  ),
  junkRule(
    'logs',
    'logFiles',
    'Clear Old Log Files',
    50 * MB,
    true,
    (g) => `Remove ${g.count} log files (${formatBytes(g.size)}). Old logs are safe to delete.`,
  ),
  junkRule(
    'trash',
    'trashItems',
    'Empty Trash',
    10 * MB,
    true,
    (g) => `Permanently remove ${g.count} items from Trash (${formatBytes(g.size)}).`,
  ),
  junkRule(
    'language-files',
    'languageFiles',
    'Remove Unused Language Files',
    50 * MB,
    false,
    (g) => `Remove ${g.count} language bundles (${formatBytes(g.size)}). Keep the languages you use.`,
  ),
  junkRule(
    'old-files',
    'oldFiles',
    'Remove Old Downloads',
    100 * MB,
    false,
    (g) => `Review ${g.count} old items in Downloads (${formatBytes(g.size)}).`,
  ),
  {
    type: 'browser-cache',
    category: 'cache',
    title: 'Clear Browser Caches',
    safeToFix: true,
    threshold: 500 * MB,
    inspect: (result) => {
      const group = result.performanceIssues.browserCaches;
      return groupFinding(
        group,
        `Remove ${group.count} browser cache files (${formatBytes(group.size)}). Browsers rebuild them on demand.`,
      );
    },
    remediate: (input) => ({
      ...input,
      performanceIssues: {
        ...input.performanceIssues,
        browserCaches: emptiedFileGroup(input.performanceIssues.browserCaches),
      },
    }),
  },
  {
    // Launch agents carry no penalty of their own.
    type: 'launch-agents',
    category: 'cache',
    title: 'Review Launch Agents',
    safeToFix: false,
    threshold: 0,
    inspect: (result) => {
      const group = result.performanceIssues.launchAgents;
      return {
        magnitude: group.count,
        spaceToReclaim: 0,
        affectedPaths: [...group.paths],
        description: `Found ${group.count} launch agents. Review them and disable the ones you do not need.`,
      };
    },
    remediate: (input) => ({
      ...input,
      performanceIssues: {
        ...input.performanceIssues,
        launchAgents: emptiedFileGroup(input.performanceIssues.launchAgents),
      },
    }),
  },
  {
    type: 'unused-apps',
    category: 'app',
    title: 'Uninstall Unused Applications',
    safeToFix: false,
    threshold: 0,
    inspect: (result) => {
      const apps = result.appIssues.unusedApps;
      const size = sumUniqueApps(apps);
      return {
        magnitude: apps.length,
        spaceToReclaim: size,
        affectedPaths: apps.map((app) => app.path),
        description: `Found ${apps.length} applications you have not used recently (${formatBytes(size)}).`,
      };
    },
    remediate: (input) => ({ ...input, appIssues: { ...input.appIssues, unusedApps: [] } }),
  },
  {
    type: 'duplicate-apps',
    category: 'app',
    title: 'Remove Duplicate Applications',
    safeToFix: false,
    threshold: 0,
    inspect: (result) => {
      const extras = duplicateExtras(result.appIssues);
      const size = sumUniqueApps(extras);
      return {
        magnitude: result.appIssues.duplicateApps.length,
        spaceToReclaim: size,
        affectedPaths: extras.map((app) => app.path),
        description: `Found ${result.appIssues.duplicateApps.length} applications installed more than once (${formatBytes(size)} in extra copies).`,
      };
    },
    remediate: (input) => ({ ...input, appIssues: { ...input.appIssues, duplicateApps: [] } }),
  },
  {
    type: 'large-apps',
    category: 'app',
    title: 'Review Large Applications',
    safeToFix: false,
    threshold: 0,
    inspect: (result) => {
      const apps = result.appIssues.largeApps;
      return {
        magnitude: apps.length,
        spaceToReclaim: 0,
        affectedPaths: apps.map((app) => app.path),
        description: `Found ${apps.length} very large applications. Check whether you still need them.`,
      };
    },
    remediate: (input) => ({ ...input, appIssues: { ...input.appIssues, largeApps: [] } }),
  },
  {
    type: 'orphaned-files',
    category: 'orphaned',
    title: 'Remove Orphaned Application Files',
    safeToFix: true,
    threshold: 0,
    inspect: (result) => {
      const files = result.appIssues.orphanedFiles;
      const size = orphanedTotalSize(result.appIssues);
      return {
        magnitude: files.length,
        spaceToReclaim: size,
        affectedPaths: files.map((file) => file.path),
        description: `Found ${files.length} leftovers from uninstalled applications (${formatBytes(size)}).`,
      };
    },
    remediate: (input) => ({ ...input, appIssues: { ...input.appIssues, orphanedFiles: [] } }),
  },
];
