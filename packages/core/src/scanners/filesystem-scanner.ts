// packages/core/src/scanners/filesystem-scanner.ts — Node CategoryScanner over configured directories

import { basename, join } from 'node:path';
import { createExcludeFilter, type ExcludeFilter } from '../config/ignore.js';
import type { CancellationToken } from '../engine/cancellation.js';
import {
  emptyAppIssueCategory,
  emptyJunkCategory,
  emptyPerformanceCategory,
  emptyPrivacyCategory,
} from '../findings/categories.js';
import { withEntries, type SizedPath } from '../findings/file-group.js';
import type { ScanConfig, ScanDirectories } from '../types/config.js';
import type {
  AppInfo,
  AppIssueCategory,
  DuplicateAppGroup,
  JunkCategory,
  OrphanedFile,
  PerformanceCategory,
  PrivacyCategory,
} from '../types/scan.js';
import type { CategoryScanner } from '../types/services.js';
import { MS_PER_DAY } from '../utils/constants.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { collectFiles, expandHome, listEntries, lstatOrUndefined, measurePath } from './fs-walk.js';

/** Localizations never reported as removable. */
const KEPT_LOCALIZATIONS = new Set(['en.lproj', 'English.lproj', 'Base.lproj']);

/** Support folders owned by the OS rather than an installed app. */
const SYSTEM_SUPPORT_PREFIX = 'com.apple.';

export interface FileSystemScannerOptions {
  homeDir?: string;
  logger?: Logger;
  /** Epoch milliseconds; used for age thresholds */
  now?: () => number;
}

export interface InstalledApp {
  info: AppInfo;
  modifiedAt: number;
}

export class FileSystemScanner implements CategoryScanner {
  private readonly config: ScanConfig;
  private readonly dirs: ScanDirectories;
  private readonly exclude: ExcludeFilter;
  private readonly logger: Logger;
  private readonly now: () => number;
  /** Every configured root; a walk does not descend into another group's root */
  private readonly allRoots: ReadonlySet<string>;

  constructor(config: ScanConfig, options: FileSystemScannerOptions = {}) {
    this.config = config;
    const home = options.homeDir;
    const expand = (list: string[]) => list.map((dir) => expandHome(dir, home));
    this.dirs = {
      temp: expand(config.directories.temp),
      caches: expand(config.directories.caches),
      logs: expand(config.directories.logs),
      trash: expand(config.directories.trash),
      downloads: expand(config.directories.downloads),
      applications: expand(config.directories.applications),
      applicationSupport: expand(config.directories.applicationSupport),
      launchAgents: expand(config.directories.launchAgents),
      loginItems: expand(config.directories.loginItems),
      browserCaches: expand(config.directories.browserCaches),
      browserHistory: expand(config.directories.browserHistory),
      downloadHistory: expand(config.directories.downloadHistory),
      recentDocuments: expand(config.directories.recentDocuments),
    };
    this.allRoots = new Set(Object.values(this.dirs).flat());
    this.exclude = createExcludeFilter(config.exclude);
    this.logger = (options.logger ?? silentLogger).child('fs');
    this.now = options.now ?? Date.now;
  }

  async scanJunkFiles(token?: CancellationToken): Promise<JunkCategory> {
    const empty = emptyJunkCategory();
    const { targets } = this.config;

    const tempFiles = targets.tempFiles ? withEntries(empty.tempFiles, await this.files(this.dirs.temp, token)) : empty.tempFiles;
    token?.throwIfCancelled();
    const cacheFiles = targets.cacheFiles ? withEntries(empty.cacheFiles, await this.files(this.dirs.caches, token)) : empty.cacheFiles;
    token?.throwIfCancelled();
    const logFiles = targets.logFiles ? withEntries(empty.logFiles, await this.files(this.dirs.logs, token)) : empty.logFiles;
    token?.throwIfCancelled();
    const trashItems = targets.trash ? withEntries(empty.trashItems, await this.topLevel(this.dirs.trash, token)) : empty.trashItems;
    token?.throwIfCancelled();
    const languageFiles = targets.languageFiles
      ? withEntries(empty.languageFiles, await this.languageBundles(token))
      : empty.languageFiles;
    token?.throwIfCancelled();
    const oldFiles = targets.oldFiles ? withEntries(empty.oldFiles, await this.oldDownloads(token)) : empty.oldFiles;

    this.logger.debug(
      `Junk: temp=${tempFiles.count} cache=${cacheFiles.count} logs=${logFiles.count} trash=${trashItems.count} lang=${languageFiles.count} old=${oldFiles.count}`,
    );
    return Object.freeze({ tempFiles, cacheFiles, logFiles, trashItems, languageFiles, oldFiles });
  }

  async scanPerformanceIssues(token?: CancellationToken): Promise<PerformanceCategory> {
    const empty = emptyPerformanceCategory();
    const { targets } = this.config;

    const launchAgents = targets.launchAgents
      ? withEntries(empty.launchAgents, await this.topLevel(this.dirs.launchAgents, token, (name) => name.endsWith('.plist')))
      : empty.launchAgents;
    token?.throwIfCancelled();
    const loginItems = targets.loginItems
      ? withEntries(empty.loginItems, await this.topLevel(this.dirs.loginItems, token))
      : empty.loginItems;
    token?.throwIfCancelled();
    const browserCaches = targets.browserData
      ? withEntries(empty.browserCaches, await this.files(this.dirs.browserCaches, token))
      : empty.browserCaches;

    return Object.freeze({ launchAgents, loginItems, browserCaches, memoryIssues: empty.memoryIssues });
  }

  async scanAppIssues(token?: CancellationToken): Promise<AppIssueCategory> {
    const { targets } = this.config;
    if (!targets.apps && !targets.orphanedFiles) return emptyAppIssueCategory();

    const installed = await this.installedApps(token);
    const apps = installed.map((app) => app.info);
    const unusedCutoff = this.now() - this.config.unusedAppThresholdDays * MS_PER_DAY;

    const largeApps = targets.apps
      ? apps.filter((app) => app.totalSize > this.config.largeAppBytes).sort((a, b) => b.totalSize - a.totalSize)
      : [];
    const unusedApps = targets.apps
      ? apps.filter((app) => app.lastUsed !== undefined && app.lastUsed < unusedCutoff)
      : [];
    const duplicateApps = targets.apps ? findDuplicates(installed) : [];

    token?.throwIfCancelled();
    const orphanedFiles = targets.orphanedFiles ? await this.orphanedSupport(apps, token) : [];

    this.logger.debug(
      `Apps: installed=${apps.length} large=${largeApps.length} unused=${unusedApps.length} duplicates=${duplicateApps.length} orphaned=${orphanedFiles.length}`,
    );
    return Object.freeze({ unusedApps, largeApps, duplicateApps, orphanedFiles });
  }

  async scanPrivacyIssues(token?: CancellationToken): Promise<PrivacyCategory> {
    const empty = emptyPrivacyCategory();
    if (!this.config.targets.privacy) return empty;

    const browserHistory = withEntries(empty.browserHistory, await this.files(this.dirs.browserHistory, token));
    const downloadHistory = withEntries(empty.downloadHistory, await this.files(this.dirs.downloadHistory, token));
    const recentDocuments = withEntries(empty.recentDocuments, await this.files(this.dirs.recentDocuments, token));
    return Object.freeze({ browserHistory, downloadHistory, recentDocuments, clipboardData: empty.clipboardData });
  }

  /** Files under each root, not descending into roots that belong to other groups. */
  private async files(roots: readonly string[], token?: CancellationToken): Promise<SizedPath[]> {
    const own = new Set(roots);
    const skip = new Set([...this.allRoots].filter((root) => !own.has(root)));
    const results: SizedPath[] = [];
    for (const root of roots) {
      results.push(...(await collectFiles(root, { exclude: this.exclude, skip, token })));
    }
    return results;
  }

  /** Each direct child of the roots, measured as a whole. */
  private async topLevel(
    roots: readonly string[],
    token?: CancellationToken,
    accept: (name: string) => boolean = () => true,
  ): Promise<SizedPath[]> {
    const results: SizedPath[] = [];
    for (const root of roots) {
      for (const entry of await listEntries(root)) {
        if (!accept(entry.name) || this.exclude(entry.isDirectory() ? `${entry.name}/` : entry.name)) continue;
        token?.throwIfCancelled();
        const path = join(root, entry.name);
        results.push({ path, size: await measurePath(path, token) });
      }
    }
    return results;
  }

  private async oldDownloads(token?: CancellationToken): Promise<SizedPath[]> {
    const cutoff = this.now() - this.config.oldFileThresholdDays * MS_PER_DAY;
    const results: SizedPath[] = [];
    for (const entry of await this.topLevel(this.dirs.downloads, token)) {
      const stats = await lstatOrUndefined(entry.path);
      if (stats && stats.mtimeMs < cutoff) results.push(entry);
    }
    return results;
  }

  private async languageBundles(token?: CancellationToken): Promise<SizedPath[]> {
    const results: SizedPath[] = [];
    for (const root of this.dirs.applications) {
      for (const entry of await listEntries(root)) {
        if (!entry.isDirectory() || !entry.name.endsWith('.app')) continue;
        token?.throwIfCancelled();
        const resources = join(root, entry.name, 'Contents', 'Resources');
        for (const bundle of await listEntries(resources)) {
          if (!bundle.name.endsWith('.lproj') || KEPT_LOCALIZATIONS.has(bundle.name)) continue;
          const path = join(resources, bundle.name);
          results.push({ path, size: await measurePath(path, token) });
        }
      }
    }
    return results;
  }

  private async installedApps(token?: CancellationToken): Promise<InstalledApp[]> {
    const apps: InstalledApp[] = [];
    for (const root of this.dirs.applications) {
      for (const entry of await listEntries(root)) {
        if (!entry.isDirectory() || !entry.name.endsWith('.app')) continue;
        if (this.exclude(`${entry.name}/`)) continue;
        token?.throwIfCancelled();
        const path = join(root, entry.name);
        const stats = await lstatOrUndefined(path);
        if (!stats) continue;
        apps.push({
          info: {
            appName: basename(entry.name, '.app'),
            bundleIdentifier: '',
            path,
            totalSize: await measurePath(path, token),
            lastUsed: stats.atimeMs,
          },
          modifiedAt: stats.mtimeMs,
        });
      }
    }
    return apps;
  }

  /** Support folders matching no installed app. Nothing is judged orphaned when no apps were found. */
  private async orphanedSupport(apps: readonly AppInfo[], token?: CancellationToken): Promise<OrphanedFile[]> {
    if (apps.length === 0) return [];
    const installedNames = new Set(apps.map((app) => app.appName.toLowerCase()));
    const orphans: OrphanedFile[] = [];

    for (const root of this.dirs.applicationSupport) {
      for (const entry of await listEntries(root)) {
        if (!entry.isDirectory()) continue;
        const name = entry.name;
        if (name.startsWith(SYSTEM_SUPPORT_PREFIX) || installedNames.has(name.toLowerCase())) continue;
        if (this.exclude(`${name}/`)) continue;
        token?.throwIfCancelled();
        const path = join(root, name);
        const size = await measurePath(path, token);
        if (size > this.config.minOrphanBytes) {
          orphans.push({ path, size, type: 'app-support', possibleSourceApp: name });
        }
      }
    }
    return orphans.sort((a, b) => b.size - a.size);
  }
}

/** Apps with the same name in more than one location; the most recently modified copy comes first. */
export function findDuplicates(installed: readonly InstalledApp[]): DuplicateAppGroup[] {
  const byName = new Map<string, InstalledApp[]>();
  for (const app of installed) {
    const key = app.info.appName.toLowerCase();
    const group = byName.get(key);
    if (group) {
      group.push(app);
    } else {
      byName.set(key, [app]);
    }
  }

  const groups: DuplicateAppGroup[] = [];
  for (const copies of byName.values()) {
    if (copies.length < 2) continue;
    const versions = [...copies]
      .sort((a, b) => b.modifiedAt - a.modifiedAt || (a.info.path < b.info.path ? -1 : 1))
      .map((copy) => copy.info);
    groups.push({
      appName: versions[0]?.appName ?? '',
      versions,
      totalSize: versions.reduce((sum, app) => sum + app.totalSize, 0),
    });
  }
  return groups;
}
