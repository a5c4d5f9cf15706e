// packages/core/src/config/defaults.ts

import type { DiskcareConfig } from '../types/config.js';
import {
  DEFAULT_HISTORY_ENTRIES,
  DEFAULT_LARGE_APP_BYTES,
  DEFAULT_MIN_ORPHAN_BYTES,
  DEFAULT_OLD_FILE_DAYS,
  DEFAULT_UNUSED_APP_DAYS,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: DiskcareConfig = {
  scan: {
    targets: {
      tempFiles: true,
      cacheFiles: true,
      logFiles: true,
      trash: true,
      languageFiles: false,
      oldFiles: true,
      launchAgents: true,
      loginItems: true,
      browserData: false,
      orphanedFiles: true,
      apps: true,
      privacy: true,
    },
    directories: {
      temp: ['~/Library/Caches/TemporaryItems'],
      caches: ['~/Library/Caches', '~/.cache'],
      logs: ['~/Library/Logs'],
      trash: ['~/.Trash', '~/.local/share/Trash/files'],
      downloads: ['~/Downloads'],
      applications: ['/Applications', '~/Applications'],
      applicationSupport: ['~/Library/Application Support'],
      launchAgents: ['~/Library/LaunchAgents'],
      loginItems: ['~/.config/autostart'],
      browserCaches: [
        '~/Library/Caches/Google/Chrome',
        '~/Library/Caches/com.apple.Safari',
        '~/Library/Caches/Firefox',
        '~/.cache/google-chrome',
        '~/.cache/mozilla',
      ],
      browserHistory: [
        '~/Library/Safari/History.db',
        '~/Library/Application Support/Google/Chrome/Default/History',
      ],
      downloadHistory: ['~/Library/Preferences/com.apple.LaunchServices.QuarantineEventsV2'],
      recentDocuments: ['~/Library/Application Support/com.apple.sharedfilelist'],
    },
    oldFileThresholdDays: DEFAULT_OLD_FILE_DAYS,
    unusedAppThresholdDays: DEFAULT_UNUSED_APP_DAYS,
    largeAppBytes: DEFAULT_LARGE_APP_BYTES,
    minOrphanBytes: DEFAULT_MIN_ORPHAN_BYTES,
    exclude: [],
  },
  fix: {
    dryRun: false,
  },
  history: {
    enabled: true,
    maxEntries: DEFAULT_HISTORY_ENTRIES,
  },
  advanced: {
    logLevel: 'warn',
  },
};
