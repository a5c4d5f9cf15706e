// packages/core/src/utils/constants.ts — Shared magic number constants

export const KB = 1024;
export const MB = 1024 * KB;
export const GB = 1024 * MB;

/** Progress reported by runStage never exceeds this until a scan is finalized */
export const MAX_STAGE_PROGRESS = 0.95;

/** Disk penalty applied when no disk usage summary is available */
export const UNKNOWN_DISK_PENALTY = 5;

/** Apps bigger than this count as large */
export const DEFAULT_LARGE_APP_BYTES = 500 * MB;

/** Application Support folders smaller than this are not reported as orphaned */
export const DEFAULT_MIN_ORPHAN_BYTES = 5 * MB;

export const DEFAULT_OLD_FILE_DAYS = 90;
export const DEFAULT_UNUSED_APP_DAYS = 180;

/** Scan history rows kept by default */
export const DEFAULT_HISTORY_ENTRIES = 50;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
