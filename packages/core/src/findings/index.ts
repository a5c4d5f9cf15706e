// packages/core/src/findings -- category snapshot construction and totals

export { createFileGroup, emptiedFileGroup, withEntries } from './file-group.js';
export type { SizedPath } from './file-group.js';
export {
  emptyJunkCategory,
  emptyPerformanceCategory,
  emptyAppIssueCategory,
  emptyPrivacyCategory,
  junkTotalSize,
  junkTotalFiles,
  orphanedTotalSize,
  duplicateExtras,
  sumUniqueApps,
  reclaimableBytes,
  flaggedItemCount,
} from './categories.js';
export type { ReclaimableInput } from './categories.js';
