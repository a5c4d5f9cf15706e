// packages/core/src/config/ignore.ts — gitignore-style exclude patterns for scanned directories

import ignore from 'ignore';

export type ExcludeFilter = (relativePath: string) => boolean;

/**
 * Compile exclude patterns into a predicate over paths relative to the
 * scanned root. Directories should be tested with a trailing slash so
 * `dir/` patterns match them.
 */
export function createExcludeFilter(patterns: readonly string[]): ExcludeFilter {
  const ig = ignore().add([...patterns]);
  return (relativePath) => {
    const normalized = relativePath.replace(/\\/g, '/');
    if (normalized === '' || normalized === './') return false;
    return ig.ignores(normalized);
  };
}
