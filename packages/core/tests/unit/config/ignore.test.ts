import { describe, expect, it } from 'vitest';
import { createExcludeFilter } from '../../../src/config/ignore.js';

describe('createExcludeFilter', () => {
  const isExcluded = createExcludeFilter(['node_modules/', '*.tmp', 'Keep Me']);

  it('matches directory patterns against paths with a trailing slash', () => {
    expect(isExcluded('project/node_modules/')).toBe(true);
  });

  it('matches file globs at any depth', () => {
    expect(isExcluded('scratch.tmp')).toBe(true);
    expect(isExcluded('a/b/scratch.tmp')).toBe(true);
  });

  it('matches names containing spaces', () => {
    expect(isExcluded('Keep Me')).toBe(true);
  });

  it('does not exclude regular files', () => {
    expect(isExcluded('a/b/report.log')).toBe(false);
  });

  it('normalizes backslashes', () => {
    expect(isExcluded('a\\b\\scratch.tmp')).toBe(true);
  });

  it('never excludes the root itself', () => {
    expect(isExcluded('')).toBe(false);
  });

  it('excludes nothing without patterns', () => {
    expect(createExcludeFilter([])('anything.tmp')).toBe(false);
  });
});
