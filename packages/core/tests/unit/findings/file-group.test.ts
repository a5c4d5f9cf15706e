import { describe, expect, it } from 'vitest';
import { createFileGroup, emptiedFileGroup, withEntries } from '../../../src/findings/file-group.js';

describe('createFileGroup', () => {
  it('derives size and count from the entries', () => {
    const group = createFileGroup('Logs', 'Log files', [
      { path: '/a.log', size: 100 },
      { path: '/b.log', size: 250 },
    ]);
    expect(group.size).toBe(350);
    expect(group.count).toBe(2);
    expect(group.paths).toEqual(['/a.log', '/b.log']);
  });

  it('collapses duplicate paths, first occurrence wins', () => {
    const group = createFileGroup('Logs', 'Log files', [
      { path: '/a.log', size: 100 },
      { path: '/a.log', size: 900 },
    ]);
    expect(group.count).toBe(1);
    expect(group.size).toBe(100);
  });

  it('counts negative and non-finite sizes as zero', () => {
    const group = createFileGroup('Odd', 'odd sizes', [
      { path: '/neg', size: -5 },
      { path: '/nan', size: Number.NaN },
      { path: '/inf', size: Number.POSITIVE_INFINITY },
      { path: '/ok', size: 7 },
    ]);
    expect(group.size).toBe(7);
    expect(group.count).toBe(4);
  });

  it('is empty without entries', () => {
    const group = createFileGroup('Trash', 'Items in Trash');
    expect(group).toEqual({ name: 'Trash', description: 'Items in Trash', paths: [], size: 0, count: 0 });
  });

  it('returns a frozen value', () => {
    const group = createFileGroup('Logs', 'Log files', [{ path: '/a', size: 1 }]);
    expect(Object.isFrozen(group)).toBe(true);
    expect(Object.isFrozen(group.paths)).toBe(true);
  });
});

describe('emptiedFileGroup', () => {
  it('keeps name and description and drops the paths', () => {
    const full = createFileGroup('Cache Files', 'Application cache files', [{ path: '/c', size: 10 }]);
    const emptied = emptiedFileGroup(full);
    expect(emptied.name).toBe('Cache Files');
    expect(emptied.description).toBe('Application cache files');
    expect(emptied.count).toBe(0);
    expect(emptied.size).toBe(0);
  });
});

describe('withEntries', () => {
  it('fills a template with new entries', () => {
    const template = createFileGroup('Temporary Files', 'temp');
    const filled = withEntries(template, [{ path: '/t/1', size: 3 }]);
    expect(filled.name).toBe('Temporary Files');
    expect(filled.size).toBe(3);
    expect(filled.paths).toEqual(['/t/1']);
  });
});
