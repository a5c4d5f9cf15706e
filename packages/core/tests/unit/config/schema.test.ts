import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { diskcareConfigSchema, validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('diskcareConfigSchema', () => {
  it('validates the default config', () => {
    const result = diskcareConfigSchema.safeParse(DEFAULT_CONFIG);
    expect(result.success).toBe(true);
  });

  it('applies defaults for missing fields', () => {
    const result = diskcareConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.scan.targets.languageFiles).toBe(false);
      expect(result.data.scan.targets.tempFiles).toBe(true);
      expect(result.data.scan.oldFileThresholdDays).toBe(90);
      expect(result.data.scan.directories.caches).toEqual([]);
      expect(result.data.history.maxEntries).toBe(50);
      expect(result.data.advanced.logLevel).toBe('warn');
      expect(result.data.fix.dryRun).toBe(false);
    }
  });

  it('rejects an unknown preset', () => {
    expect(diskcareConfigSchema.safeParse({ preset: 'turbo' }).success).toBe(false);
  });

  it('rejects non-positive thresholds', () => {
    expect(diskcareConfigSchema.safeParse({ scan: { oldFileThresholdDays: 0 } }).success).toBe(false);
  });
});

describe('validateConfig', () => {
  it('returns the parsed config', () => {
    const config = validateConfig({ preset: 'aggressive', fix: { dryRun: true } });
    expect(config.preset).toBe('aggressive');
    expect(config.fix.dryRun).toBe(true);
  });

  it('throws ConfigError naming the first bad field', () => {
    try {
      validateConfig({ advanced: { logLevel: 'loud' } });
      expect.unreachable('validateConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.field).toBe('advanced.logLevel');
    }
  });

  it('rejects absolute and home-relative exclude patterns', () => {
    expect(() => validateConfig({ scan: { exclude: ['/etc'] } })).toThrow(
      'Exclude pattern "/etc" must be relative to the scanned directory',
    );
    expect(() => validateConfig({ scan: { exclude: ['~/secret'] } })).toThrow(ConfigError);
    expect(validateConfig({ scan: { exclude: ['node_modules/', '*.tmp'] } }).scan.exclude).toEqual([
      'node_modules/',
      '*.tmp',
    ]);
  });
});
