// packages/core/src/config/presets.ts

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { PresetName } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';

const PRESETS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'presets');

const VALID_PRESETS: PresetName[] = ['default', 'aggressive'];

export function isPresetName(name: string): name is PresetName {
  return VALID_PRESETS.some((preset) => preset === name);
}

/**
 * Load a built-in preset by name. Returns a partial config to be merged with defaults.
 */
export function loadPreset(name: string): Record<string, unknown> {
  if (!isPresetName(name)) {
    throw new ConfigError(
      `Unknown preset: "${name}". Valid presets: ${VALID_PRESETS.join(', ')}`,
      'preset',
    );
  }

  const filePath = join(PRESETS_DIR, `${name}.yml`);
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load preset "${name}": ${err instanceof Error ? err.message : String(err)}`,
      'preset',
    );
  }
  return isRecord(parsed) ? parsed : {};
}

export function listPresets(): PresetName[] {
  return [...VALID_PRESETS];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
