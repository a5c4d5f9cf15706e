// packages/core/src/config/loader.ts

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { DiskcareConfig, PresetName } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { isRecord, loadPreset } from './presets.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.diskcare.yml';

/** `~/.diskcare.yml` under the given (or current user's) home directory. */
export function defaultConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, CONFIG_FILENAME);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a YAML mapping`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  /** Explicit config file; defaults to ~/.diskcare.yml */
  configPath?: string;
  homeDir?: string;
  preset?: PresetName;
  overrides?: Record<string, unknown>;
  skipFile?: boolean;
}

/**
 * Load config with precedence: overrides > config file > preset > defaults.
 *
 * The preset comes from the options, else from the file's `preset` key.
 * An explicit configPath that does not exist is an error; a missing
 * default file is not.
 */
export function loadConfig(options?: LoadConfigOptions): DiskcareConfig {
  const configPath = options?.configPath ?? defaultConfigPath(options?.homeDir);

  let fileConfig: Record<string, unknown> = {};
  if (!options?.skipFile) {
    if (existsSync(configPath)) {
      fileConfig = readConfigFile(configPath);
    } else if (options?.configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  }

  const defaults: unknown = structuredClone(DEFAULT_CONFIG);
  let merged: Record<string, unknown> = isRecord(defaults) ? defaults : {};

  const filePreset = typeof fileConfig.preset === 'string' ? fileConfig.preset : undefined;
  const preset = options?.preset ?? filePreset;
  if (preset) {
    merged = deepMerge(merged, loadPreset(preset));
    merged.preset = preset;
  }

  merged = deepMerge(merged, fileConfig);
  if (options?.preset) merged.preset = options.preset;

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/** Serialize a config to YAML at `path`, creating parent directories. */
export function writeConfig(config: DiskcareConfig, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');
}
