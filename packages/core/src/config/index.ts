// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { diskcareConfigSchema, validateConfig } from './schema.js';
export type { DiskcareConfigInput } from './schema.js';
export { isPresetName, loadPreset, listPresets } from './presets.js';
export { CONFIG_FILENAME, deepMerge, defaultConfigPath, loadConfig, writeConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { createExcludeFilter } from './ignore.js';
export type { ExcludeFilter } from './ignore.js';
