// packages/core/src/utils/index.ts -- barrel re-export

export { generateScanId, generateId } from './id.js';
export { ConfigError, ScanStateError, DatabaseError, errorMessage } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { formatBytes, formatCount } from './format.js';
