// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { ScanHistoryStore } from './scan-history-store.js';
export type { ScanHistoryEntry } from './scan-history-store.js';
export { recommendationListSchema, recommendationSchema, scanResultSchema } from './report-schema.js';
