// packages/cli/src/commands/history.ts

import { ScanHistoryStore } from '@diskcare/core';
import { formatHistory } from '../render.js';
import { withDatabase } from '../utils.js';

interface HistoryOptions {
  limit: number;
  json?: boolean;
}

export async function historyCommand(options: HistoryOptions): Promise<void> {
  const entries = await withDatabase((db) => new ScanHistoryStore(db).list(options.limit));
  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }
  console.log(formatHistory(entries));
}
