// packages/cli/src/commands/scan.ts

import { ScanHistoryStore, STAGE_LABELS, type PresetName, type SmartScanReport } from '@diskcare/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import { attachSpinner, formatReport } from '../render.js';
import { buildOrchestrator, createContext, readGlobals, withDatabase, withInterrupt, type CommandContext } from '../utils.js';

interface ScanOptions {
  json?: boolean;
  save: boolean;
  preset?: PresetName;
}

/** Run every stage with Ctrl-C cancellation. Resolves null when cancelled. */
export async function runScan(ctx: CommandContext, options: { json?: boolean }): Promise<SmartScanReport | null> {
  const orchestrator = buildOrchestrator(ctx);
  const spinner = options.json ? null : attachSpinner(orchestrator, 'Starting scan...');

  try {
    const outcome = await withInterrupt((token) => orchestrator.runSmartScan(token));
    spinner?.stop(outcome.status === 'completed');
    if (outcome.status === 'cancelled') {
      console.error(chalk.yellow(`Scan cancelled during ${STAGE_LABELS[outcome.stage]} (${Math.round(outcome.progress * 100)}%)`));
      return null;
    }
    return outcome.report;
  } catch (error) {
    spinner?.stop(false);
    throw error;
  }
}

export function saveReport(ctx: CommandContext, report: SmartScanReport): Promise<void> {
  return withDatabase((db) => {
    const store = new ScanHistoryStore(db);
    store.save(report);
    const pruned = store.prune(ctx.config.history.maxEntries);
    if (pruned > 0) ctx.logger.debug(`Pruned ${pruned} old scans from history`);
  });
}

export async function scanCommand(options: ScanOptions, command: Command): Promise<void> {
  const ctx = createContext(readGlobals(command), options.preset);

  const report = await runScan(ctx, { json: options.json });
  if (!report) {
    process.exitCode = 130;
    return;
  }

  if (options.save && ctx.config.history.enabled) {
    await saveReport(ctx, report);
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatReport(report));
  }
}
