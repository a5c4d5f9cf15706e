// packages/cli/src/commands/fix.ts

import { describeFixResult, formatBytes, ScanHistoryStore, type SmartScanReport } from '@diskcare/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import { confirmFix } from '../prompts.js';
import { attachSpinner, formatRecommendation } from '../render.js';
import { buildOrchestrator, createContext, readGlobals, withDatabase, withInterrupt } from '../utils.js';
import { runScan, saveReport } from './scan.js';

interface FixOptions {
  fromLast?: boolean;
  dryRun?: boolean;
  yes?: boolean;
}

export async function fixCommand(options: FixOptions, command: Command): Promise<void> {
  const ctx = createContext(readGlobals(command));

  let report: SmartScanReport | null;
  if (options.fromLast) {
    report = await withDatabase((db) => new ScanHistoryStore(db).latest());
    if (!report) {
      throw new Error('No saved scan found. Run "diskcare scan" first.');
    }
  } else {
    report = await runScan(ctx, {});
    if (!report) {
      process.exitCode = 130;
      return;
    }
    if (ctx.config.history.enabled) await saveReport(ctx, report);
  }

  const safe = report.recommendations.filter((rec) => rec.safeToFix);
  if (safe.length === 0) {
    console.log(chalk.green('Nothing safe to fix automatically.'));
    return;
  }

  const total = safe.reduce((sum, rec) => sum + rec.spaceToReclaim, 0);
  console.log(chalk.bold(`Safe fixes (${formatBytes(total)}):`));
  safe.forEach((rec, i) => console.log(formatRecommendation(rec, i)));

  const dryRun = options.dryRun ?? ctx.config.fix.dryRun;
  if (!dryRun && !options.yes) {
    if (!process.stdin.isTTY) {
      throw new Error('Refusing to delete files without confirmation. Re-run with --yes.');
    }
    if (!(await confirmFix(`Delete these items and free about ${formatBytes(total)}?`))) {
      console.log(chalk.gray('Aborted.'));
      return;
    }
  }

  const orchestrator = buildOrchestrator(ctx, { dryRun });
  const spinner = attachSpinner(orchestrator, dryRun ? 'Dry run...' : 'Cleaning up...');
  const result = await withInterrupt((token) => orchestrator.fixRecommendations(safe, token));
  spinner.stop(result.errors === 0 && !result.cancelled);

  const message = describeFixResult(result);
  console.log(result.errors > 0 || result.cancelled ? chalk.yellow(message) : chalk.green(message));
  if (dryRun) console.log(chalk.gray('Dry run: nothing was deleted.'));
  if (result.cancelled) process.exitCode = 130;
}
