// packages/cli/src/program.ts — Command registration

import { isPresetName, listPresets, VERSION, type PresetName } from '@diskcare/core';
import { Command, InvalidArgumentError } from 'commander';
import { fixCommand } from './commands/fix.js';
import { healthCommand } from './commands/health.js';
import { historyCommand } from './commands/history.js';
import { initCommand } from './commands/init.js';
import { scanCommand } from './commands/scan.js';
import { action } from './utils.js';

export function parsePreset(value: string): PresetName {
  if (!isPresetName(value)) {
    throw new InvalidArgumentError(`Preset must be one of: ${listPresets().join(', ')}`);
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('diskcare')
    .description('Scan for reclaimable disk space, score system health and clean up safely')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging')
    .option('--config <path>', 'Config file (default: ~/.diskcare.yml)');

  program
    .command('scan')
    .description('Run a full scan and print the health score and recommendations')
    .option('--json', 'Print the report as JSON', false)
    .option('--no-save', 'Do not record the scan in history')
    .option('--preset <name>', 'Scan preset (default|aggressive)', parsePreset)
    .action(action(scanCommand));

  program
    .command('fix')
    .description('Apply the recommendations that are safe to fix automatically')
    .option('--from-last', 'Use the most recent saved scan instead of scanning again', false)
    .option('--dry-run', 'Show what would be removed without deleting anything')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .action(action(fixCommand));

  program
    .command('health')
    .description('Score current CPU, memory and disk load')
    .option('--metrics <file>', 'Read a JSON metrics snapshot instead of sampling this machine')
    .option('--json', 'Print the score as JSON', false)
    .action(action(healthCommand));

  program
    .command('history')
    .description('List saved scans, newest first')
    .option('--limit <n>', 'Number of scans to show', parsePositiveInt, 20)
    .option('--json', 'Print entries as JSON', false)
    .action(action(historyCommand));

  program
    .command('init')
    .description('Write a config file')
    .option('--preset <name>', 'Preset to start from (default|aggressive)', parsePreset)
    .option('--force', 'Overwrite an existing config file', false)
    .action(action(initCommand));

  return program;
}
