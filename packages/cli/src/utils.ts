// packages/cli/src/utils.ts — Shared command plumbing

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  CancellationToken,
  createLogger,
  FileSystemScanner,
  loadConfig,
  NodeFileOperations,
  openDatabase,
  ScanOrchestrator,
  StatfsDiskUsageProvider,
  type DiskcareConfig,
  type Logger,
  type PresetName,
} from '@diskcare/core';
import chalk from 'chalk';
import type { Command } from 'commander';

export interface GlobalOptions {
  verbose: boolean;
  config?: string;
}

export function readGlobals(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    verbose: opts.verbose === true,
    config: typeof opts.config === 'string' ? opts.config : undefined,
  };
}

export function getDataDir(home: string = homedir()): string {
  return join(home, '.diskcare');
}

export function getDbPath(home?: string): string {
  const dbDir = join(getDataDir(home), 'db');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, 'history.db');
}

/** Run `fn` with a history database connection that is closed afterwards. */
export async function withDatabase<T>(fn: (db: ReturnType<typeof openDatabase>) => Promise<T> | T): Promise<T> {
  const db = openDatabase(getDbPath());
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export interface CommandContext {
  config: DiskcareConfig;
  logger: Logger;
}

export function createContext(globals: GlobalOptions, preset?: PresetName): CommandContext {
  const config = loadConfig({ configPath: globals.config, preset });
  const logger = createLogger(globals.verbose ? 'debug' : config.advanced.logLevel);
  return { config, logger };
}

export function buildOrchestrator(ctx: CommandContext, options: { dryRun?: boolean } = {}): ScanOrchestrator {
  return new ScanOrchestrator({
    scanner: new FileSystemScanner(ctx.config.scan, { logger: ctx.logger }),
    diskUsageProvider: new StatfsDiskUsageProvider(homedir()),
    fileOperations: new NodeFileOperations({ dryRun: options.dryRun ?? ctx.config.fix.dryRun, logger: ctx.logger }),
    logger: ctx.logger,
  });
}

/** Run `fn` with a token that cancels on Ctrl-C. */
export async function withInterrupt<T>(fn: (token: CancellationToken) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);
  try {
    return await fn(CancellationToken.fromSignal(controller.signal));
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/**
 * Wrap a command action: errors are printed in red and set a failing
 * exit code instead of escaping as unhandled rejections.
 */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  };
}
