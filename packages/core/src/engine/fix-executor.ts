// packages/core/src/engine/fix-executor.ts — Applies safe recommendations through FileOperations

import type { DeleteResult, FileOperations } from '../types/services.js';
import type { FixResult, Recommendation } from '../types/scan.js';
import { errorMessage } from '../utils/errors.js';
import { formatBytes } from '../utils/format.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import type { EventBus } from './event-bus.js';

export interface FixExecutorOptions {
  fileOperations: FileOperations;
  eventBus?: EventBus;
  logger?: Logger;
}

export class FixExecutor {
  private readonly fileOperations: FileOperations;
  private readonly eventBus: EventBus | undefined;
  private readonly logger: Logger;

  constructor(options: FixExecutorOptions) {
    this.fileOperations = options.fileOperations;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Delete the affected paths of every safe recommendation, in order.
   * Unsafe recommendations are skipped. A failed path is counted and the
   * batch continues. Cancellation is checked before each path.
   */
  async fix(recommendations: readonly Recommendation[], token?: CancellationToken): Promise<FixResult> {
    const result: FixResult = { itemsFixed: 0, spaceFreed: 0, errors: 0, cancelled: false };
    this.eventBus?.emitEvent({ type: 'fix.started', recommendationCount: recommendations.length });

    outer: for (const recommendation of recommendations) {
      if (!recommendation.safeToFix) {
        this.logger.debug(`Skipping ${recommendation.type}: requires review`);
        continue;
      }

      for (const path of recommendation.affectedPaths) {
        if (token?.isCancelled) {
          result.cancelled = true;
          break outer;
        }

        const bytes = await this.measure(path);
        const outcome = await this.remove(path);

        if (outcome.success) {
          result.itemsFixed += outcome.filesProcessed;
          result.spaceFreed += bytes;
        } else {
          result.errors += Math.max(outcome.errors.length, 1);
          this.logger.warn(`Failed to remove ${path}: ${outcome.errors.join('; ')}`);
        }

        this.eventBus?.emitEvent({
          type: 'fix.item',
          path,
          ok: outcome.success,
          bytes: outcome.success ? bytes : 0,
          error: outcome.success ? undefined : outcome.errors[0],
        });
      }
    }

    this.logger.info(describeFixResult(result));
    this.eventBus?.emitEvent({ type: 'fix.completed', ...result });
    return result;
  }

  private async measure(path: string): Promise<number> {
    try {
      return await this.fileOperations.measure(path);
    } catch (err) {
      this.logger.debug(`Could not measure ${path}: ${errorMessage(err)}`);
      return 0;
    }
  }

  private async remove(path: string): Promise<DeleteResult> {
    try {
      return await this.fileOperations.delete([path]);
    } catch (err) {
      return { success: false, filesProcessed: 0, errors: [errorMessage(err)] };
    }
  }
}

export function describeFixResult(result: FixResult): string {
  const freed = formatBytes(result.spaceFreed);
  const errors = result.errors > 0 ? ` ${result.errors} items had errors.` : '';
  if (result.cancelled) {
    return `Cancelled after fixing ${result.itemsFixed} items, freed ${freed}.${errors}`;
  }
  if (result.errors > 0) {
    return `Fixed ${result.itemsFixed} items, freed ${freed}.${errors}`;
  }
  return `Successfully fixed ${result.itemsFixed} items and freed ${freed}!`;
}
