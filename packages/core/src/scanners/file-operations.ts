// packages/core/src/scanners/file-operations.ts

import { rm } from 'node:fs/promises';
import type { DeleteResult, FileOperations } from '../types/services.js';
import { errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { measurePath } from './fs-walk.js';

export interface NodeFileOperationsOptions {
  /** Report paths as processed without touching them */
  dryRun?: boolean;
  logger?: Logger;
}

export class NodeFileOperations implements FileOperations {
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(options: NodeFileOperationsOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /** Removes each path recursively. A path that no longer exists is an error. */
  async delete(paths: readonly string[]): Promise<DeleteResult> {
    let filesProcessed = 0;
    const errors: string[] = [];

    for (const path of paths) {
      if (this.dryRun) {
        this.logger.info(`[dry run] would remove ${path}`);
        filesProcessed++;
        continue;
      }
      try {
        await rm(path, { recursive: true });
        filesProcessed++;
      } catch (err) {
        errors.push(`${path}: ${errorMessage(err)}`);
      }
    }

    return { success: errors.length === 0, filesProcessed, errors };
  }

  measure(path: string): Promise<number> {
    return measurePath(path);
  }
}
