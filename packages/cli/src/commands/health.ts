// packages/cli/src/commands/health.ts

import { calculateSystemScore, loadMetricsSnapshot, NodeMetricsProvider, systemScoreToRating } from '@diskcare/core';
import chalk from 'chalk';
import { homedir } from 'node:os';
import { formatScore } from '../render.js';

interface HealthOptions {
  metrics?: string;
  json?: boolean;
}

export async function healthCommand(options: HealthOptions): Promise<void> {
  const metrics = options.metrics
    ? await loadMetricsSnapshot(options.metrics)
    : await new NodeMetricsProvider(homedir()).sample();
  const { score, message } = calculateSystemScore(metrics);
  const rating = systemScoreToRating(score);

  if (options.json) {
    console.log(JSON.stringify({ score, rating, message, metrics }, null, 2));
    return;
  }
  console.log(formatScore(score, rating));
  console.log(chalk.gray(message));
}
