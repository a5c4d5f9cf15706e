// packages/cli/src/render.ts — Terminal rendering for scan reports and events

import {
  formatBytes,
  PENALTY_ORDER,
  RATING_DESCRIPTIONS,
  STAGE_LABELS,
  type HealthRating,
  type PenaltyBreakdown,
  type Recommendation,
  type ScanEvent,
  type ScanHistoryEntry,
  type ScanOrchestrator,
  type SmartScanReport,
} from '@diskcare/core';
import chalk from 'chalk';
import ora from 'ora';

const ratingColors: Record<HealthRating, (text: string) => string> = {
  excellent: chalk.green,
  good: chalk.green,
  fair: chalk.yellow,
  poor: chalk.red,
  critical: chalk.red,
};

const PENALTY_LABELS: Record<keyof PenaltyBreakdown, string> = {
  disk: 'Disk usage',
  cache: 'Caches',
  junk: 'Junk files',
  app: 'Applications',
  orphaned: 'Orphaned files',
  privacy: 'Privacy',
};

export function formatScore(score: number, rating: HealthRating): string {
  const color = ratingColors[rating];
  return `${color(`Health score: ${score}/100 (${rating})`)}\n${chalk.gray(RATING_DESCRIPTIONS[rating])}`;
}

/** Only categories that cost points are listed. */
export function formatBreakdown(breakdown: PenaltyBreakdown): string[] {
  return PENALTY_ORDER.filter((category) => breakdown[category] > 0).map(
    (category) => `  ${PENALTY_LABELS[category].padEnd(15)} -${breakdown[category]}`,
  );
}

export function formatRecommendation(rec: Recommendation, index: number): string {
  const space = rec.spaceToReclaim > 0 ? formatBytes(rec.spaceToReclaim) : '-';
  const tag = rec.safeToFix ? chalk.green('[safe]') : chalk.yellow('[review]');
  const impact = rec.scoreImpact > 0 ? chalk.cyan(` +${rec.scoreImpact} pts`) : '';
  return `${index + 1}. ${rec.title}  ${space}${impact} ${tag}\n   ${chalk.gray(rec.description)}`;
}

export function formatReport(report: SmartScanReport): string {
  const { result, recommendations } = report;
  const lines = [formatScore(result.healthScore, result.rating)];

  const breakdown = formatBreakdown(result.breakdown);
  if (breakdown.length > 0) {
    lines.push('', chalk.bold('Penalties'), ...breakdown);
  }

  lines.push('', `Reclaimable: ${formatBytes(result.totalReclaimableSpace)}`);

  if (recommendations.length === 0) {
    lines.push('', chalk.green('No recommendations. Nothing to clean up.'));
  } else {
    lines.push('', chalk.bold('Recommendations'));
    recommendations.forEach((rec, i) => lines.push(formatRecommendation(rec, i)));
  }
  return lines.join('\n');
}

export function formatHistory(entries: readonly ScanHistoryEntry[]): string {
  if (entries.length === 0) return chalk.gray('No saved scans.');
  return entries
    .map((entry) => {
      const color = ratingColors[entry.rating];
      const score = color(`${String(entry.healthScore).padStart(3)} ${entry.rating.padEnd(9)}`);
      return `${entry.scannedAt}  ${score}  ${formatBytes(entry.totalReclaimable).padStart(9)}  ${entry.recommendationCount} recs  ${chalk.gray(entry.id)}`;
    })
    .join('\n');
}

/** Spinner text for a progress event, or null for events the spinner ignores. */
export function describeStageEvent(event: ScanEvent): string | null {
  switch (event.type) {
    case 'stage.started':
      return `${STAGE_LABELS[event.stage]}...`;
    case 'stage.completed':
      return `${STAGE_LABELS[event.stage]} done (${Math.round(event.progress * 100)}%)`;
    case 'stage.degraded':
      return `${STAGE_LABELS[event.stage]}: ${event.error}`;
    case 'fix.item':
      return event.ok ? `Removed ${event.path}` : `Failed ${event.path}`;
    default:
      return null;
  }
}

/** An ora spinner on stderr that follows the orchestrator's events until stopped. */
export function attachSpinner(orchestrator: ScanOrchestrator, initialText: string): { stop(success: boolean): void } {
  const spinner = ora({ text: initialText }).start();
  const listener = (event: ScanEvent) => {
    if (event.type === 'stage.degraded') {
      spinner.warn(describeStageEvent(event) ?? undefined);
      spinner.start();
      return;
    }
    const text = describeStageEvent(event);
    if (text) spinner.text = text;
  };
  orchestrator.on('event', listener);

  return {
    stop(success: boolean) {
      orchestrator.off('event', listener);
      if (success) {
        spinner.succeed();
      } else {
        spinner.fail();
      }
    },
  };
}
