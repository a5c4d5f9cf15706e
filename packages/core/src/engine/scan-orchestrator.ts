// packages/core/src/engine/scan-orchestrator.ts — Staged scan pipeline over a lock-guarded aggregate

import { EventEmitter } from 'eventemitter3';
import {
  emptyAppIssueCategory,
  emptyJunkCategory,
  emptyPerformanceCategory,
  emptyPrivacyCategory,
  flaggedItemCount,
  reclaimableBytes,
} from '../findings/categories.js';
import { RecommendationGenerator } from '../recommendations/generator.js';
import { ScoreCalculator } from '../scoring/score-calculator.js';
import type { ScanEvent } from '../types/events.js';
import type {
  AppIssueCategory,
  DiskUsageSummary,
  FixResult,
  JunkCategory,
  PerformanceCategory,
  PrivacyCategory,
  Recommendation,
  ScanResult,
  ScanStage,
  SmartScanReport,
  StageOutcome,
} from '../types/scan.js';
import { SCAN_STAGES, STAGE_LABELS, STAGE_PROGRESS_WEIGHTS } from '../types/scan.js';
import type { CategoryScanner, DiskUsageProvider, FileOperations } from '../types/services.js';
import { MAX_STAGE_PROGRESS } from '../utils/constants.js';
import { errorMessage, ScanStateError } from '../utils/errors.js';
import { generateScanId } from '../utils/id.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { CancellationError, type CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { FixExecutor } from './fix-executor.js';
import { Mutex } from './mutex.js';

interface OrchestratorEvents {
  event: (event: ScanEvent) => void;
}

/** Category snapshots are undefined until their stage has completed. */
export interface ScanAggregate {
  readonly diskUsage?: DiskUsageSummary;
  readonly junkFiles?: JunkCategory;
  readonly performanceIssues?: PerformanceCategory;
  readonly appIssues?: AppIssueCategory;
  readonly privacyIssues?: PrivacyCategory;
  readonly recommendations: readonly Recommendation[];
  readonly progress: number;
}

export type ScanPhase = 'idle' | 'scanning' | 'cancelled';

export interface ScanSnapshot extends ScanAggregate {
  scanId: string | null;
  phase: ScanPhase;
  /** Last stage started, whether or not it finished */
  currentStage: ScanStage | null;
  stageInFlight: boolean;
  completedStages: ScanStage[];
}

export type SmartScanOutcome =
  | { status: 'completed'; report: SmartScanReport }
  | { status: 'cancelled'; stage: ScanStage; progress: number };

export interface ScanOrchestratorOptions {
  scanner: CategoryScanner;
  diskUsageProvider?: DiskUsageProvider;
  /** Required for fixRecommendations */
  fileOperations?: FileOperations;
  scoreCalculator?: ScoreCalculator;
  recommendationGenerator?: RecommendationGenerator;
  logger?: Logger;
  clock?: () => Date;
}

type AggregatePatch = Partial<Omit<ScanAggregate, 'recommendations' | 'progress'>>;

interface ScanState {
  phase: ScanPhase;
  scanId: string | null;
  startedAt: number;
  aggregate: ScanAggregate;
  completedCount: number;
  currentStage: ScanStage | null;
  inFlight: ScanStage | null;
  /** Bumped whenever a stage starts; finalize only memoizes for an unchanged generation */
  generation: number;
  report: SmartScanReport | null;
}

const EMPTY_AGGREGATE: ScanAggregate = Object.freeze({ recommendations: Object.freeze([]), progress: 0 });

/** Sum of the weights of the first `completed` stages, capped below 1. */
export function cumulativeProgress(completed: number): number {
  const sum = SCAN_STAGES.slice(0, completed).reduce((acc, stage) => acc + STAGE_PROGRESS_WEIGHTS[stage], 0);
  return Math.min(Math.round(sum * 1000) / 1000, MAX_STAGE_PROGRESS);
}

export class ScanOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly scanner: CategoryScanner;
  private readonly diskUsageProvider: DiskUsageProvider | undefined;
  private readonly scoreCalculator: ScoreCalculator;
  private readonly recommendationGenerator: RecommendationGenerator;
  private readonly fixExecutor: FixExecutor | undefined;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly lock = new Mutex();
  private state: ScanState = {
    phase: 'idle',
    scanId: null,
    startedAt: 0,
    aggregate: EMPTY_AGGREGATE,
    completedCount: 0,
    currentStage: null,
    inFlight: null,
    generation: 0,
    report: null,
  };

  constructor(options: ScanOrchestratorOptions) {
    super();
    this.scanner = options.scanner;
    this.diskUsageProvider = options.diskUsageProvider;
    this.logger = (options.logger ?? silentLogger).child('scan');
    this.scoreCalculator = options.scoreCalculator ?? new ScoreCalculator(this.logger);
    this.recommendationGenerator = options.recommendationGenerator ?? new RecommendationGenerator(this.logger);
    this.clock = options.clock ?? (() => new Date());
    this.eventBus = new EventBus(this.clock);
    this.fixExecutor = options.fileOperations
      ? new FixExecutor({ fileOperations: options.fileOperations, eventBus: this.eventBus, logger: this.logger })
      : undefined;

    // Forward all events from eventBus to this orchestrator
    this.eventBus.on('event', (event) => this.emit('event', event));
  }

  /**
   * Run one stage. Stages must be called in SCAN_STAGES order; 'preparing'
   * starts a new scan. Resolves with the cumulative progress, or with
   * status 'cancelled' when the token fired before the stage could merge.
   */
  async runStage(stage: ScanStage, token?: CancellationToken): Promise<StageOutcome> {
    const { scanId, fresh } = await this.lock.runExclusive(() => this.beginStage(stage));

    const started = this.clock().getTime();
    let patch: AggregatePatch | undefined;
    // Anything that throws here, listeners included, must release the in-flight slot
    try {
      if (fresh) {
        this.eventBus.emitEvent({ type: 'scan.started', scanId });
      }
      this.eventBus.emitEvent({ type: 'stage.started', stage });
      this.logger.debug(`Stage ${STAGE_LABELS[stage]} started`);
      patch = await this.performStage(stage, token);
    } catch (err) {
      if (!(err instanceof CancellationError)) {
        await this.lock.runExclusive(() => {
          this.state.inFlight = null;
        });
        throw err;
      }
    }

    if (patch === undefined || token?.isCancelled) {
      return this.cancelStage(stage);
    }
    return this.completeStage(stage, patch, this.clock().getTime() - started);
  }

  /** Run every stage in order, then finalize. */
  async runSmartScan(token?: CancellationToken): Promise<SmartScanOutcome> {
    for (const stage of SCAN_STAGES) {
      const outcome = await this.runStage(stage, token);
      if (outcome.status === 'cancelled') {
        return { status: 'cancelled', stage, progress: outcome.progress };
      }
    }
    return { status: 'completed', report: await this.finalizeScan() };
  }

  /**
   * Score the aggregate and build recommendations. Only a scan that has
   * run every stage through 'complete' can be finalized; categories the
   * scanner did not provide count as empty. Repeated calls with no stage
   * in between return the same report object.
   */
  async finalizeScan(): Promise<SmartScanReport> {
    const view = await this.lock.runExclusive(() => {
      const s = this.state;
      if (s.inFlight) {
        throw new ScanStateError(`Cannot finalize while stage "${s.inFlight}" is running`, s.inFlight);
      }
      if (s.phase === 'cancelled') {
        throw new ScanStateError('Scan was cancelled; run "preparing" to start a new scan', s.currentStage ?? undefined);
      }
      if (s.phase === 'idle' || s.scanId === null) {
        throw new ScanStateError('Cannot finalize before the "preparing" stage has run');
      }
      if (s.completedCount < SCAN_STAGES.length) {
        const pending = SCAN_STAGES[s.completedCount];
        throw new ScanStateError(`Cannot finalize before the "complete" stage has run; next is "${pending}"`, pending);
      }
      return { report: s.report, aggregate: s.aggregate, generation: s.generation, scanId: s.scanId, startedAt: s.startedAt };
    });
    if (view.report) return view.report;

    const report = this.buildReport(view.aggregate, view.scanId, view.startedAt);

    const stored = await this.lock.runExclusive(() => {
      const s = this.state;
      if (s.generation !== view.generation) return { report, fresh: false };
      if (s.report) return { report: s.report, fresh: false };
      s.report = report;
      s.aggregate = { ...s.aggregate, recommendations: report.recommendations };
      return { report, fresh: true };
    });

    if (stored.fresh) {
      const { result } = stored.report;
      this.logger.info(`Scan ${result.id} finalized: score ${result.healthScore} (${result.rating})`);
      this.eventBus.emitEvent({
        type: 'scan.finalized',
        scanId: result.id,
        healthScore: result.healthScore,
        rating: result.rating,
        recommendationCount: stored.report.recommendations.length,
        totalReclaimableSpace: result.totalReclaimableSpace,
      });
    }
    return stored.report;
  }

  async fixRecommendations(recommendations: readonly Recommendation[], token?: CancellationToken): Promise<FixResult> {
    if (!this.fixExecutor) {
      throw new ScanStateError('No file operations configured; cannot apply fixes');
    }
    return this.fixExecutor.fix(recommendations, token);
  }

  /** Reclaimable bytes across populated categories; undefined before any category is in. */
  async partialSpaceFoundBytes(): Promise<number | undefined> {
    return this.lock.runExclusive(() => {
      const agg = this.state.aggregate;
      if (!agg.junkFiles && !agg.performanceIssues && !agg.appIssues) return undefined;
      return reclaimableBytes(agg);
    });
  }

  /** Flagged items across populated categories; undefined before any category is in. */
  async partialFlaggedCount(): Promise<number | undefined> {
    return this.lock.runExclusive(() => {
      const agg = this.state.aggregate;
      if (!agg.junkFiles && !agg.performanceIssues && !agg.appIssues) return undefined;
      return flaggedItemCount(agg);
    });
  }

  async snapshot(): Promise<ScanSnapshot> {
    return this.lock.runExclusive(() => {
      const s = this.state;
      return {
        ...s.aggregate,
        scanId: s.scanId,
        phase: s.phase,
        currentStage: s.currentStage,
        stageInFlight: s.inFlight !== null,
        completedStages: SCAN_STAGES.slice(0, s.completedCount),
      };
    });
  }

  private beginStage(stage: ScanStage): { scanId: string; fresh: boolean } {
    const s = this.state;
    if (s.inFlight) {
      throw new ScanStateError(`Stage "${stage}" requested while "${s.inFlight}" is still running`, stage);
    }

    if (stage === 'preparing') {
      const scanId = generateScanId();
      this.state = {
        phase: 'scanning',
        scanId,
        startedAt: this.clock().getTime(),
        aggregate: EMPTY_AGGREGATE,
        completedCount: 0,
        currentStage: stage,
        inFlight: stage,
        generation: s.generation + 1,
        report: null,
      };
      return { scanId, fresh: true };
    }

    if (s.phase === 'idle' || s.scanId === null) {
      throw new ScanStateError(`Stage "${stage}" requested before "preparing"`, stage);
    }
    if (s.phase === 'cancelled') {
      throw new ScanStateError(`Stage "${stage}" requested after the scan was cancelled`, stage);
    }
    const expected = SCAN_STAGES[s.completedCount];
    if (expected === undefined) {
      throw new ScanStateError(`Stage "${stage}" requested after the scan completed`, stage);
    }
    if (stage !== expected) {
      throw new ScanStateError(`Stage "${stage}" is out of order; expected "${expected}"`, stage);
    }

    s.currentStage = stage;
    s.inFlight = stage;
    s.generation += 1;
    s.report = null;
    return { scanId: s.scanId, fresh: false };
  }

  private async performStage(stage: ScanStage, token?: CancellationToken): Promise<AggregatePatch> {
    token?.throwIfCancelled();

    switch (stage) {
      case 'preparing':
        return { diskUsage: await this.readDiskUsage(stage) };
      case 'scanning-disk':
        return {
          junkFiles: await this.scanCategory(stage, 'Junk file', () => this.scanner.scanJunkFiles(token), emptyJunkCategory),
        };
      case 'checking-apps':
        return {
          appIssues: await this.scanCategory(stage, 'App', () => this.scanner.scanAppIssues(token), emptyAppIssueCategory),
        };
      case 'analyzing-system': {
        const performanceIssues = await this.scanCategory(
          stage,
          'Performance',
          () => this.scanner.scanPerformanceIssues(token),
          emptyPerformanceCategory,
        );
        token?.throwIfCancelled();
        const scanPrivacy = this.scanner.scanPrivacyIssues?.bind(this.scanner);
        if (!scanPrivacy) return { performanceIssues };
        const privacyIssues = await this.scanCategory(stage, 'Privacy', () => scanPrivacy(token), emptyPrivacyCategory);
        return { performanceIssues, privacyIssues };
      }
      case 'complete':
        return {};
    }
  }

  private async readDiskUsage(stage: ScanStage): Promise<DiskUsageSummary | undefined> {
    if (!this.diskUsageProvider) return undefined;
    try {
      return await this.diskUsageProvider.getDiskUsage();
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Disk usage unavailable: ${message}`);
      this.eventBus.emitEvent({ type: 'stage.degraded', stage, error: message });
      return undefined;
    }
  }

  /** A failing scanner yields the empty snapshot; cancellation passes through. */
  private async scanCategory<T>(
    stage: ScanStage,
    label: string,
    run: () => Promise<T>,
    fallback: () => T,
  ): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof CancellationError) throw err;
      const message = errorMessage(err);
      this.logger.warn(`${label} scan failed, continuing with empty findings: ${message}`);
      this.eventBus.emitEvent({ type: 'stage.degraded', stage, error: message });
      return fallback();
    }
  }

  private async completeStage(stage: ScanStage, patch: AggregatePatch, durationMs: number): Promise<StageOutcome> {
    const progress = await this.lock.runExclusive(() => {
      const s = this.state;
      const completedCount = s.completedCount + 1;
      const next = cumulativeProgress(completedCount);
      let aggregate: ScanAggregate = { ...s.aggregate, ...patch, progress: next };
      if (patch.junkFiles && aggregate.diskUsage) {
        aggregate = {
          ...aggregate,
          diskUsage: {
            ...aggregate.diskUsage,
            cacheSize: patch.junkFiles.cacheFiles.size,
            logSize: patch.junkFiles.logFiles.size,
            tempSize: patch.junkFiles.tempFiles.size,
          },
        };
      }
      s.aggregate = aggregate;
      s.completedCount = completedCount;
      s.inFlight = null;
      return next;
    });

    this.eventBus.emitEvent({ type: 'stage.completed', stage, progress, durationMs });
    this.logger.debug(`Stage ${STAGE_LABELS[stage]} completed in ${durationMs}ms (progress ${progress})`);
    return { stage, status: 'completed', progress };
  }

  private async cancelStage(stage: ScanStage): Promise<StageOutcome> {
    const progress = await this.lock.runExclusive(() => {
      this.state.phase = 'cancelled';
      this.state.inFlight = null;
      return this.state.aggregate.progress;
    });
    this.logger.info(`Scan cancelled during ${STAGE_LABELS[stage]}`);
    this.eventBus.emitEvent({ type: 'scan.cancelled', stage, progress });
    return { stage, status: 'cancelled', progress };
  }

  private buildReport(aggregate: ScanAggregate, scanId: string, startedAt: number): SmartScanReport {
    const junkFiles = aggregate.junkFiles ?? emptyJunkCategory();
    const performanceIssues = aggregate.performanceIssues ?? emptyPerformanceCategory();
    const appIssues = aggregate.appIssues ?? emptyAppIssueCategory();
    const privacyIssues = aggregate.privacyIssues ?? emptyPrivacyCategory();
    const diskUsage = aggregate.diskUsage;

    const { score, breakdown } = this.scoreCalculator.score({
      diskUsage,
      junkFiles,
      performanceIssues,
      appIssues,
      privacyIssues,
    });
    const finishedAt = this.clock();

    const result: ScanResult = Object.freeze({
      id: scanId,
      timestamp: finishedAt.toISOString(),
      healthScore: score,
      rating: this.scoreCalculator.rating(score),
      diskUsage,
      junkFiles,
      performanceIssues,
      appIssues,
      privacyIssues,
      breakdown: Object.freeze(breakdown),
      totalReclaimableSpace: reclaimableBytes({ junkFiles, performanceIssues, appIssues }),
    });

    return Object.freeze({
      result,
      recommendations: Object.freeze(this.recommendationGenerator.generate(result)),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt),
    });
  }
}
