import { describe, expect, it, vi } from 'vitest';
import { CancellationToken } from '../../../src/engine/cancellation.js';
import { cumulativeProgress, ScanOrchestrator, type ScanOrchestratorOptions } from '../../../src/engine/scan-orchestrator.js';
import type { ScanEvent } from '../../../src/types/events.js';
import type { DiskUsageSummary, JunkCategory } from '../../../src/types/scan.js';
import type { CategoryScanner, DiskUsageProvider } from '../../../src/types/services.js';
import { MB } from '../../../src/utils/constants.js';
import { ScanStateError } from '../../../src/utils/errors.js';
import { appIssues, diskAt, junk, performance, privacy, sizedGroup } from '../../helpers/fixtures.js';

const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');

function fakeScanner(overrides: Partial<CategoryScanner> = {}): CategoryScanner {
  return {
    scanJunkFiles: async () => junk({ tempFiles: sizedGroup('Temp', [600 * MB]) }),
    scanAppIssues: async () => appIssues(),
    scanPerformanceIssues: async () => performance(),
    ...overrides,
  };
}

function fixedDisk(usage: DiskUsageSummary | undefined): DiskUsageProvider {
  return { getDiskUsage: async () => usage };
}

function createOrchestrator(options: Partial<ScanOrchestratorOptions> = {}) {
  const events: ScanEvent[] = [];
  const orchestrator = new ScanOrchestrator({
    scanner: fakeScanner(),
    diskUsageProvider: fixedDisk(diskAt(92)),
    clock: () => FIXED_NOW,
    ...options,
  });
  orchestrator.on('event', (event) => events.push(event));
  return { orchestrator, events };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('cumulativeProgress', () => {
  it('sums stage weights and holds at 0.95', () => {
    expect([0, 1, 2, 3, 4, 5].map(cumulativeProgress)).toEqual([0, 0.05, 0.45, 0.75, 0.95, 0.95]);
  });
});

describe('ScanOrchestrator stages', () => {
  it('reports cumulative progress after each stage', async () => {
    const { orchestrator } = createOrchestrator();
    const progress: number[] = [];
    for (const stage of ['preparing', 'scanning-disk', 'checking-apps', 'analyzing-system', 'complete'] as const) {
      const outcome = await orchestrator.runStage(stage);
      expect(outcome.status).toBe('completed');
      progress.push(outcome.progress);
    }
    expect(progress).toEqual([0.05, 0.45, 0.75, 0.95, 0.95]);
  });

  it('rejects a stage before preparing', async () => {
    const { orchestrator } = createOrchestrator();
    await expect(orchestrator.runStage('scanning-disk')).rejects.toThrow(ScanStateError);
  });

  it('rejects stages out of order', async () => {
    const { orchestrator } = createOrchestrator();
    await orchestrator.runStage('preparing');
    await expect(orchestrator.runStage('checking-apps')).rejects.toThrow(
      'Stage "checking-apps" is out of order; expected "scanning-disk"',
    );
    // The rejected call leaves the scan where it was
    expect((await orchestrator.runStage('scanning-disk')).progress).toBe(0.45);
  });

  it('rejects stages after complete', async () => {
    const { orchestrator } = createOrchestrator();
    await orchestrator.runSmartScan();
    await expect(orchestrator.runStage('complete')).rejects.toThrow('after the scan completed');
  });

  it('rejects a stage while another is in flight', async () => {
    const gate = deferred<JunkCategory>();
    const entered = deferred<void>();
    const { orchestrator } = createOrchestrator({
      scanner: fakeScanner({
        scanJunkFiles: () => {
          entered.resolve();
          return gate.promise;
        },
      }),
    });

    await orchestrator.runStage('preparing');
    const pending = orchestrator.runStage('scanning-disk');
    await entered.promise;

    await expect(orchestrator.runStage('checking-apps')).rejects.toThrow(ScanStateError);
    await expect(orchestrator.runStage('preparing')).rejects.toThrow(ScanStateError);
    await expect(orchestrator.finalizeScan()).rejects.toThrow('Cannot finalize while stage "scanning-disk" is running');

    const snapshot = await orchestrator.snapshot();
    expect(snapshot.stageInFlight).toBe(true);
    expect(snapshot.currentStage).toBe('scanning-disk');
    expect(await orchestrator.partialSpaceFoundBytes()).toBeUndefined();

    gate.resolve(junk());
    expect((await pending).status).toBe('completed');
  });

  it('emits scan.started only for preparing', async () => {
    const { orchestrator, events } = createOrchestrator();
    await orchestrator.runStage('preparing');
    await orchestrator.runStage('scanning-disk');
    expect(events.filter((e) => e.type === 'scan.started')).toHaveLength(1);
    expect(events.map((e) => e.type)).toEqual([
      'scan.started',
      'stage.started',
      'stage.completed',
      'stage.started',
      'stage.completed',
    ]);
  });

  it('copies junk sizes into the disk usage summary', async () => {
    const { orchestrator } = createOrchestrator({
      scanner: fakeScanner({
        scanJunkFiles: async () =>
          junk({
            tempFiles: sizedGroup('Temp', [10]),
            cacheFiles: sizedGroup('Cache', [20]),
            logFiles: sizedGroup('Logs', [30]),
          }),
      }),
    });
    await orchestrator.runStage('preparing');
    await orchestrator.runStage('scanning-disk');
    const snapshot = await orchestrator.snapshot();
    expect(snapshot.diskUsage).toMatchObject({ tempSize: 10, cacheSize: 20, logSize: 30, usedSpace: 920 });
  });
});

describe('ScanOrchestrator partial results', () => {
  it('is undefined until a category arrives, then tracks it', async () => {
    const { orchestrator } = createOrchestrator();
    await orchestrator.runStage('preparing');
    expect(await orchestrator.partialSpaceFoundBytes()).toBeUndefined();
    expect(await orchestrator.partialFlaggedCount()).toBeUndefined();

    await orchestrator.runStage('scanning-disk');
    expect(await orchestrator.partialSpaceFoundBytes()).toBe(600 * MB);
    expect(await orchestrator.partialFlaggedCount()).toBe(1);
  });
});

describe('ScanOrchestrator cancellation', () => {
  it('discards a stage cancelled mid-scan and blocks finalize', async () => {
    const token = new CancellationToken();
    const { orchestrator, events } = createOrchestrator({
      scanner: fakeScanner({
        scanJunkFiles: async (t) => {
          t?.cancel('user');
          return junk({ tempFiles: sizedGroup('Temp', [600 * MB]) });
        },
      }),
    });

    expect((await orchestrator.runStage('preparing', token)).progress).toBe(0.05);
    const outcome = await orchestrator.runStage('scanning-disk', token);

    expect(outcome).toEqual({ stage: 'scanning-disk', status: 'cancelled', progress: 0.05 });
    const snapshot = await orchestrator.snapshot();
    expect(snapshot.phase).toBe('cancelled');
    expect(snapshot.diskUsage).toEqual(diskAt(92));
    expect(snapshot.junkFiles).toBeUndefined();
    expect(snapshot.progress).toBe(0.05);
    expect(snapshot.completedStages).toEqual(['preparing']);
    expect(await orchestrator.partialSpaceFoundBytes()).toBeUndefined();

    await expect(orchestrator.finalizeScan()).rejects.toThrow(ScanStateError);
    await expect(orchestrator.runStage('checking-apps')).rejects.toThrow('after the scan was cancelled');
    expect(events.at(-1)).toMatchObject({ type: 'scan.cancelled', stage: 'scanning-disk', progress: 0.05 });
  });

  it('cancels before running the scanner when the token already fired', async () => {
    const token = new CancellationToken();
    const scanJunkFiles = vi.fn(async () => junk());
    const { orchestrator } = createOrchestrator({ scanner: fakeScanner({ scanJunkFiles }) });

    await orchestrator.runStage('preparing', token);
    token.cancel();
    const outcome = await orchestrator.runStage('scanning-disk', token);

    expect(outcome.status).toBe('cancelled');
    expect(scanJunkFiles).not.toHaveBeenCalled();
  });

  it('skips the privacy scan once cancelled during performance', async () => {
    const token = new CancellationToken();
    const scanPrivacyIssues = vi.fn(async () => privacy());
    const { orchestrator } = createOrchestrator({
      scanner: fakeScanner({
        scanPerformanceIssues: async () => {
          token.cancel();
          return performance();
        },
        scanPrivacyIssues,
      }),
    });

    await orchestrator.runStage('preparing', token);
    await orchestrator.runStage('scanning-disk', token);
    await orchestrator.runStage('checking-apps', token);
    const outcome = await orchestrator.runStage('analyzing-system', token);

    expect(outcome).toEqual({ stage: 'analyzing-system', status: 'cancelled', progress: 0.75 });
    expect(scanPrivacyIssues).not.toHaveBeenCalled();
  });

  it('treats a CancellationError from the scanner as cancellation', async () => {
    const token = new CancellationToken();
    const { orchestrator } = createOrchestrator({
      scanner: fakeScanner({
        scanAppIssues: async (t) => {
          t?.cancel();
          t?.throwIfCancelled();
          return appIssues();
        },
      }),
    });
    const outcome = await orchestrator.runSmartScan(token);
    expect(outcome).toEqual({ status: 'cancelled', stage: 'checking-apps', progress: 0.45 });
  });

  it('starts over when preparing runs after a cancellation', async () => {
    const token = new CancellationToken();
    token.cancel();
    const { orchestrator } = createOrchestrator();
    await orchestrator.runStage('preparing', token);
    const first = await orchestrator.snapshot();
    expect(first.phase).toBe('cancelled');

    const outcome = await orchestrator.runSmartScan();
    expect(outcome.status).toBe('completed');
    const second = await orchestrator.snapshot();
    expect(second.phase).toBe('scanning');
    expect(second.scanId).not.toBe(first.scanId);
  });
});

describe('ScanOrchestrator degraded scans', () => {
  it('continues with empty findings when a scanner fails', async () => {
    const { orchestrator, events } = createOrchestrator({
      scanner: fakeScanner({
        scanAppIssues: async () => {
          throw new Error('permission denied');
        },
      }),
    });

    const outcome = await orchestrator.runSmartScan();
    expect(outcome.status).toBe('completed');
    const snapshot = await orchestrator.snapshot();
    expect(snapshot.appIssues).toEqual(appIssues());
    expect(events).toContainEqual({
      type: 'stage.degraded',
      stage: 'checking-apps',
      error: 'permission denied',
      timestamp: FIXED_NOW.toISOString(),
    });
  });

  it('scores unknown disk usage when the provider fails', async () => {
    const { orchestrator, events } = createOrchestrator({
      diskUsageProvider: {
        getDiskUsage: async () => {
          throw new Error('statfs failed');
        },
      },
    });

    const outcome = await orchestrator.runSmartScan();
    if (outcome.status !== 'completed') throw new Error('expected a completed scan');
    expect(outcome.report.result.diskUsage).toBeUndefined();
    expect(outcome.report.result.breakdown.disk).toBe(5);
    expect(events.some((e) => e.type === 'stage.degraded' && e.stage === 'preparing')).toBe(true);
  });
});

describe('ScanOrchestrator listener failures', () => {
  it('releases the stage when an event listener throws', async () => {
    const { orchestrator } = createOrchestrator();
    let failed = false;
    orchestrator.on('event', (event) => {
      if (event.type === 'stage.started' && !failed) {
        failed = true;
        throw new Error('listener failed');
      }
    });

    await expect(orchestrator.runStage('preparing')).rejects.toThrow('listener failed');
    expect((await orchestrator.snapshot()).stageInFlight).toBe(false);

    const outcome = await orchestrator.runStage('preparing');
    expect(outcome).toEqual({ stage: 'preparing', status: 'completed', progress: 0.05 });
  });

  it('releases the stage when a scan.started listener throws', async () => {
    const { orchestrator } = createOrchestrator();
    orchestrator.once('event', () => {
      throw new Error('listener failed');
    });

    await expect(orchestrator.runStage('preparing')).rejects.toThrow('listener failed');
    const snapshot = await orchestrator.snapshot();
    expect(snapshot.stageInFlight).toBe(false);
    expect(snapshot.completedStages).toEqual([]);

    const outcome = await orchestrator.runSmartScan();
    expect(outcome.status).toBe('completed');
  });
});

describe('ScanOrchestrator.finalizeScan', () => {
  it('rejects before preparing', async () => {
    const { orchestrator } = createOrchestrator();
    await expect(orchestrator.finalizeScan()).rejects.toThrow('Cannot finalize before the "preparing" stage has run');
  });

  it('scores and recommends from the aggregate', async () => {
    const { orchestrator } = createOrchestrator();
    const outcome = await orchestrator.runSmartScan();
    if (outcome.status !== 'completed') throw new Error('expected a completed scan');
    const { result, recommendations, durationMs } = outcome.report;

    // disk 92% -> 25, junk 600MB -> 3
    expect(result.breakdown).toEqual({ disk: 25, cache: 0, junk: 3, app: 0, orphaned: 0, privacy: 0 });
    expect(result.healthScore).toBe(72);
    expect(result.rating).toBe('fair');
    expect(result.totalReclaimableSpace).toBe(600 * MB);
    expect(result.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect(recommendations.map((r) => r.type)).toEqual(['temp-files']);
    expect(durationMs).toBe(0);

    const snapshot = await orchestrator.snapshot();
    expect(snapshot.recommendations).toEqual(recommendations);
  });

  it('rejects a scan that has not reached complete', async () => {
    const { orchestrator } = createOrchestrator();
    await orchestrator.runStage('preparing');
    await expect(orchestrator.finalizeScan()).rejects.toThrow(
      'Cannot finalize before the "complete" stage has run; next is "scanning-disk"',
    );

    await orchestrator.runStage('scanning-disk');
    await orchestrator.runStage('checking-apps');
    await orchestrator.runStage('analyzing-system');
    await expect(orchestrator.finalizeScan()).rejects.toThrow(ScanStateError);

    await orchestrator.runStage('complete');
    const report = await orchestrator.finalizeScan();
    expect(report.result.healthScore).toBe(72);
  });

  it('returns the same report until another scan starts', async () => {
    const { orchestrator, events } = createOrchestrator();
    const outcome = await orchestrator.runSmartScan();
    if (outcome.status !== 'completed') throw new Error('expected a completed scan');
    const first = outcome.report;

    expect(await orchestrator.finalizeScan()).toBe(first);
    expect(events.filter((e) => e.type === 'scan.finalized')).toHaveLength(1);

    const again = await orchestrator.runSmartScan();
    if (again.status !== 'completed') throw new Error('expected a completed scan');
    expect(again.report).not.toBe(first);
    expect(again.report.result.id).not.toBe(first.result.id);
    expect(again.report.result.healthScore).toBe(first.result.healthScore);
  });

  it('treats privacy as empty when the scanner has no privacy scan', async () => {
    const { orchestrator } = createOrchestrator();
    const outcome = await orchestrator.runSmartScan();
    if (outcome.status !== 'completed') throw new Error('expected a completed scan');
    expect(outcome.report.result.privacyIssues).toEqual(privacy());
    expect(outcome.report.result.breakdown.privacy).toBe(0);
  });

  it('includes privacy findings when the scanner provides them', async () => {
    const { orchestrator } = createOrchestrator({
      scanner: fakeScanner({
        scanPrivacyIssues: async () => privacy({ downloadHistory: sizedGroup('Downloads', [2048 * MB]) }),
      }),
    });
    const outcome = await orchestrator.runSmartScan();
    if (outcome.status !== 'completed') throw new Error('expected a completed scan');
    expect(outcome.report.result.breakdown.privacy).toBe(2);
  });
});

describe('ScanOrchestrator.fixRecommendations', () => {
  it('requires file operations', async () => {
    const { orchestrator } = createOrchestrator();
    await expect(orchestrator.fixRecommendations([])).rejects.toThrow(ScanStateError);
  });

  it('applies safe recommendations and forwards fix events', async () => {
    const deleteFn = vi.fn(async (paths: readonly string[]) => ({ success: true, filesProcessed: paths.length, errors: [] }));
    const { orchestrator, events } = createOrchestrator({
      fileOperations: { delete: deleteFn, measure: async () => 600 * MB },
    });

    const outcome = await orchestrator.runSmartScan();
    if (outcome.status !== 'completed') throw new Error('expected a completed scan');
    const result = await orchestrator.fixRecommendations(outcome.report.recommendations);

    expect(result).toEqual({ itemsFixed: 1, spaceFreed: 600 * MB, errors: 0, cancelled: false });
    expect(deleteFn).toHaveBeenCalledWith(['/data/temp/0']);
    expect(events.at(-1)?.type).toBe('fix.completed');
  });
});
