import { describe, expect, it } from 'vitest';
import {
  calculateSystemScore,
  CPU_RULE,
  diskThroughput,
  HEALTHY_SYSTEM_MESSAGE,
  linearPenalty,
  thermalPenalty,
} from '../../../src/scoring/system-score.js';
import { systemScoreToRating } from '../../../src/scoring/rating.js';

describe('linearPenalty', () => {
  it('is zero at or below the normal bound', () => {
    expect(linearPenalty(0, CPU_RULE)).toBe(0);
    expect(linearPenalty(30, CPU_RULE)).toBe(0);
  });

  it('ramps from half weight to full weight between normal and high', () => {
    expect(linearPenalty(50, CPU_RULE)).toBe(18.75);
    expect(linearPenalty(70, CPU_RULE)).toBe(25);
  });

  it('adds overflow past high, capped at half a weight', () => {
    expect(linearPenalty(90, CPU_RULE)).toBe(31.25);
    expect(linearPenalty(110, CPU_RULE)).toBe(37.5);
    expect(linearPenalty(500, CPU_RULE)).toBe(37.5);
  });

  it('ignores non-finite readings', () => {
    expect(linearPenalty(Number.NaN, CPU_RULE)).toBe(0);
  });
});

describe('thermalPenalty', () => {
  it('uses the highest matching step', () => {
    expect(thermalPenalty(undefined)).toBe(0);
    expect(thermalPenalty(79.9)).toBe(0);
    expect(thermalPenalty(80)).toBe(5);
    expect(thermalPenalty(95)).toBe(10);
  });
});

describe('diskThroughput', () => {
  it('is undefined when neither direction was measured', () => {
    expect(diskThroughput({ cpuUsagePercent: 0, memoryUsedPercent: 0, memoryPressure: 'normal' })).toBeUndefined();
  });

  it('treats a missing direction as zero', () => {
    expect(
      diskThroughput({ cpuUsagePercent: 0, memoryUsedPercent: 0, memoryPressure: 'normal', diskReadMBps: 50 }),
    ).toBe(50);
  });
});

describe('calculateSystemScore', () => {
  it('reports a healthy system', () => {
    const result = calculateSystemScore({ cpuUsagePercent: 50, memoryUsedPercent: 40, memoryPressure: 'normal' });
    // 100 - 18.75 rounds to 81
    expect(result.score).toBe(81);
    expect(result.message).toBe(HEALTHY_SYSTEM_MESSAGE);
  });

  it('names every reading above its high bound', () => {
    const result = calculateSystemScore({
      cpuUsagePercent: 85,
      memoryUsedPercent: 90,
      memoryPressure: 'critical',
      diskUsedPercent: 95,
      cpuTemperatureCelsius: 85,
      diskReadMBps: 300,
      diskWriteMBps: 200,
    });
    expect(result.score).toBe(0);
    expect(result.message).toBe(
      'High CPU 85%, memory 90%, memory pressure critical, disk 95% full, CPU temperature 85°C, disk I/O 500 MB/s',
    );
  });

  it('combines ramps, pressure and temperature', () => {
    const result = calculateSystemScore({
      cpuUsagePercent: 40,
      memoryUsedPercent: 70,
      memoryPressure: 'warning',
      cpuTemperatureCelsius: 80,
    });
    // 15.625 + 17.5 + 5 + 5 = 43.125
    expect(result.score).toBe(57);
    expect(result.message).toBe('High CPU temperature 80°C');
    expect(systemScoreToRating(result.score)).toBe('poor');
  });

  it('scores an idle system at 100', () => {
    const result = calculateSystemScore({
      cpuUsagePercent: 5,
      memoryUsedPercent: 20,
      memoryPressure: 'normal',
      diskUsedPercent: 40,
      diskReadMBps: 1,
      diskWriteMBps: 1,
    });
    expect(result).toEqual({ score: 100, message: HEALTHY_SYSTEM_MESSAGE });
  });
});
