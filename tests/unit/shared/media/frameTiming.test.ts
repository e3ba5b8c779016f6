import { describe, expect, test } from 'vitest';

import { calculateFrameTimingStats, totalDurationMs } from '../../../../src/shared/media/frameTiming.js';

describe('frame timing utilities', () => {
  test('calculateFrameTimingStats returns deterministic stats', () => {
    const delays = [33, 33, 34, 33];
    const stats = calculateFrameTimingStats(delays);
    expect(stats.averageDelayMs).toBeCloseTo(33.25, 2);
    expect(stats.minDelayMs).toBe(33);
    expect(stats.maxDelayMs).toBe(34);
    expect(stats.stdDeviationMs).toBeCloseTo(0.43, 2);
    expect(stats.fps).toBeCloseTo(30.08, 2);
  });

  test('constant delays have no deviation', () => {
    expect(calculateFrameTimingStats([300, 300, 300])).toEqual({
      averageDelayMs: 300,
      minDelayMs: 300,
      maxDelayMs: 300,
      stdDeviationMs: 0,
      fps: 3.333,
    });
  });

  test('an empty timeline reports zeros', () => {
    expect(calculateFrameTimingStats([]).fps).toBe(0);
    expect(totalDurationMs([])).toBe(0);
  });

  test('totalDurationMs sums the delays', () => {
    expect(totalDurationMs([250, 250, 250])).toBe(750);
  });
});
