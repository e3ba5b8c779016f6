import {
  computeLabelPlacement,
  computeProgressBar,
  formatProgressLabel,
} from '@domain/animation/index.js';
import { describe, expect, it } from 'vitest';

describe('computeProgressBar', () => {
  it('anchors the bar to the bottom with proportional fill', () => {
    expect(computeProgressBar(100, 50, 0, 2)).toEqual({ x: 3, y: 46, trackWidth: 94, filledWidth: 47, height: 2 });
    expect(computeProgressBar(100, 50, 1, 2)).toEqual({ x: 3, y: 46, trackWidth: 94, filledWidth: 94, height: 2 });
  });

  it('fills the whole track on the last frame', () => {
    const bar = computeProgressBar(640, 480, 9, 10);

    expect(bar.filledWidth).toBe(bar.trackWidth);
    expect(bar.x + bar.trackWidth).toBe(640 - bar.x);
  });

  it('fits tiny frames', () => {
    expect(computeProgressBar(4, 4, 0, 2)).toEqual({ x: 1, y: 2, trackWidth: 2, filledWidth: 1, height: 1 });
    expect(computeProgressBar(1, 1, 0, 1)).toEqual({ x: 0, y: 0, trackWidth: 1, filledWidth: 1, height: 1 });
  });

  it('grows monotonically with the frame index', () => {
    const widths = Array.from({ length: 7 }, (_, index) => computeProgressBar(200, 100, index, 7).filledWidth);

    expect(widths).toEqual([...widths].sort((a, b) => a - b));
    expect(widths.at(-1)).toBe(computeProgressBar(200, 100, 6, 7).trackWidth);
  });

  it('rejects indices outside the sequence', () => {
    expect(() => computeProgressBar(10, 10, 2, 2)).toThrowError(RangeError);
    expect(() => computeProgressBar(10, 10, 0, 0)).toThrowError(RangeError);
  });
});

describe('label helpers', () => {
  it('places the label in the top-left margin', () => {
    expect(computeLabelPlacement(100, 50)).toEqual({ x: 3, y: 2, fontSize: 8 });
    expect(computeLabelPlacement(800, 600)).toEqual({ x: 24, y: 18, fontSize: 36 });
  });

  it('formats the counter after the frame name', () => {
    expect(formatProgressLabel('2023-09-30', 0, 12)).toBe('2023-09-30 1/12');
    expect(formatProgressLabel('', 4, 5)).toBe('5/5');
  });
});
