export interface MinMaxStretch {
  readonly mode: 'minmax';
}

export interface PercentileStretch {
  readonly mode: 'percentile';
  readonly low: number;
  readonly high: number;
}

export type StretchPolicy = MinMaxStretch | PercentileStretch;

export const DEFAULT_STRETCH: StretchPolicy = { mode: 'minmax' };
