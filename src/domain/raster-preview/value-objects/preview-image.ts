export interface RgbaImage {
  readonly width: number;
  readonly height: number;
  /** RGBA, 8 bits per channel, row-major. */
  readonly data: Uint8Array;
}

export interface SampleRange {
  readonly min: number;
  readonly max: number;
}

export interface PreviewImage extends RgbaImage {
  readonly maskApplied: boolean;
  readonly maskedPixels: number;
  /** Range used to stretch R, G and B; null where the channel was degenerate. */
  readonly channelRanges: readonly [SampleRange | null, SampleRange | null, SampleRange | null];
}
