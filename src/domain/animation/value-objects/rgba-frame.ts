export interface RgbaFrame {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export interface FrameProgress {
  /** Zero-based position of the frame in its sequence. */
  readonly index: number;
  readonly total: number;
  readonly label: string;
}
