import type { RgbaFrame } from '../value-objects/rgba-frame.js';

export interface AnimationEncodingOptions {
  readonly frameDurationMs: number;
  /** -1 plays once, 0 loops forever, n repeats n times. */
  readonly repeat: number;
  /** Upper bound on the palette quantized for each frame. */
  readonly colors: number;
}

export interface EncodedAnimation {
  readonly outputPath: string;
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly sizeBytes: number;
}

export interface AnimationEncoder {
  /**
   * Encodes the frames in order and writes a single artifact. Rejects with
   * `DimensionMismatchError` before writing when frame sizes differ, and with `IOError`
   * when the artifact cannot be written.
   */
  encode(
    frames: readonly RgbaFrame[],
    outputPath: string,
    options: AnimationEncodingOptions,
  ): Promise<EncodedAnimation>;
}
