import type { RgbaImage } from '@domain/raster-preview/index.js';

import type { FrameProgress, RgbaFrame } from '../value-objects/rgba-frame.js';

export interface FrameOverlayOptions {
  readonly enabled: boolean;
  readonly showLabel: boolean;
}

export interface FrameOverlay {
  /** Returns an opaque frame of the same size with the progress indicator drawn in. */
  apply(image: RgbaImage, progress: FrameProgress, options: FrameOverlayOptions): RgbaFrame;
}
