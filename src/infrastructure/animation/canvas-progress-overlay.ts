import {
  computeLabelPlacement,
  computeProgressBar,
  formatProgressLabel,
  type FrameOverlay,
  type FrameOverlayOptions,
  type FrameProgress,
  type RgbaFrame,
} from '@domain/animation/index.js';
import type { RgbaImage } from '@domain/raster-preview/index.js';
import { createCanvas } from '@napi-rs/canvas';

export interface OverlayStyle {
  readonly background: readonly [number, number, number];
  readonly barColor: string;
  readonly textColor: string;
  readonly fontFamily: string;
}

const DEFAULT_STYLE: OverlayStyle = {
  background: [0, 0, 0],
  barColor: '#ffffff',
  textColor: '#ffffff',
  fontFamily: 'sans-serif',
};

export class CanvasProgressOverlay implements FrameOverlay {
  private readonly style: OverlayStyle;

  public constructor(style: Partial<OverlayStyle> = {}) {
    this.style = { ...DEFAULT_STYLE, ...style };
  }

  public apply(image: RgbaImage, progress: FrameProgress, options: FrameOverlayOptions): RgbaFrame {
    const { width, height } = image;
    const flattened = flattenOntoBackground(image, this.style.background);

    if (!options.enabled) {
      return { width, height, data: flattened };
    }

    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    const imageData = ctx.createImageData(width, height);
    imageData.data.set(flattened);
    ctx.putImageData(imageData, 0, 0);

    const bar = computeProgressBar(width, height, progress.index, progress.total);
    ctx.fillStyle = this.style.barColor;
    ctx.fillRect(bar.x, bar.y, bar.filledWidth, bar.height);

    if (options.showLabel) {
      const placement = computeLabelPlacement(width, height);
      ctx.font = `${placement.fontSize}px ${this.style.fontFamily}`;
      ctx.textBaseline = 'top';
      ctx.fillStyle = this.style.textColor;
      ctx.fillText(formatProgressLabel(progress.label, progress.index, progress.total), placement.x, placement.y);
    }

    return { width, height, data: new Uint8ClampedArray(ctx.getImageData(0, 0, width, height).data) };
  }
}

// Composites the preview over an opaque background so every pixel ends with alpha 255.
export function flattenOntoBackground(
  image: RgbaImage,
  background: readonly [number, number, number],
): Uint8ClampedArray {
  const { data } = image;
  const result = new Uint8ClampedArray(data.length);
  const [br, bg, bb] = background;

  for (let index = 0; index < data.length; index += 4) {
    const alpha = (data[index + 3] ?? 255) / 255;
    result[index] = Math.round((data[index] ?? 0) * alpha + br * (1 - alpha));
    result[index + 1] = Math.round((data[index + 1] ?? 0) * alpha + bg * (1 - alpha));
    result[index + 2] = Math.round((data[index + 2] ?? 0) * alpha + bb * (1 - alpha));
    result[index + 3] = 255;
  }

  return result;
}
