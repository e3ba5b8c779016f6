import { DecodeError } from '@/shared/errors/pipeline-errors.js';
import { clampByte } from '@/shared/media/numberUtils.js';

import type { PreviewImage, SampleRange } from '../value-objects/preview-image.js';
import type { Raster, RasterSamples } from '../value-objects/raster.js';
import { DEFAULT_STRETCH, type StretchPolicy } from '../value-objects/stretch-policy.js';

export const MID_GRAY = 128;

export interface NormalizeOptions {
  /** Sentinel marking transparent pixels; null or absent disables masking. */
  readonly nodata?: number | null;
  readonly stretch?: StretchPolicy;
}

type ChannelRanges = PreviewImage['channelRanges'];

/**
 * Maps an arbitrary-range raster to an 8-bit RGBA preview.
 *
 * Pixels whose band-0 sample equals the sentinel become fully transparent black; every other
 * pixel is opaque. The raster is not mutated and equal inputs give byte-identical output.
 */
export function normalizeRaster(raster: Raster, options: NormalizeOptions = {}): PreviewImage {
  assertRasterShape(raster);

  const { width, height } = raster;
  const pixelCount = width * height;
  const nodata = options.nodata ?? null;
  const stretch = options.stretch ?? DEFAULT_STRETCH;

  const mask = buildNodataMask(raster.bands[0], pixelCount, nodata);
  const channels = selectColorBands(raster.bands);
  const ranges = resolveRanges(channels, mask, stretch);
  const data = new Uint8Array(pixelCount * 4);
  let maskedPixels = 0;

  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const offset = pixel * 4;

    if (mask[pixel] === 1) {
      maskedPixels += 1;
      continue;
    }

    data[offset] = scaleSample(channels[0][pixel], ranges[0]);
    data[offset + 1] = scaleSample(channels[1][pixel], ranges[1]);
    data[offset + 2] = scaleSample(channels[2][pixel], ranges[2]);
    data[offset + 3] = 255;
  }

  return {
    width,
    height,
    data,
    maskApplied: nodata !== null,
    maskedPixels,
    channelRanges: ranges,
  };
}

function assertRasterShape(raster: Raster): void {
  const { width, height, bands } = raster;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new DecodeError(`invalid raster dimensions ${width}x${height}`);
  }

  if (bands.length === 0) {
    throw new DecodeError('raster has no bands');
  }

  const expected = width * height;
  bands.forEach((band, index) => {
    if (band.length !== expected) {
      throw new DecodeError(`band ${index} holds ${band.length} samples, expected ${expected}`);
    }
  });
}

function buildNodataMask(reference: RasterSamples, pixelCount: number, nodata: number | null): Uint8Array {
  const mask = new Uint8Array(pixelCount);

  if (nodata === null) {
    return mask;
  }

  const matchesNaN = Number.isNaN(nodata);
  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const sample = reference[pixel];
    if (matchesNaN ? Number.isNaN(sample) : sample === nodata) {
      mask[pixel] = 1;
    }
  }

  return mask;
}

function selectColorBands(bands: readonly RasterSamples[]): [RasterSamples, RasterSamples, RasterSamples] {
  const [first, second, third] = bands;

  if (bands.length >= 3 && first && second && third) {
    return [first, second, third];
  }

  const gray = bands[0];
  return [gray, gray, gray];
}

function resolveRanges(
  channels: readonly [RasterSamples, RasterSamples, RasterSamples],
  mask: Uint8Array,
  stretch: StretchPolicy,
): ChannelRanges {
  switch (stretch.mode) {
    case 'minmax': {
      const range = globalRange(channels, mask);
      return [range, range, range];
    }
    case 'percentile': {
      const [red, green, blue] = channels;
      return [
        percentileRange(red, mask, stretch.low, stretch.high),
        percentileRange(green, mask, stretch.low, stretch.high),
        percentileRange(blue, mask, stretch.low, stretch.high),
      ];
    }
    default: {
      const exhaustive: never = stretch;
      throw new Error(`Unsupported stretch policy ${JSON.stringify(exhaustive)}`);
    }
  }
}

function globalRange(channels: readonly RasterSamples[], mask: Uint8Array): SampleRange | null {
  let min = Infinity;
  let max = -Infinity;

  for (const band of new Set(channels)) {
    for (let pixel = 0; pixel < mask.length; pixel += 1) {
      const sample = band[pixel];
      if (mask[pixel] === 1 || !Number.isFinite(sample)) {
        continue;
      }
      if (sample < min) min = sample;
      if (sample > max) max = sample;
    }
  }

  return toRange(min, max);
}

function percentileRange(band: RasterSamples, mask: Uint8Array, low: number, high: number): SampleRange | null {
  const valid: number[] = [];

  for (let pixel = 0; pixel < mask.length; pixel += 1) {
    const sample = band[pixel];
    if (mask[pixel] === 0 && Number.isFinite(sample)) {
      valid.push(sample);
    }
  }

  if (valid.length === 0) {
    return null;
  }

  const sorted = Float64Array.from(valid).sort();
  return toRange(interpolatePercentile(sorted, low), interpolatePercentile(sorted, high));
}

// Linear interpolation between the closest ranks.
function interpolatePercentile(sorted: Float64Array, percentile: number): number {
  const position = ((sorted.length - 1) * percentile) / 100;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

function toRange(min: number, max: number): SampleRange | null {
  if (!Number.isFinite(min) || !Number.isFinite(max) || max <= min) {
    return null;
  }

  return { min, max };
}

function scaleSample(sample: number, range: SampleRange | null): number {
  if (!Number.isFinite(sample)) {
    return 0;
  }

  if (!range) {
    return MID_GRAY;
  }

  const clipped = Math.min(range.max, Math.max(range.min, sample));
  return clampByte(((clipped - range.min) * 255) / (range.max - range.min));
}
