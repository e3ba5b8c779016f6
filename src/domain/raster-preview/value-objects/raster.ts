export type SampleFormat = 'uint' | 'int' | 'float';

/** Samples of one band, row-major, `width * height` long. */
export type RasterSamples = ArrayLike<number>;

/**
 * Decoded source raster. Bands are planar; band 0 is the reference band for no-data matching.
 */
export interface Raster {
  readonly width: number;
  readonly height: number;
  readonly bands: readonly RasterSamples[];
  readonly sampleFormat: SampleFormat;
  /** Sentinel declared by the file itself, if any. */
  readonly nodata: number | null;
}
