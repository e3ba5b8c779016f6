import type { Raster } from '../value-objects/raster.js';

export interface RasterDecoder {
  /** Rejects with `DecodeError` when the file is unreadable or malformed. */
  decode(filePath: string): Promise<Raster>;
}
