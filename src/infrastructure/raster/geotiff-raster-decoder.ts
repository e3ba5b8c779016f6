import { promises as fs } from 'node:fs';

import type { Raster, RasterDecoder, RasterSamples, SampleFormat } from '@domain/raster-preview/index.js';
import { fromArrayBuffer } from 'geotiff';

import { DecodeError } from '@/shared/errors/pipeline-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { toArrayBuffer } from '@/shared/media/buffers.js';

export class GeoTiffRasterDecoder implements RasterDecoder {
  private readonly logger = createChildLogger({ module: 'GeoTiffRasterDecoder' });

  public async decode(filePath: string): Promise<Raster> {
    try {
      const buffer = await fs.readFile(filePath);
      const tiff = await fromArrayBuffer(toArrayBuffer(buffer));
      const image = await tiff.getImage();
      const rasters = await image.readRasters();

      if (!Array.isArray(rasters)) {
        throw new DecodeError('expected one sample array per band', { filePath });
      }

      const bands: RasterSamples[] = rasters.map((band) => band);
      const raster: Raster = {
        width: image.getWidth(),
        height: image.getHeight(),
        bands,
        sampleFormat: detectSampleFormat(bands[0]),
        nodata: image.getGDALNoData(),
      };

      this.logger.debug(
        {
          filePath,
          width: raster.width,
          height: raster.height,
          bands: bands.length,
          sampleFormat: raster.sampleFormat,
          nodata: raster.nodata,
        },
        'Decoded raster',
      );

      return raster;
    } catch (error) {
      throw DecodeError.forFile(filePath, error);
    }
  }
}

function detectSampleFormat(band: RasterSamples | undefined): SampleFormat {
  if (band instanceof Float32Array || band instanceof Float64Array) {
    return 'float';
  }

  if (band instanceof Int8Array || band instanceof Int16Array || band instanceof Int32Array) {
    return 'int';
  }

  return 'uint';
}
