import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { PreviewRepository, RgbaImage } from '@domain/raster-preview/index.js';
import { PNG } from 'pngjs';

import { DecodeError, IOError } from '@/shared/errors/pipeline-errors.js';

/**
 * Stores previews as 8-bit RGBA PNG files. Encoding is deterministic, so writing the same image
 * twice yields identical bytes.
 */
export class PngPreviewRepository implements PreviewRepository {
  public async prepare(directory: string): Promise<void> {
    try {
      await fs.mkdir(directory, { recursive: true });
    } catch (error) {
      throw new IOError('write', directory, error);
    }
  }

  public async save(image: RgbaImage, filePath: string): Promise<void> {
    const expectedLength = image.width * image.height * 4;
    if (image.data.length !== expectedLength) {
      throw new RangeError(
        `RGBA buffer for ${filePath} holds ${image.data.length} bytes, expected ${expectedLength}`,
      );
    }

    const png = new PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(image.data);
    const encoded = PNG.sync.write(png, { colorType: 6 });

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, encoded);
    } catch (error) {
      throw new IOError('write', filePath, error);
    }
  }

  public async load(filePath: string): Promise<RgbaImage> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new IOError('read', filePath, error);
    }

    try {
      const png = PNG.sync.read(buffer);
      return { width: png.width, height: png.height, data: new Uint8Array(png.data) };
    } catch (error) {
      throw DecodeError.forFile(filePath, error);
    }
  }
}
