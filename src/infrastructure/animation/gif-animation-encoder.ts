import { promises as fs } from 'node:fs';
import path from 'node:path';

import type {
  AnimationEncoder,
  AnimationEncodingOptions,
  EncodedAnimation,
  RgbaFrame,
} from '@domain/animation/index.js';
import { applyPalette, GIFEncoder, quantize } from 'gifenc';

import { DimensionMismatchError, IOError } from '@/shared/errors/pipeline-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

export class GifAnimationEncoder implements AnimationEncoder {
  private readonly logger = createChildLogger({ module: 'GifAnimationEncoder' });

  public async encode(
    frames: readonly RgbaFrame[],
    outputPath: string,
    options: AnimationEncodingOptions,
  ): Promise<EncodedAnimation> {
    const [first] = frames;
    if (!first) {
      throw new RangeError('Cannot encode an animation without frames');
    }

    const { width, height } = first;
    frames.forEach((frame, index) => {
      if (frame.width !== width || frame.height !== height) {
        throw new DimensionMismatchError(
          `#${index}`,
          { width, height },
          { width: frame.width, height: frame.height },
        );
      }
    });

    const encoder = GIFEncoder();

    for (const frame of frames) {
      const rgba = new Uint8Array(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
      const palette = quantize(rgba, options.colors);

      // gifenc writes the loop extension only with the first frame; -1 leaves it out.
      encoder.writeFrame(applyPalette(rgba, palette), width, height, {
        palette,
        delay: options.frameDurationMs,
        repeat: options.repeat,
      });
    }

    encoder.finish();
    const gifBuffer = Buffer.from(encoder.bytes());

    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, gifBuffer);
    } catch (error) {
      throw new IOError('write', outputPath, error);
    }

    this.logger.debug({ outputPath, frames: frames.length, bytes: gifBuffer.byteLength }, 'GIF written');

    return {
      outputPath: path.resolve(outputPath),
      frameCount: frames.length,
      width,
      height,
      sizeBytes: gifBuffer.byteLength,
    };
  }
}
