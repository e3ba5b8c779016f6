import path from 'node:path';

import {
  type AnimationEncoder,
  type FrameOverlay,
  FrameSequence,
  type RgbaFrame,
} from '@domain/animation/index.js';
import type { PreviewRepository } from '@domain/raster-preview/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import type { AssembleAnimationCommand } from '../commands/assemble-animation.command.js';
import {
  assembleAnimationCommandSchema,
  type AssembleAnimationInput,
  type AssembleAnimationPayload,
} from '../dto/assemble-animation.dto.js';

export interface AnimationOutcome {
  readonly outputPath: string;
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly frameDurationMs: number;
  readonly sizeBytes: number;
}

export class AssembleAnimationHandler {
  private readonly logger = createChildLogger({ module: 'AssembleAnimationHandler' });

  public constructor(
    private readonly previews: PreviewRepository,
    private readonly overlay: FrameOverlay,
    private readonly encoder: AnimationEncoder,
  ) {}

  public async execute(command: AssembleAnimationCommand): Promise<AnimationOutcome> {
    const payload = this.validate(command.payload);
    const sequence = FrameSequence.create({
      framePaths: payload.framePaths,
      frameDurationMs: payload.frameDurationMs,
    });

    this.logger.info({ frames: sequence.length, outputPath: payload.outputPath }, 'Starting animation assembly');

    try {
      const frames: RgbaFrame[] = [];

      for (const [index, framePath] of sequence.framePaths.entries()) {
        this.logger.debug({ filePath: framePath, index }, 'Adding frame');

        const image = await this.previews.load(framePath);
        sequence.admit(framePath, image);
        frames.push(
          this.overlay.apply(
            image,
            { index, total: sequence.length, label: path.parse(framePath).name },
            payload.overlay,
          ),
        );
      }

      const encoded = await this.encoder.encode(frames, payload.outputPath, {
        frameDurationMs: sequence.frameDurationMs,
        repeat: payload.repeat,
        colors: payload.colors,
      });

      this.logger.info(
        { outputPath: encoded.outputPath, frames: encoded.frameCount, sizeBytes: encoded.sizeBytes },
        'Animation written',
      );

      return {
        outputPath: encoded.outputPath,
        frameCount: encoded.frameCount,
        width: encoded.width,
        height: encoded.height,
        frameDurationMs: sequence.frameDurationMs,
        sizeBytes: encoded.sizeBytes,
      };
    } catch (error) {
      this.logger.error({ outputPath: payload.outputPath, error }, 'Animation assembly failed');
      throw AppError.fromUnknown(error, 'animation.failure');
    }
  }

  private validate(payload: AssembleAnimationInput): AssembleAnimationPayload {
    const parsed = assembleAnimationCommandSchema.safeParse(payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid assembly payload received');
      throw AppError.validation('assemble-animation.invalid-payload', {
        issues: parsed.error.issues,
      });
    }

    return parsed.data;
  }
}
