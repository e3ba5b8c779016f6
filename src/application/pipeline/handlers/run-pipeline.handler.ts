import { AppError } from '@/shared/errors/app-error.js';
import { EmptyInputError } from '@/shared/errors/pipeline-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { AssembleAnimationCommand } from '../../assemble-animation/commands/assemble-animation.command.js';
import type {
  AnimationOutcome,
  AssembleAnimationHandler,
} from '../../assemble-animation/handlers/assemble-animation.handler.js';
import { ConvertRastersCommand } from '../../convert-rasters/commands/convert-rasters.command.js';
import type {
  ConversionReport,
  ConvertRastersHandler,
} from '../../convert-rasters/handlers/convert-rasters.handler.js';
import type { RunPipelineCommand } from '../commands/run-pipeline.command.js';
import { type PipelineConfig, type PipelineConfigInput, pipelineConfigSchema } from '../dto/pipeline-config.dto.js';

export interface PipelineOutcome {
  readonly conversion: ConversionReport;
  readonly animation: AnimationOutcome;
  /** False when some rasters were skipped; the animation still holds every converted one. */
  readonly complete: boolean;
}

/**
 * Converts every raster of the input directory, then assembles the previews, re-read from
 * disk, into a single animation.
 */
export class RunPipelineHandler {
  private readonly logger = createChildLogger({ module: 'RunPipelineHandler' });

  public constructor(
    private readonly converter: ConvertRastersHandler,
    private readonly assembler: AssembleAnimationHandler,
  ) {}

  public async execute(command: RunPipelineCommand): Promise<PipelineOutcome> {
    const config = this.validate(command.payload);

    this.logger.info(
      { inputDirectory: config.inputDirectory, outputAnimationPath: config.outputAnimationPath },
      'Starting pipeline',
    );

    const conversion = await this.converter.execute(
      new ConvertRastersCommand({
        inputDirectory: config.inputDirectory,
        outputDirectory: config.outputDirectory,
        nodataValue: config.nodataValue,
        useDeclaredNodata: config.useDeclaredNodata,
        recursive: config.recursive,
        failFast: config.failFast,
        stretch: config.stretch,
      }),
    );

    if (conversion.previews.length === 0) {
      throw new EmptyInputError(conversion.outputDirectory, 'every raster failed to convert');
    }

    const animation = await this.assembler.execute(
      new AssembleAnimationCommand({
        framePaths: conversion.previews.map((preview) => preview.previewPath),
        outputPath: config.outputAnimationPath,
        frameDurationMs: config.frameDurationMs,
        repeat: config.repeat,
        colors: config.colors,
        overlay: config.overlay,
      }),
    );

    const complete = conversion.failures.length === 0;
    this.logger.info(
      { frames: animation.frameCount, skipped: conversion.failures.length, outputPath: animation.outputPath },
      'Pipeline completed',
    );

    return { conversion, animation, complete };
  }

  private validate(payload: PipelineConfigInput): PipelineConfig {
    const parsed = pipelineConfigSchema.safeParse(payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid pipeline configuration received');
      throw AppError.validation('pipeline.invalid-config', { issues: parsed.error.issues });
    }

    return parsed.data;
  }
}
