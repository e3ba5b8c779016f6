import path from 'node:path';

import {
  type LocatedFile,
  normalizeRaster,
  type PreviewRepository,
  type RasterDecoder,
  type SourceLocator,
} from '@domain/raster-preview/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import type { ReelError } from '@/shared/errors/base.error.js';
import { DecodeError, EmptyInputError, IOError, PreviewCollisionError } from '@/shared/errors/pipeline-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import type { ConvertRastersCommand } from '../commands/convert-rasters.command.js';
import {
  convertRastersCommandSchema,
  type ConvertRastersInput,
  type ConvertRastersPayload,
} from '../dto/convert-rasters.dto.js';

export const RASTER_EXTENSIONS = ['.tif', '.tiff'] as const;

export const PREVIEW_EXTENSION = '.png';

export interface ConvertedPreview {
  readonly sourcePath: string;
  readonly relativePath: string;
  readonly previewPath: string;
  readonly width: number;
  readonly height: number;
  readonly maskApplied: boolean;
  readonly maskedPixels: number;
}

export interface ConversionFailure {
  readonly sourcePath: string;
  readonly code: string;
  readonly message: string;
}

export interface ConversionReport {
  readonly outputDirectory: string;
  /** In discovery order, which is the playback order of the animation. */
  readonly previews: ConvertedPreview[];
  readonly failures: ConversionFailure[];
}

/**
 * `<outputDirectory>/<dir of relativePath>/<stem>.png`
 */
export function derivePreviewPath(outputDirectory: string, relativePath: string): string {
  const { dir, name } = path.posix.parse(relativePath);
  return path.join(outputDirectory, ...dir.split('/').filter(Boolean), `${name}${PREVIEW_EXTENSION}`);
}

export class ConvertRastersHandler {
  private readonly logger = createChildLogger({ module: 'ConvertRastersHandler' });

  public constructor(
    private readonly locator: SourceLocator,
    private readonly decoder: RasterDecoder,
    private readonly previews: PreviewRepository,
  ) {}

  public async execute(command: ConvertRastersCommand): Promise<ConversionReport> {
    const payload = this.validate(command.payload);
    const inputDirectory = path.resolve(payload.inputDirectory);
    const outputDirectory = path.resolve(payload.outputDirectory);

    await this.previews.prepare(outputDirectory);

    const sources = await this.locator.list(inputDirectory, {
      extensions: RASTER_EXTENSIONS,
      recursive: payload.recursive,
    });

    if (sources.length === 0) {
      this.logger.warn({ inputDirectory }, 'No raster files found');
      throw new EmptyInputError(inputDirectory);
    }

    this.logger.info({ inputDirectory, outputDirectory, files: sources.length }, 'Starting raster conversion');

    const previews: ConvertedPreview[] = [];
    const failures: ConversionFailure[] = [];
    // preview path -> source whose preview was written there
    const claimed = new Map<string, string>();

    for (const source of sources) {
      const previewPath = derivePreviewPath(outputDirectory, source.relativePath);

      try {
        const owner = claimed.get(previewPath);
        if (owner !== undefined) {
          throw new PreviewCollisionError(source.absolutePath, previewPath, owner);
        }

        previews.push(await this.convertOne(source, previewPath, payload));
        claimed.set(previewPath, source.absolutePath);
      } catch (error) {
        const failure = attributeFailure(error, source.absolutePath);
        this.logger.error(
          { filePath: source.absolutePath, code: failure.code, error: failure.message },
          'Raster conversion failed',
        );

        if (payload.failFast) {
          throw failure;
        }

        failures.push({ sourcePath: source.absolutePath, code: failure.code, message: failure.message });
      }
    }

    this.logger.info(
      { converted: previews.length, failed: failures.length, outputDirectory },
      'Raster conversion completed',
    );

    return { outputDirectory, previews, failures };
  }

  private async convertOne(
    source: LocatedFile,
    previewPath: string,
    payload: ConvertRastersPayload,
  ): Promise<ConvertedPreview> {
    this.logger.debug({ filePath: source.absolutePath }, 'Converting raster');

    const raster = await this.decoder.decode(source.absolutePath);
    const nodata = payload.nodataValue ?? (payload.useDeclaredNodata ? raster.nodata : null);
    const preview = normalizeRaster(raster, { nodata, stretch: payload.stretch });
    await this.previews.save(preview, previewPath);

    return {
      sourcePath: source.absolutePath,
      relativePath: source.relativePath,
      previewPath,
      width: preview.width,
      height: preview.height,
      maskApplied: preview.maskApplied,
      maskedPixels: preview.maskedPixels,
    };
  }

  private validate(payload: ConvertRastersInput): ConvertRastersPayload {
    const parsed = convertRastersCommandSchema.safeParse(payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid conversion payload received');
      throw AppError.validation('convert-rasters.invalid-payload', {
        issues: parsed.error.issues,
      });
    }

    return parsed.data;
  }
}

// Write failures and collisions already name their paths; everything else is a decode failure of the source.
function attributeFailure(error: unknown, filePath: string): ReelError {
  if (error instanceof IOError || error instanceof PreviewCollisionError) {
    return error;
  }

  return DecodeError.forFile(filePath, error);
}
