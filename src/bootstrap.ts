import { AssembleAnimationHandler, AssembleDirectoryHandler } from '@/application/assemble-animation/index.js';
import { ConvertRastersHandler } from '@/application/convert-rasters/index.js';
import { RunPipelineHandler } from '@/application/pipeline/index.js';
import type { AnimationEncoder, FrameOverlay } from '@domain/animation/index.js';
import type { PreviewRepository, RasterDecoder, SourceLocator } from '@domain/raster-preview/index.js';
import {
  CanvasProgressOverlay,
  FileSystemSourceLocator,
  GeoTiffRasterDecoder,
  GifAnimationEncoder,
  PngPreviewRepository,
} from '@/infrastructure/index.js';

export interface PipelineAdapters {
  readonly locator: SourceLocator;
  readonly decoder: RasterDecoder;
  readonly previews: PreviewRepository;
  readonly overlay: FrameOverlay;
  readonly encoder: AnimationEncoder;
}

export interface PipelineHandlers {
  readonly convert: ConvertRastersHandler;
  readonly assemble: AssembleAnimationHandler;
  readonly assembleDirectory: AssembleDirectoryHandler;
  readonly pipeline: RunPipelineHandler;
}

export function createPipelineHandlers(overrides: Partial<PipelineAdapters> = {}): PipelineHandlers {
  const adapters: PipelineAdapters = {
    locator: overrides.locator ?? new FileSystemSourceLocator(),
    decoder: overrides.decoder ?? new GeoTiffRasterDecoder(),
    previews: overrides.previews ?? new PngPreviewRepository(),
    overlay: overrides.overlay ?? new CanvasProgressOverlay(),
    encoder: overrides.encoder ?? new GifAnimationEncoder(),
  };

  const convert = new ConvertRastersHandler(adapters.locator, adapters.decoder, adapters.previews);
  const assemble = new AssembleAnimationHandler(adapters.previews, adapters.overlay, adapters.encoder);

  return {
    convert,
    assemble,
    assembleDirectory: new AssembleDirectoryHandler(adapters.locator, assemble),
    pipeline: new RunPipelineHandler(convert, assemble),
  };
}
