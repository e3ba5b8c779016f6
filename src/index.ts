import { RunPipelineCommand } from './application/pipeline/commands/run-pipeline.command.js';
import type { PipelineConfigInput } from './application/pipeline/dto/pipeline-config.dto.js';
import type { PipelineOutcome } from './application/pipeline/handlers/run-pipeline.handler.js';
import { createPipelineHandlers, type PipelineAdapters } from './bootstrap.js';

export * from './application/index.js';
export * from './bootstrap.js';
export * from './domain/animation/index.js';
export * from './domain/raster-preview/index.js';
export * from './infrastructure/index.js';
export * from './shared/errors/index.js';

export async function runPipeline(
  config: PipelineConfigInput,
  adapters: Partial<PipelineAdapters> = {},
): Promise<PipelineOutcome> {
  return createPipelineHandlers(adapters).pipeline.execute(new RunPipelineCommand(config));
}
