import { z } from 'zod';

import { animationOptionsSchema } from '../../assemble-animation/dto/assemble-animation.dto.js';
import { conversionOptionsSchema } from '../../convert-rasters/dto/convert-rasters.dto.js';

export const pipelineConfigSchema = conversionOptionsSchema.merge(animationOptionsSchema).extend({
  inputDirectory: z.string().min(1),
  outputDirectory: z.string().min(1),
  outputAnimationPath: z.string().min(1),
});

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export type PipelineConfig = z.output<typeof pipelineConfigSchema>;
