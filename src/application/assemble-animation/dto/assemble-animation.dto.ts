import { z } from 'zod';

export const DEFAULT_FRAME_DURATION_MS = 300;

export const overlayOptionsSchema = z.object({
  enabled: z.boolean().default(true),
  showLabel: z.boolean().default(true),
});

export const animationOptionsSchema = z.object({
  frameDurationMs: z.number().int().positive().default(DEFAULT_FRAME_DURATION_MS),
  repeat: z.number().int().min(-1).default(0),
  colors: z.number().int().min(2).max(256).default(256),
  overlay: overlayOptionsSchema.default({}),
});

export const assembleAnimationCommandSchema = animationOptionsSchema.extend({
  framePaths: z.array(z.string().min(1)).min(1),
  outputPath: z.string().min(1),
});

export const assembleDirectoryCommandSchema = animationOptionsSchema.extend({
  inputDirectory: z.string().min(1),
  outputPath: z.string().min(1),
  recursive: z.boolean().default(false),
});

export type AssembleAnimationInput = z.input<typeof assembleAnimationCommandSchema>;

export type AssembleAnimationPayload = z.output<typeof assembleAnimationCommandSchema>;

export type AssembleDirectoryInput = z.input<typeof assembleDirectoryCommandSchema>;

export type AssembleDirectoryPayload = z.output<typeof assembleDirectoryCommandSchema>;
