import { z } from 'zod';

export const stretchPolicySchema = z
  .discriminatedUnion('mode', [
    z.object({ mode: z.literal('minmax') }),
    z.object({
      mode: z.literal('percentile'),
      low: z.number().min(0).max(100).default(1),
      high: z.number().min(0).max(100).default(98),
    }),
  ])
  .refine((policy) => policy.mode !== 'percentile' || policy.low < policy.high, {
    message: 'Low percentile must be below the high percentile',
    path: ['low'],
  });

export const nodataValueSchema = z.union([z.number(), z.nan()]);

export const conversionOptionsSchema = z.object({
  nodataValue: nodataValueSchema.optional(),
  useDeclaredNodata: z.boolean().default(false),
  recursive: z.boolean().default(false),
  failFast: z.boolean().default(false),
  stretch: stretchPolicySchema.default({ mode: 'minmax' }),
});

export const convertRastersCommandSchema = conversionOptionsSchema.extend({
  inputDirectory: z.string().min(1),
  outputDirectory: z.string().min(1),
});

export type ConvertRastersInput = z.input<typeof convertRastersCommandSchema>;

export type ConvertRastersPayload = z.output<typeof convertRastersCommandSchema>;
