import path from 'node:path';

import type { SourceLocator } from '@domain/raster-preview/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { EmptyInputError } from '@/shared/errors/pipeline-errors.js';

import { AssembleAnimationCommand } from '../commands/assemble-animation.command.js';
import type { AssembleDirectoryCommand } from '../commands/assemble-directory.command.js';
import { assembleDirectoryCommandSchema } from '../dto/assemble-animation.dto.js';
import type { AnimationOutcome, AssembleAnimationHandler } from './assemble-animation.handler.js';

/**
 * Assembles every PNG of a directory, in sorted order, into one animation.
 */
export class AssembleDirectoryHandler {
  public constructor(
    private readonly locator: SourceLocator,
    private readonly assembler: AssembleAnimationHandler,
  ) {}

  public async execute(command: AssembleDirectoryCommand): Promise<AnimationOutcome> {
    const parsed = assembleDirectoryCommandSchema.safeParse(command.payload);
    if (!parsed.success) {
      throw AppError.validation('assemble-directory.invalid-payload', { issues: parsed.error.issues });
    }

    const { inputDirectory, recursive, ...options } = parsed.data;
    const directory = path.resolve(inputDirectory);
    const frames = await this.locator.list(directory, { extensions: ['.png'], recursive });

    if (frames.length === 0) {
      throw new EmptyInputError(directory, 'no PNG previews found');
    }

    return this.assembler.execute(
      new AssembleAnimationCommand({
        ...options,
        framePaths: frames.map((frame) => frame.absolutePath),
      }),
    );
  }
}
