import { ReelError } from './base.error.js';

export interface FrameDimensions {
  readonly width: number;
  readonly height: number;
}

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

/**
 * Raised when a source raster cannot be read or does not describe a valid grid of samples.
 * Recoverable: the conversion stage records it and moves on to the next file unless fail-fast is set.
 */
export class DecodeError extends ReelError {
  public readonly filePath: string | undefined;

  public constructor(reason: string, options: { filePath?: string; cause?: unknown } = {}) {
    const { filePath, cause } = options;
    super({
      code: 'raster.decode-failed',
      message: filePath ? `Unable to decode ${filePath}: ${reason}` : `Unable to decode raster: ${reason}`,
      metadata: { filePath, reason },
      cause,
    });
    this.filePath = filePath;
  }

  public static forFile(filePath: string, cause: unknown): DecodeError {
    if (cause instanceof DecodeError) {
      return cause.filePath ? cause : new DecodeError(String(cause.metadata.reason ?? cause.message), { filePath, cause });
    }

    return new DecodeError(describeCause(cause), { filePath, cause });
  }
}

export class DimensionMismatchError extends ReelError {
  /** `frame` is the preview path, or `#<index>` for in-memory frames. */
  public constructor(frame: string, expected: FrameDimensions, actual: FrameDimensions) {
    super({
      code: 'animation.dimension-mismatch',
      message:
        `Frame ${frame} is ${actual.width}x${actual.height}, ` +
        `expected ${expected.width}x${expected.height} like the first frame`,
      metadata: { frame, expected, actual },
    });
  }
}

/** Two sources in one run would write the same preview file. */
export class PreviewCollisionError extends ReelError {
  public readonly filePath: string;

  public constructor(filePath: string, previewPath: string, claimedBy: string) {
    super({
      code: 'raster.preview-collision',
      message: `Preview ${previewPath} for ${filePath} is already written for ${claimedBy}`,
      metadata: { filePath, previewPath, claimedBy },
    });
    this.filePath = filePath;
  }
}

export class EmptyInputError extends ReelError {
  public constructor(directory: string, detail = 'no raster files found') {
    super({
      code: 'pipeline.empty-input',
      message: `Nothing to process in ${directory}: ${detail}`,
      metadata: { directory },
    });
  }
}

export type IOOperation = 'read' | 'write';

export class IOError extends ReelError {
  public readonly filePath: string;

  public readonly operation: IOOperation;

  public constructor(operation: IOOperation, filePath: string, cause: unknown) {
    super({
      code: `io.${operation}-failed`,
      message: `Failed to ${operation} ${filePath}: ${describeCause(cause)}`,
      metadata: { filePath, operation },
      cause,
    });
    this.filePath = filePath;
    this.operation = operation;
  }
}
