import { DimensionMismatchError, type FrameDimensions } from '@/shared/errors/pipeline-errors.js';

export interface FrameSequenceProps {
  readonly framePaths: readonly string[];
  readonly frameDurationMs: number;
}

/**
 * Ordered list of preview files played back one frame each.
 */
export class FrameSequence {
  public readonly framePaths: readonly string[];

  public readonly frameDurationMs: number;

  private dimensions: FrameDimensions | null = null;

  private constructor(props: FrameSequenceProps) {
    this.framePaths = [...props.framePaths];
    this.frameDurationMs = props.frameDurationMs;
  }

  public static create(props: FrameSequenceProps): FrameSequence {
    if (props.framePaths.length === 0) {
      throw new Error('Frame sequence must contain at least one frame');
    }

    if (!Number.isInteger(props.frameDurationMs) || props.frameDurationMs <= 0) {
      throw new Error('Frame duration must be a positive number of milliseconds');
    }

    return new FrameSequence(props);
  }

  public get length(): number {
    return this.framePaths.length;
  }

  public get frameDimensions(): FrameDimensions | null {
    return this.dimensions;
  }

  /**
   * Records the size of the next frame read. The first frame fixes the size of the sequence;
   * any later frame that differs raises `DimensionMismatchError`.
   */
  public admit(filePath: string, size: FrameDimensions): void {
    if (!this.dimensions) {
      this.dimensions = { width: size.width, height: size.height };
      return;
    }

    if (this.dimensions.width !== size.width || this.dimensions.height !== size.height) {
      throw new DimensionMismatchError(filePath, this.dimensions, size);
    }
  }
}
