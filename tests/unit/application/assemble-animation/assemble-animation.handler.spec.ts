import type {
  AnimationEncoder,
  AnimationEncodingOptions,
  FrameOverlay,
  FrameOverlayOptions,
  FrameProgress,
  RgbaFrame,
} from '@domain/animation/index.js';
import type { RgbaImage } from '@domain/raster-preview/index.js';
import { describe, expect, it, vi } from 'vitest';

import { AssembleAnimationCommand, AssembleAnimationHandler } from '@/application/assemble-animation/index.js';
import { AppError } from '@/shared/errors/app-error.js';
import { DimensionMismatchError, IOError } from '@/shared/errors/pipeline-errors.js';

import { InMemoryPreviewRepository, solidImage } from '../../../helpers/in-memory-preview-repository.js';

function setup(images: Record<string, RgbaImage>) {
  const previews = new InMemoryPreviewRepository();
  for (const [filePath, image] of Object.entries(images)) {
    previews.images.set(filePath, image);
  }

  const progressCalls: FrameProgress[] = [];
  const overlayOptions: FrameOverlayOptions[] = [];
  const apply = vi.fn((image: RgbaImage, progress: FrameProgress, options: FrameOverlayOptions): RgbaFrame => {
    progressCalls.push(progress);
    overlayOptions.push(options);
    return { width: image.width, height: image.height, data: new Uint8ClampedArray(image.data) };
  });

  const encodedFrames: RgbaFrame[][] = [];
  const encodingOptions: AnimationEncodingOptions[] = [];
  const encode = vi.fn(async (frames: readonly RgbaFrame[], outputPath: string, options: AnimationEncodingOptions) => {
    encodedFrames.push([...frames]);
    encodingOptions.push(options);
    const [first] = frames;
    return { outputPath, frameCount: frames.length, width: first?.width ?? 0, height: first?.height ?? 0, sizeBytes: 42 };
  });

  const overlay: FrameOverlay = { apply };
  const encoder: AnimationEncoder = { encode };

  return {
    previews,
    encode,
    progressCalls,
    overlayOptions,
    encodedFrames,
    encodingOptions,
    handler: new AssembleAnimationHandler(previews, overlay, encoder),
  };
}

describe('AssembleAnimationHandler', () => {
  it('reads each preview once, in order, and encodes them with the defaults', async () => {
    const { handler, previews, progressCalls, overlayOptions, encodedFrames, encodingOptions } = setup({
      '/out/b.png': solidImage(4, 4, 20),
      '/out/a.png': solidImage(4, 4, 10),
    });

    const outcome = await handler.execute(
      new AssembleAnimationCommand({ framePaths: ['/out/a.png', '/out/b.png'], outputPath: '/out/reel.gif' }),
    );

    expect(previews.loadOrder).toEqual(['/out/a.png', '/out/b.png']);
    expect(progressCalls).toEqual([
      { index: 0, total: 2, label: 'a' },
      { index: 1, total: 2, label: 'b' },
    ]);
    expect(overlayOptions).toEqual([
      { enabled: true, showLabel: true },
      { enabled: true, showLabel: true },
    ]);
    expect(encodingOptions).toEqual([{ frameDurationMs: 300, repeat: 0, colors: 256 }]);
    expect(encodedFrames[0]?.map((frame) => frame.data[0])).toEqual([10, 20]);
    expect(outcome).toEqual({
      outputPath: '/out/reel.gif',
      frameCount: 2,
      width: 4,
      height: 4,
      frameDurationMs: 300,
      sizeBytes: 42,
    });
  });

  it('passes through the configured timing and overlay options', async () => {
    const { handler, overlayOptions, encodingOptions } = setup({ '/out/a.png': solidImage(2, 2, 0) });

    await handler.execute(
      new AssembleAnimationCommand({
        framePaths: ['/out/a.png'],
        outputPath: '/out/reel.gif',
        frameDurationMs: 120,
        repeat: -1,
        colors: 16,
        overlay: { showLabel: false },
      }),
    );

    expect(overlayOptions).toEqual([{ enabled: true, showLabel: false }]);
    expect(encodingOptions).toEqual([{ frameDurationMs: 120, repeat: -1, colors: 16 }]);
  });

  it('stops at the first frame whose size differs and encodes nothing', async () => {
    const { handler, encode, previews } = setup({
      '/out/a.png': solidImage(4, 4, 0),
      '/out/b.png': solidImage(4, 3, 0),
      '/out/c.png': solidImage(4, 4, 0),
    });

    const failure = handler.execute(
      new AssembleAnimationCommand({
        framePaths: ['/out/a.png', '/out/b.png', '/out/c.png'],
        outputPath: '/out/reel.gif',
      }),
    );

    await expect(failure).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(failure).rejects.toThrowError('Frame /out/b.png is 4x3, expected 4x4 like the first frame');
    expect(encode).not.toHaveBeenCalled();
    expect(previews.loadOrder).toEqual(['/out/a.png', '/out/b.png']);
  });

  it('propagates preview read failures', async () => {
    const { handler, encode } = setup({ '/out/a.png': solidImage(2, 2, 0) });

    await expect(
      handler.execute(
        new AssembleAnimationCommand({ framePaths: ['/out/a.png', '/out/gone.png'], outputPath: '/out/reel.gif' }),
      ),
    ).rejects.toBeInstanceOf(IOError);
    expect(encode).not.toHaveBeenCalled();
  });

  it('rejects an empty frame list', async () => {
    const { handler } = setup({});

    const failure = handler.execute(new AssembleAnimationCommand({ framePaths: [], outputPath: '/out/reel.gif' }));

    await expect(failure).rejects.toBeInstanceOf(AppError);
    await expect(failure).rejects.toMatchObject({ code: 'assemble-animation.invalid-payload' });
  });

  it('rejects a non-positive frame duration', async () => {
    const { handler } = setup({ '/out/a.png': solidImage(2, 2, 0) });

    await expect(
      handler.execute(
        new AssembleAnimationCommand({ framePaths: ['/out/a.png'], outputPath: '/out/reel.gif', frameDurationMs: 0 }),
      ),
    ).rejects.toMatchObject({ code: 'assemble-animation.invalid-payload' });
  });
});
