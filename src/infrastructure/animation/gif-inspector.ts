import { promises as fs } from 'node:fs';

import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';

import { IOError } from '@/shared/errors/pipeline-errors.js';
import { toArrayBuffer } from '@/shared/media/buffers.js';
import { calculateFrameTimingStats, type FrameTimingStats, totalDurationMs } from '@/shared/media/frameTiming.js';

export interface AnimationInspection {
  width: number;
  height: number;
  frameCount: number;
  durationMs: number;
  delaysMs: number[];
  timing: FrameTimingStats;
  hasTransparency: boolean;
}

/**
 * Reads back a GIF and reports its logical size, frame count and timing.
 */
export async function inspectAnimation(input: string | Buffer): Promise<AnimationInspection> {
  const buffer = await loadGifBuffer(input);
  const gif = parseGIF(toArrayBuffer(buffer));
  const frames = decompressFrames(gif, true);
  // gifuct-js already reports delays in milliseconds.
  const delaysMs = frames.map((frame) => frame.delay);

  return {
    width: gif.lsd.width,
    height: gif.lsd.height,
    frameCount: frames.length,
    durationMs: totalDurationMs(delaysMs),
    delaysMs,
    timing: calculateFrameTimingStats(delaysMs),
    hasTransparency: frames.some(frameHasTransparency),
  };
}

async function loadGifBuffer(input: string | Buffer): Promise<Buffer> {
  if (Buffer.isBuffer(input)) {
    return input;
  }

  try {
    return await fs.readFile(input);
  } catch (error) {
    throw new IOError('read', input, error);
  }
}

function frameHasTransparency(frame: ParsedFrame): boolean {
  const { patch } = frame;

  for (let index = 3; index < patch.length; index += 4) {
    if ((patch[index] ?? 255) < 255) {
      return true;
    }
  }

  return false;
}
