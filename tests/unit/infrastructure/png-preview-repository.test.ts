import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { PngPreviewRepository } from '@/infrastructure/index.js';
import { DecodeError, IOError } from '@/shared/errors/pipeline-errors.js';

import { makeTempDir, removeDirs } from '../../helpers/rasters.js';

const tempDirs: string[] = [];

afterEach(async () => {
  await removeDirs(tempDirs);
});

const checkerboard = (): { width: number; height: number; data: Uint8Array } => ({
  width: 2,
  height: 2,
  data: Uint8Array.from([255, 0, 0, 255, 0, 0, 0, 0, 0, 255, 0, 255, 10, 20, 30, 255]),
});

describe('PngPreviewRepository', () => {
  it('writes RGBA PNGs that read back pixel for pixel', async () => {
    const directory = await makeTempDir('png');
    tempDirs.push(directory);
    const repository = new PngPreviewRepository();
    const filePath = path.join(directory, 'nested', 'frame.png');

    await repository.save(checkerboard(), filePath);
    const loaded = await repository.load(filePath);

    expect(loaded.width).toBe(2);
    expect(loaded.height).toBe(2);
    expect(Array.from(loaded.data)).toEqual(Array.from(checkerboard().data));
  });

  it('writes byte-identical files for the same image', async () => {
    const directory = await makeTempDir('png');
    tempDirs.push(directory);
    const repository = new PngPreviewRepository();

    await repository.save(checkerboard(), path.join(directory, 'first.png'));
    await repository.save(checkerboard(), path.join(directory, 'second.png'));

    const [first, second] = await Promise.all([
      fs.readFile(path.join(directory, 'first.png')),
      fs.readFile(path.join(directory, 'second.png')),
    ]);
    expect(first.equals(second)).toBe(true);
  });

  it('creates the preview directory on prepare', async () => {
    const directory = await makeTempDir('png');
    tempDirs.push(directory);
    const target = path.join(directory, 'a', 'b');

    await new PngPreviewRepository().prepare(target);

    expect((await fs.stat(target)).isDirectory()).toBe(true);
  });

  it('reports unwritable destinations as IOError', async () => {
    const directory = await makeTempDir('png');
    tempDirs.push(directory);
    const blocker = path.join(directory, 'blocker');
    await fs.writeFile(blocker, 'not a directory');

    const failure = new PngPreviewRepository().save(checkerboard(), path.join(blocker, 'frame.png'));

    await expect(failure).rejects.toBeInstanceOf(IOError);
    await expect(failure).rejects.toMatchObject({ code: 'io.write-failed', operation: 'write' });
  });

  it('reports missing and corrupt previews', async () => {
    const directory = await makeTempDir('png');
    tempDirs.push(directory);
    const corrupt = path.join(directory, 'corrupt.png');
    await fs.writeFile(corrupt, 'definitely not a png');
    const repository = new PngPreviewRepository();

    await expect(repository.load(path.join(directory, 'missing.png'))).rejects.toBeInstanceOf(IOError);
    await expect(repository.load(corrupt)).rejects.toBeInstanceOf(DecodeError);
  });

  it('rejects buffers that do not match the dimensions', async () => {
    const repository = new PngPreviewRepository();

    await expect(
      repository.save({ width: 2, height: 2, data: new Uint8Array(3) }, '/unused/frame.png'),
    ).rejects.toThrowError(RangeError);
  });
});
