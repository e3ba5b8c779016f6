import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { readConfigFile } from '@/infrastructure/index.js';
import { AppError } from '@/shared/errors/app-error.js';
import { loadEnv } from '@/shared/config/env.js';

import { makeTempDir, removeDirs } from '../../helpers/rasters.js';

const tempDirs: string[] = [];

afterEach(async () => {
  await removeDirs(tempDirs);
});

describe('readConfigFile', () => {
  it('returns the parsed JSON object', async () => {
    const directory = await makeTempDir('config');
    tempDirs.push(directory);
    const filePath = path.join(directory, 'reel.json');
    await fs.writeFile(filePath, JSON.stringify({ inputDirectory: 'rasters', frameDurationMs: 200 }));

    await expect(readConfigFile(filePath)).resolves.toEqual({ inputDirectory: 'rasters', frameDurationMs: 200 });
  });

  it('rejects malformed JSON and non-object documents', async () => {
    const directory = await makeTempDir('config');
    tempDirs.push(directory);
    const broken = path.join(directory, 'broken.json');
    const list = path.join(directory, 'list.json');
    await fs.writeFile(broken, '{ "inputDirectory": ');
    await fs.writeFile(list, '[1, 2]');

    await expect(readConfigFile(broken)).rejects.toMatchObject({ code: 'config.invalid-json' });
    await expect(readConfigFile(list)).rejects.toMatchObject({
      code: 'config.invalid-json',
      metadata: { filePath: list, reason: 'expected a JSON object' },
    });
  });

  it('reports a missing file as a read failure', async () => {
    await expect(readConfigFile('/nonexistent/tiff-reel.json')).rejects.toMatchObject({ code: 'io.read-failed' });
  });
});

describe('loadEnv', () => {
  it('defaults the log level', () => {
    expect(loadEnv({})).toEqual({ LOG_LEVEL: 'info' });
  });

  it('rejects unknown log levels', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrowError(AppError);
  });
});
