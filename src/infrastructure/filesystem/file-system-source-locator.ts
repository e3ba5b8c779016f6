import { type Dirent, promises as fs } from 'node:fs';
import path from 'node:path';

import type { ListOptions, LocatedFile, SourceLocator } from '@domain/raster-preview/index.js';

import { IOError } from '@/shared/errors/pipeline-errors.js';

export class FileSystemSourceLocator implements SourceLocator {
  public async list(directory: string, options: ListOptions): Promise<LocatedFile[]> {
    const root = path.resolve(directory);
    const extensions = new Set(options.extensions.map((extension) => extension.toLowerCase()));
    const found: LocatedFile[] = [];

    await this.walk(root, root, extensions, options.recursive, found);

    return found.sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));
  }

  private async walk(
    root: string,
    directory: string,
    extensions: ReadonlySet<string>,
    recursive: boolean,
    found: LocatedFile[],
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new IOError('read', directory, error);
    }

    for (const entry of entries) {
      const absolutePath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        if (recursive) {
          await this.walk(root, absolutePath, extensions, recursive, found);
        }
        continue;
      }

      if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
        found.push({
          absolutePath,
          relativePath: path.relative(root, absolutePath).split(path.sep).join('/'),
        });
      }
    }
  }
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
