import { promises as fs } from 'node:fs';

import { AppError } from '@/shared/errors/app-error.js';
import { IOError } from '@/shared/errors/pipeline-errors.js';

/**
 * Reads a JSON pipeline configuration. Values are validated later, together with CLI overrides.
 */
export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new IOError('read', filePath, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw AppError.validation('config.invalid-json', {
      filePath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw AppError.validation('config.invalid-json', { filePath, reason: 'expected a JSON object' });
  }

  return { ...parsed };
}
