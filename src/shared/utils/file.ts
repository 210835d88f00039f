import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage, safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Reads a JSON file and returns its parsed value, or undefined if it is
 * missing or not valid JSON. Callers narrow the result themselves.
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) {
      log.warn('failed to read json', { filePath, error: errorMessage(error) });
    }
    return undefined;
  }
  const parsed = safeJsonParse(content, {
    onError: 'debug',
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === undefined) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
  }
  return parsed;
}

/**
 * Serializes a value to JSON and writes it to disk (pretty printed).
 * Writes a sibling temp file first and renames it into place.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  await fs.rename(tmpPath, filePath);
}

/**
 * Deletes a file; a missing file is not an error.
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}
