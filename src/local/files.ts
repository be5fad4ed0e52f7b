/**
 * Local File Helpers
 *
 * Atomic JSON writes (write to temp, then rename) and validated reads
 * used by every local collaborator.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { CloudClientError } from '../cloud/errors.js';
import type { RecordCheck } from './schemas.js';

/**
 * Error code of a failed fs call, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Write text atomically.
 *
 * The temp file name is unique per call so concurrent writers never
 * rename each other's partial files.
 */
export async function writeAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${randomUUID()}.tmp`;
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, path);
}

/**
 * Write a JSON record atomically.
 */
export async function writeJson(path: string, data: unknown): Promise<void> {
  await writeAtomic(path, JSON.stringify(data, null, 2));
}

/**
 * Read text, or null when the file does not exist.
 */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Read and validate a JSON record, or null when it does not exist.
 *
 * @throws CloudClientError (FAILED) if the file is not valid JSON or
 *   does not match the record schema
 */
export async function readJson<T>(path: string, check: RecordCheck<T>, service: string): Promise<T | null> {
  const content = await readTextIfExists(path);
  if (content === null) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new CloudClientError(`Invalid JSON in ${path}`, 'FAILED', service, { cause: error });
  }
  return check(data, path);
}

/**
 * Remove a file; a missing file is not an error.
 */
export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}
