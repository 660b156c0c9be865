import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { PersistenceError, createLogger } from '@taskfit/core';

const log = createLogger('JsonFile');

let tempCounter = 0;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and validate a JSON file. Returns null when the file does not exist;
 * any other read, parse or schema failure is a PersistenceError.
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T>,
): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new PersistenceError(filePath, 'read', err);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new PersistenceError(filePath, 'parse', err);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new PersistenceError(filePath, 'parse', parsed.error);
  }
  return parsed.data;
}

/**
 * Atomic full-file rewrite: the JSON goes to a temp file beside the target,
 * which is then renamed over it. Readers see either the old or the new file.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${++tempCounter}.tmp`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      log.warn(`Could not remove ${tempPath}`, cleanupErr);
    });
    throw new PersistenceError(filePath, 'write', err);
  }
}

/** Delete a file, treating "already gone" as success. */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    throw new PersistenceError(filePath, 'write', err);
  }
}
