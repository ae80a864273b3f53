import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ZodTypeAny, output } from 'zod';
import { ReputationError, errorMessage, formatZodError, isErrnoException } from '../errors/index.js';

/**
 * Read and validate a JSON document. A missing file yields `null`.
 */
export async function readJsonDocument<S extends ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<output<S> | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new ReputationError('PersistenceError', `Failed to read ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ReputationError('PersistenceError', `Failed to parse ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ReputationError('PersistenceError', `Invalid document ${filePath}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Write a JSON document, creating parent directories. The file is written beside
 * the target and renamed over it, so readers never see a partial document.
 */
export async function writeJsonDocument(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    throw new ReputationError('PersistenceError', `Failed to write ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
