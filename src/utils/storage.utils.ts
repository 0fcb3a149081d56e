import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';

/**
 * Read and parse a JSON file. Missing or unparseable files read as null.
 */
export async function safeReadJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Write JSON through a temp file and rename it into place
 */
export async function atomicWriteJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${crypto.randomBytes(6).toString('hex')}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(value, null, 2), 'utf8');
  await fs.rename(tmp, filePath);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
