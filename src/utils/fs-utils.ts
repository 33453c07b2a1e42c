import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Write a file through a temp file and a rename, so readers never see a
 * half-written file.
 */
export async function writeFileAtomic(path: string, data: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.tmp`;
  await writeFile(tempPath, data, 'utf-8');
  await rename(tempPath, path);
}

/**
 * Read a UTF-8 file, or undefined when it does not exist
 */
export async function readFileIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
