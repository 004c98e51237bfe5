import { mkdir, readFile, rename, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';

export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write through a temporary sibling and rename, so readers never observe a
 * half-written file.
 */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const partial = `${path}.${process.pid}.part`;
  await writeFile(partial, data);
  await rename(partial, path);
}

/** JSON with a trailing newline; identical input gives identical bytes. */
export async function writeJsonFile(
  path: string,
  value: unknown,
  options: { pretty?: boolean } = {},
): Promise<void> {
  const json = options.pretty === false ? JSON.stringify(value) : JSON.stringify(value, null, 2);
  await writeFileAtomic(path, `${json}\n`);
}

export async function readJsonFile(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');
  return JSON.parse(content);
}
