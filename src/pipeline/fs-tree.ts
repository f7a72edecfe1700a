import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Files under dir as sorted posix paths relative to dir.
 * Top-level entries named in skip (e.g. ".git") are left out.
 */
export async function listFiles(dir: string, skip: readonly string[] = []): Promise<string[]> {
  const files: string[] = [];

  const walk = async (absolute: string, relative: string) => {
    const entries = await readdir(absolute, { withFileTypes: true });
    for (const entry of entries) {
      if (!relative && skip.includes(entry.name)) continue;
      const rel = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(join(absolute, entry.name), rel);
      } else {
        files.push(rel);
      }
    }
  };

  await walk(dir, '');
  return files.sort();
}

/** sha256 over every file's relative path and bytes, in path order. */
export async function digestDirectory(dir: string): Promise<string> {
  const hash = createHash('sha256');
  for (const file of await listFiles(dir)) {
    hash.update(file);
    hash.update('\0');
    hash.update(await readFile(join(dir, ...file.split('/'))));
    hash.update('\0');
  }
  return hash.digest('hex');
}
