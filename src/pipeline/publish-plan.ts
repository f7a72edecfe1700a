import { copyFile, lstat, mkdir, readdir, rm, rmdir } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, join } from 'node:path';
import { listFiles } from './fs-tree';

export interface PublishPlanOptions {
  /** Checked-out publish branch (or the destination directory inside it). */
  targetDir: string;
  /** Generated documentation. */
  outputDir: string;
  /** true: merge, keep previously published files. false: mirror the output. */
  keepFiles: boolean;
  /** Top-level output entries that are never published. */
  excludeAssets?: readonly string[];
}

export interface PublishPlanResult {
  /** Sorted relative paths removed from the target. */
  removed: string[];
  /** Sorted relative paths copied from the output. */
  written: string[];
}

const GIT_DIR = '.git';

const toNative = (dir: string, rel: string) => join(dir, ...rel.split('/'));

/**
 * Makes targetDir the new published state for outputDir.
 * Mirror removes every previously published file the output no longer has.
 */
export async function applyPublishPlan(options: PublishPlanOptions): Promise<PublishPlanResult> {
  const { targetDir, outputDir, keepFiles } = options;
  const excluded = [GIT_DIR, ...(options.excludeAssets ?? [])];

  await mkdir(targetDir, { recursive: true });
  const previous = await listFiles(targetDir, [GIT_DIR]);
  const next = await listFiles(outputDir, excluded);

  const nextSet = new Set(next);
  const removed = keepFiles ? [] : previous.filter((file) => !nextSet.has(file));

  for (const file of removed) {
    await rm(toNative(targetDir, file), { force: true });
  }
  await pruneEmptyDirs(targetDir, removed);

  const replaced: string[] = [];
  for (const file of next) {
    replaced.push(...(await clearWay(targetDir, file)));
    const destination = toNative(targetDir, file);
    await mkdir(dirname(destination), { recursive: true });
    await copyFile(toNative(outputDir, file), destination);
  }

  return { removed: [...removed, ...replaced].sort(), written: next };
}

async function lstatOrNull(path: string): Promise<Stats | null> {
  return lstat(path).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT' || err.code === 'ENOTDIR') return null;
    throw err;
  });
}

/**
 * Output wins over a published entry of the other kind: a published file where the output
 * needs a directory, or a published directory where the output has a file, is removed.
 * Returns the published paths that went away.
 */
async function clearWay(targetDir: string, file: string): Promise<string[]> {
  const parts = file.split('/');
  for (let depth = 1; depth < parts.length; depth++) {
    const ancestor = parts.slice(0, depth).join('/');
    const info = await lstatOrNull(toNative(targetDir, ancestor));
    if (!info) break;
    if (!info.isDirectory()) {
      await rm(toNative(targetDir, ancestor), { force: true });
      return [ancestor];
    }
  }

  const destination = toNative(targetDir, file);
  const info = await lstatOrNull(destination);
  if (!info?.isDirectory()) return [];
  const nested = (await listFiles(destination)).map((inner) => `${file}/${inner}`);
  await rm(destination, { recursive: true, force: true });
  return nested;
}

/** Remove directories left empty by deleted files, deepest first, never targetDir itself. */
async function pruneEmptyDirs(targetDir: string, removed: readonly string[]): Promise<void> {
  const dirs = new Set<string>();
  for (const file of removed) {
    let dir = file.split('/').slice(0, -1).join('/');
    while (dir) {
      dirs.add(dir);
      dir = dir.split('/').slice(0, -1).join('/');
    }
  }

  const deepestFirst = [...dirs].sort((a, b) => b.split('/').length - a.split('/').length);
  for (const dir of deepestFirst) {
    const absolute = toNative(targetDir, dir);
    if ((await readdir(absolute)).length === 0) await rmdir(absolute);
  }
}
