import type { Dirent } from 'fs';
import { readdir, rm, rmdir, stat, unlink } from 'fs/promises';
import { extname, join } from 'path';

/** Extensions a postprocessor may leave behind instead of the predicted one. */
export const OUTPUT_EXTENSIONS = ['.mp4', '.mkv', '.webm', '.mp3', '.m4a', '.m4v'] as const;

function hasCode(error: unknown, codes: readonly string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

function isNotFound(error: unknown): boolean {
  return hasCode(error, ['ENOENT']);
}

/** The directory vanished or gained an entry since it was listed. */
function isConcurrentChange(error: unknown): boolean {
  return hasCode(error, ['ENOENT', 'ENOTEMPTY', 'EEXIST']);
}

export async function fileSize(path: string): Promise<number> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : 0;
  } catch (error) {
    if (isNotFound(error)) return 0;
    throw error;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/**
 * Deletes a file. Returns false when it was already gone.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

export async function removeDirectory(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Finds the file the engine actually wrote. The predicted name comes from
 * before postprocessing, so the container on disk may differ.
 */
export async function resolveOutputFile(predictedPath: string): Promise<string | null> {
  if (await fileExists(predictedPath)) return predictedPath;

  const ext = extname(predictedPath);
  const base = ext ? predictedPath.slice(0, -ext.length) : predictedPath;
  for (const candidate of OUTPUT_EXTENSIONS) {
    const path = `${base}${candidate}`;
    if (await fileExists(path)) return path;
  }
  return null;
}

/**
 * Removes empty directories below `root`, deepest first, so chains of empty
 * parents collapse in one pass. The root itself is kept. A child that a
 * running request writes into or removes meanwhile is skipped.
 */
export async function pruneEmptyDirectories(root: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return 0;
    throw error;
  }

  let pruned = 0;
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const child = join(root, entry.name);
    pruned += await pruneEmptyDirectories(child);
    try {
      if ((await readdir(child)).length > 0) continue;
      await rmdir(child);
      pruned += 1;
    } catch (error) {
      if (isConcurrentChange(error)) continue;
      throw error;
    }
  }
  return pruned;
}
