// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, remove } from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

async function existingMode(path: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(path);
    return stats.mode & 0o7777;
  } catch {
    return undefined;
  }
}

/**
 * Replaces `path` with `content` through a sibling temp file and a rename, so readers never
 * observe a half-written file. The replaced file's permission bits carry over.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const mode = await existingMode(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  try {
    await fs.writeFile(tempPath, content, mode === undefined ? undefined : { mode });
    if (mode !== undefined) {
      await fs.chmod(tempPath, mode);
    }
    await fs.rename(tempPath, path);
  } catch (error) {
    await remove(tempPath);
    throw error;
  }
}
