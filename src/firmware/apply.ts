import { copyFile, rename, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Replace `targetPath` with the contents of `stagedPath`.
 *
 * The image is copied next to the target first and then renamed over it,
 * so readers see either the old image or the new one. The staged file is
 * left in place.
 */
export async function applyUpdate(stagedPath: string, targetPath: string): Promise<void> {
  const temp = join(dirname(targetPath), `.${basename(targetPath)}.${process.pid}.new`);
  await copyFile(stagedPath, temp);
  try {
    await rename(temp, targetPath);
  } catch (err) {
    await unlink(temp).catch(() => undefined);
    throw err;
  }
}
