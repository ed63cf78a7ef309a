import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(targetPath: string): Promise<void> {
  await fs.mkdir(targetPath, { recursive: true });
}

export async function writeFile(
  targetPath: string,
  data: string | NodeJS.ArrayBufferView,
  mode?: number
): Promise<void> {
  await ensureDir(path.dirname(targetPath));
  await fs.writeFile(targetPath, data, mode === undefined ? undefined : { mode });
  if (mode !== undefined) {
    await fs.chmod(targetPath, mode);
  }
}

let partialCounter = 0;

/**
 * Writes beside the target first so readers never see a partial file. Each
 * call gets its own temporary name, so concurrent writers of one target do
 * not share it.
 */
export async function writeFileAtomic(targetPath: string, data: NodeJS.ArrayBufferView): Promise<void> {
  partialCounter += 1;
  const partial = `${targetPath}.${process.pid}.${partialCounter}.part`;
  try {
    await writeFile(partial, data);
    await fs.rename(partial, targetPath);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
}
