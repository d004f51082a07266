import { access, copyFile, mkdir, rename, unlink } from 'fs/promises';
import { dirname } from 'path';

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * Move a file, creating the target's directory. Falls back to copy + unlink
 * when source and target sit on different devices. Does not check whether
 * the target exists; callers pick a free name first.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true });
  try {
    await rename(from, to);
  } catch (error) {
    if (!isCrossDeviceError(error)) throw error;
    await copyFile(from, to);
    await unlink(from);
  }
}
