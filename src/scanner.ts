import { promises as fs } from 'fs';
import type { Dirent } from 'fs';
import { join, resolve } from 'path';
import { InvalidTargetError, toErrorMessage } from './logger.js';

export interface FileEntry {
  name: string;
  path: string;
}

function describeStatFailure(error: unknown): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return 'path does not exist';
  }
  return toErrorMessage(error);
}

/**
 * Fails with InvalidTargetError unless `targetDir` is an existing directory.
 * Returns the resolved absolute path.
 */
export async function assertDirectory(targetDir: string): Promise<string> {
  const absolute = resolve(targetDir);
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(absolute)).isDirectory();
  } catch (error) {
    throw new InvalidTargetError(targetDir, describeStatFailure(error));
  }

  if (!isDirectory) {
    throw new InvalidTargetError(targetDir, 'not a directory');
  }
  return absolute;
}

async function isRegularFile(dirent: Dirent, fullPath: string): Promise<boolean> {
  if (dirent.isFile()) return true;
  if (!dirent.isSymbolicLink()) return false;

  try {
    return (await fs.stat(fullPath)).isFile();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Regular files directly inside `targetDir`, in directory listing order.
 * Subdirectories, links to directories and dangling links are skipped.
 */
export async function scanDirectory(targetDir: string): Promise<FileEntry[]> {
  const root = await assertDirectory(targetDir);

  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new InvalidTargetError(targetDir, toErrorMessage(error));
  }

  const entries: FileEntry[] = [];
  for (const dirent of dirents) {
    const fullPath = join(root, dirent.name);
    if (await isRegularFile(dirent, fullPath)) {
      entries.push({ name: dirent.name, path: fullPath });
    }
  }
  return entries;
}
