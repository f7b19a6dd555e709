import { promises as fs } from 'fs';
import type { Stats } from 'fs';
import { join } from 'path';
import { toErrorMessage } from './logger.js';
import type { Logger } from './logger.js';
import type { FileEntry } from './scanner.js';

export type ConflictPolicy = 'fail' | 'overwrite';

export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['fail', 'overwrite'];

export function isConflictPolicy(value: unknown): value is ConflictPolicy {
  return typeof value === 'string' && CONFLICT_POLICIES.some(policy => policy === value);
}

export interface MoveTask {
  file: FileEntry;
  category: string;
  targetDir: string;
}

interface OutcomeBase {
  file: string;
  category: string;
  destination: string;
}

export type Outcome =
  | (OutcomeBase & { status: 'moved' })
  | (OutcomeBase & { status: 'would-move' })
  | (OutcomeBase & { status: 'failed'; reason: string });

export type OutcomeStatus = Outcome['status'];

export interface MoveOptions {
  dryRun: boolean;
  onConflict: ConflictPolicy;
  logger: Logger;
  /** Files in the way of a category folder that are moved out before this task runs */
  vacated?: ReadonlySet<string>;
}

async function statOrNull(target: string, followLinks = false): Promise<Stats | null> {
  try {
    return await (followLinks ? fs.stat(target) : fs.lstat(target));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function destinationFolder(task: MoveTask): string {
  return join(task.targetDir, task.category);
}

/**
 * Create the category folder if it is missing. Safe to call concurrently for the
 * same folder: an existing folder counts as success. A file at the folder's path
 * is an error unless it is listed in `vacated`.
 *
 * @returns true when this call created the folder (or would have, in dry-run mode)
 */
export async function ensureCategoryFolder(
  folder: string,
  dryRun: boolean,
  logger: Logger,
  vacated: ReadonlySet<string> = new Set()
): Promise<boolean> {
  if (dryRun) {
    // mkdir accepts a link to a directory, so follow links here too
    const stats = await statOrNull(folder, true);
    if (stats?.isDirectory()) return false;
    if (stats && !vacated.has(folder)) {
      throw new Error(`A file is in the way of folder ${folder}`);
    }
    logger.info(`Would create folder: ${folder}`);
    return true;
  }

  let created: string | undefined;
  try {
    created = await fs.mkdir(folder, { recursive: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'EEXIST' || error.code === 'ENOTDIR')) {
      throw new Error(`A file is in the way of folder ${folder}`);
    }
    throw error;
  }
  if (created === undefined) return false;

  logger.info(`Created folder: ${folder}`);
  return true;
}

async function checkDestination(destination: string, policy: ConflictPolicy): Promise<string | null> {
  const stats = await statOrNull(destination);
  if (!stats) return null;

  if (stats.isDirectory()) {
    return `Destination is a directory: ${destination}`;
  }
  if (policy === 'fail') {
    return `Destination already exists: ${destination}`;
  }
  return null;
}

/**
 * Move one file into its category folder. Never throws: any failure is returned
 * as a `failed` outcome so the rest of the batch keeps going.
 */
export async function moveFile(task: MoveTask, options: MoveOptions): Promise<Outcome> {
  const { dryRun, onConflict, logger, vacated } = options;
  const folder = destinationFolder(task);
  const destination = join(folder, task.file.name);
  const base: OutcomeBase = { file: task.file.name, category: task.category, destination };

  try {
    await ensureCategoryFolder(folder, dryRun, logger, vacated);

    if (dryRun) {
      logger.info(`Would move ${task.file.name} -> ${destination}`);
      return { ...base, status: 'would-move' };
    }

    const conflict = await checkDestination(destination, onConflict);
    if (conflict) {
      throw new Error(conflict);
    }

    await fs.rename(task.file.path, destination);
    logger.info(`Moved ${task.file.name} -> ${destination}`);
    return { ...base, status: 'moved' };
  } catch (error) {
    const reason = toErrorMessage(error);
    logger.error(`Error moving file '${task.file.name}': ${reason}`);
    return { ...base, status: 'failed', reason };
  }
}
