import { join, resolve } from 'path';
import { categorize } from './categorizer.js';
import { BatchProcessor } from './batch-processor.js';
import type { ProcessingResult } from './batch-processor.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { moveFile } from './mover.js';
import type { ConflictPolicy, MoveOptions, MoveTask, Outcome } from './mover.js';
import { scanDirectory } from './scanner.js';

export interface OrganizeOptions {
  dryRun?: boolean;
  workers?: number;
  onConflict?: ConflictPolicy;
  logger?: Logger;
}

export interface OrganizeSummary {
  /** Resolved absolute path of the organized directory */
  targetDir: string;
  dryRun: boolean;
  workers: number;
  total: number;
  moved: number;
  wouldMove: number;
  failed: number;
  /** One per scanned file, in scan order */
  outcomes: Outcome[];
  /** Files per category, including failures */
  categories: Record<string, number>;
  durationMs: number;
}

function countCategories(tasks: MoveTask[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const task of tasks) {
    counts[task.category] = (counts[task.category] ?? 0) + 1;
  }
  return counts;
}

/**
 * Split task indices into files sitting where a category folder of this batch
 * must go (handled first, one at a time) and everything else.
 */
export function planPasses(tasks: MoveTask[]): { blocking: number[]; rest: number[] } {
  const needed = new Set(tasks.map(task => task.category));
  const blocking: number[] = [];
  const rest: number[] = [];
  tasks.forEach((task, index) => {
    (needed.has(task.file.name) ? blocking : rest).push(index);
  });
  return { blocking, rest };
}

function toOutcome(result: ProcessingResult<MoveTask, Outcome>): Outcome {
  if (result.success) return result.result;
  return {
    file: result.item.file.name,
    category: result.item.category,
    destination: join(result.item.targetDir, result.item.category, result.item.file.name),
    status: 'failed',
    reason: result.error.message,
  };
}

/**
 * Sort every regular file directly inside `targetDir` into its category folder.
 *
 * Throws InvalidTargetError before touching anything when `targetDir` is not a
 * directory. Individual file failures are reported in the summary instead of
 * thrown. Files named like a category folder the batch needs are moved first,
 * one at a time; with `workers: 1` the rest follow in listing order.
 */
export async function organize(targetDir: string, options: OrganizeOptions = {}): Promise<OrganizeSummary> {
  const startTime = Date.now();
  const logger = (options.logger ?? createLogger()).child('organizer');
  const dryRun = options.dryRun ?? false;
  const onConflict = options.onConflict ?? 'fail';
  const processor = new BatchProcessor({ concurrency: options.workers ?? 4 });

  const files = await scanDirectory(targetDir);
  const root = resolve(targetDir);

  const summary: OrganizeSummary = {
    targetDir: root,
    dryRun,
    workers: processor.getConcurrency(),
    total: files.length,
    moved: 0,
    wouldMove: 0,
    failed: 0,
    outcomes: [],
    categories: {},
    durationMs: 0,
  };

  if (files.length === 0) {
    logger.info(`No files found in '${root}'. Nothing to organize.`);
    summary.durationMs = Date.now() - startTime;
    return summary;
  }

  const tasks: MoveTask[] = files.map(file => ({
    file,
    category: categorize(file.name),
    targetDir: root,
  }));
  summary.categories = countCategories(tasks);

  const { blocking, rest } = planPasses(tasks);
  // A blocking file whose own category is its name can never leave the way
  const vacated = new Set(
    blocking.map(index => tasks[index]).filter(task => task.category !== task.file.name).map(task => task.file.path)
  );
  const moveOptions: MoveOptions = { dryRun, onConflict, logger: logger.child('mover'), vacated };

  logger.debug(`Dispatching ${tasks.length} files`, { workers: summary.workers, blocking: blocking.length });

  const outcomes = new Array<Outcome>(tasks.length);
  const runPass = async (pass: BatchProcessor, indices: number[]): Promise<void> => {
    const results = await pass.process(indices.map(index => tasks[index]), task => moveFile(task, moveOptions));
    results.forEach((result, position) => {
      outcomes[indices[position]] = toOutcome(result);
    });
  };

  await runPass(new BatchProcessor({ concurrency: 1 }), blocking);
  await runPass(processor, rest);

  for (const outcome of outcomes) {
    summary.outcomes.push(outcome);

    switch (outcome.status) {
      case 'moved':
        summary.moved++;
        break;
      case 'would-move':
        summary.wouldMove++;
        break;
      case 'failed':
        summary.failed++;
        break;
    }
  }

  summary.durationMs = Date.now() - startTime;
  return summary;
}
