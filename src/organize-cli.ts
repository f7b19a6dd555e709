#!/usr/bin/env node
/**
 * organize-cli.ts — sort the files of one directory into category folders.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { listCategoryNames } from './categories.js';
import { loadConfigFile, resolveConfig } from './config.js';
import type { OrganizerConfig } from './config.js';
import { createLogger, handleError, isLogLevel, toErrorMessage, UsageError } from './logger.js';
import { isConflictPolicy } from './mover.js';
import { organize } from './organizer.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export interface CliOptions {
  target: string;
  help: boolean;
  configPath?: string;
  overrides: Partial<OrganizerConfig>;
}

function printUsage() {
  console.log(`
Usage:
  file-sorter <directory> [options]

Moves every file directly inside <directory> into a subfolder named after its
type: ${listCategoryNames().join(', ')}.

Options:
  --dry-run              Log the planned moves without touching the filesystem
  --workers N            Number of concurrent workers (default: 4, 1 = sequential)
  --on-conflict POLICY   fail | overwrite when the destination file exists (default: fail)
  --log-level LEVEL      debug | info | warn | error (default: info, or LOG_LEVEL)
  --config PATH          Read defaults from a .yaml, .yml or .json file
  --no-color             Disable colored log output
  --help                 Show this message

Exit codes:
  0  finished (including when there is nothing to organize)
  1  invalid directory or arguments
  2  finished, but one or more files could not be moved
`);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseWorkers(value: string): number {
  if (!/^[-+]?\d+$/.test(value.trim())) {
    throw new UsageError(`Invalid --workers value: ${value}`);
  }
  return parseInt(value, 10);
}

export function parseArgs(argv: string[]): CliOptions {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { target: '', help: true, overrides: {} };
  }

  const positional: string[] = [];
  const overrides: Partial<OrganizerConfig> = {};
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--dry-run':
        overrides.dryRun = true;
        break;
      case '--workers':
        overrides.workers = parseWorkers(requireValue(arg, argv[++i]));
        break;
      case '--on-conflict': {
        const value = requireValue(arg, argv[++i]);
        if (!isConflictPolicy(value)) {
          throw new UsageError(`Invalid --on-conflict value: ${value}`);
        }
        overrides.onConflict = value;
        break;
      }
      case '--log-level': {
        const value = requireValue(arg, argv[++i]);
        if (!isLogLevel(value)) {
          throw new UsageError(`Invalid --log-level value: ${value}`);
        }
        overrides.logLevel = value;
        break;
      }
      case '--config':
        configPath = requireValue(arg, argv[++i]);
        break;
      case '--no-color':
        overrides.color = false;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown argument: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length === 0) {
    throw new UsageError('Missing required argument: <directory>');
  }
  if (positional.length > 1) {
    throw new UsageError(`Expected one directory, got ${positional.length}: ${positional.join(' ')}`);
  }

  return { target: positional[0], help: false, configPath, overrides };
}

/**
 * Run the organizer and return the process exit code
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let options: CliOptions;
  let config: OrganizerConfig;
  try {
    options = parseArgs(argv);
    if (options.help) {
      printUsage();
      return EXIT_OK;
    }
    const file = options.configPath ? loadConfigFile(options.configPath) : undefined;
    config = resolveConfig({ file, env, cli: options.overrides });
  } catch (error) {
    console.error(`❌ ${toErrorMessage(error)}`);
    console.error('Run with --help for usage.');
    return EXIT_FATAL;
  }

  const logger = createLogger({
    minLevel: config.logLevel,
    color: config.color && Boolean(process.stdout.isTTY),
    context: 'cli',
  });

  let workers = config.workers;
  if (workers < 1) {
    logger.warn(`Worker count must be at least 1 (got ${workers}); using 1`);
    workers = 1;
  }

  logger.info(`Starting file organizer. Dry run: ${config.dryRun}`);

  try {
    const summary = await organize(options.target, {
      dryRun: config.dryRun,
      workers,
      onConflict: config.onConflict,
      logger,
    });

    logger.info(
      `Finished: ${summary.moved} moved, ${summary.wouldMove} planned, ${summary.failed} failed (${summary.total} files)`
    );

    if (summary.failed > 0) {
      logger.warn(`${summary.failed} of ${summary.total} files could not be moved`);
      return EXIT_PARTIAL_FAILURE;
    }
    return EXIT_OK;
  } catch (error) {
    return handleError(error, logger).exitCode;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // npm links bin entries, so compare real paths
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = EXIT_FATAL;
    });
}
