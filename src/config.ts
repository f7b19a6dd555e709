/**
 * Run configuration with optional YAML and JSON file support
 */

import { existsSync, readFileSync } from 'fs';
import YAML from 'js-yaml';
import { isLogLevel, LOG_LEVELS, UsageError, toErrorMessage } from './logger.js';
import type { LogLevel } from './logger.js';
import { CONFLICT_POLICIES, isConflictPolicy } from './mover.js';
import type { ConflictPolicy } from './mover.js';

export interface OrganizerConfig {
  dryRun: boolean;
  workers: number;
  onConflict: ConflictPolicy;
  logLevel: LogLevel;
  color: boolean;
}

export const DEFAULT_CONFIG: Readonly<OrganizerConfig> = Object.freeze({
  dryRun: false,
  workers: 4,
  onConflict: 'fail',
  logLevel: 'info',
  color: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check an untyped object (parsed file contents) key by key. Unknown keys are
 * rejected so a typo does not silently fall back to a default.
 */
export function validateConfig(raw: unknown, source: string): Partial<OrganizerConfig> {
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new UsageError(`Config ${source} must contain a mapping`);
  }

  const config: Partial<OrganizerConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'dryRun':
        if (typeof value !== 'boolean') {
          throw new UsageError(`Config ${source}: 'dryRun' must be true or false`);
        }
        config.dryRun = value;
        break;
      case 'color':
        if (typeof value !== 'boolean') {
          throw new UsageError(`Config ${source}: 'color' must be true or false`);
        }
        config.color = value;
        break;
      case 'workers':
        if (typeof value !== 'number' || !Number.isInteger(value)) {
          throw new UsageError(`Config ${source}: 'workers' must be an integer`);
        }
        config.workers = value;
        break;
      case 'onConflict':
        if (!isConflictPolicy(value)) {
          throw new UsageError(
            `Config ${source}: 'onConflict' must be one of ${CONFLICT_POLICIES.join(', ')}`
          );
        }
        config.onConflict = value;
        break;
      case 'logLevel':
        if (!isLogLevel(value)) {
          throw new UsageError(`Config ${source}: 'logLevel' must be one of ${LOG_LEVELS.join(', ')}`);
        }
        config.logLevel = value;
        break;
      default:
        throw new UsageError(`Config ${source}: unknown key '${key}'`);
    }
  }
  return config;
}

/**
 * Load a config file; the format follows the extension
 */
export function loadConfigFile(configPath: string): Partial<OrganizerConfig> {
  if (!existsSync(configPath)) {
    throw new UsageError(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    if (configPath.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
      parsed = YAML.load(content);
    } else {
      throw new Error(`Unsupported config format: ${configPath}`);
    }
  } catch (error) {
    throw new UsageError(`Failed to load config ${configPath}: ${toErrorMessage(error)}`);
  }

  return validateConfig(parsed, configPath);
}

export interface ConfigSources {
  file?: Partial<OrganizerConfig>;
  env?: NodeJS.ProcessEnv;
  cli?: Partial<OrganizerConfig>;
}

/**
 * Merge defaults, config file, environment and flags (later wins)
 */
export function resolveConfig(sources: ConfigSources = {}): OrganizerConfig {
  const merged: OrganizerConfig = { ...DEFAULT_CONFIG, ...sources.file };

  // an empty LOG_LEVEL counts as unset
  const envLevel = sources.env?.LOG_LEVEL?.trim().toLowerCase();
  if (envLevel) {
    if (!isLogLevel(envLevel)) {
      throw new UsageError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
    merged.logLevel = envLevel;
  }

  const cli = sources.cli ?? {};
  return {
    dryRun: cli.dryRun ?? merged.dryRun,
    workers: cli.workers ?? merged.workers,
    onConflict: cli.onConflict ?? merged.onConflict,
    logLevel: cli.logLevel ?? merged.logLevel,
    color: cli.color ?? merged.color,
  };
}
