export { CATEGORY_TABLE, FALLBACK_CATEGORY, findDuplicateExtensions, listCategoryNames } from './categories.js';
export type { Category, CategoryTable } from './categories.js';
export { categorize, getExtension } from './categorizer.js';
export { scanDirectory, assertDirectory } from './scanner.js';
export type { FileEntry } from './scanner.js';
export { moveFile, ensureCategoryFolder, destinationFolder, isConflictPolicy, CONFLICT_POLICIES } from './mover.js';
export type { ConflictPolicy, MoveOptions, MoveTask, Outcome, OutcomeStatus } from './mover.js';
export { BatchProcessor, normalizeConcurrency } from './batch-processor.js';
export type { BatchConfig, BatchProgress, ProcessingResult } from './batch-processor.js';
export { organize } from './organizer.js';
export type { OrganizeOptions, OrganizeSummary } from './organizer.js';
export { DEFAULT_CONFIG, loadConfigFile, resolveConfig, validateConfig } from './config.js';
export type { ConfigSources, OrganizerConfig } from './config.js';
export { AppError, InvalidTargetError, UsageError, Logger, createLogger, handleError, toErrorMessage } from './logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './logger.js';
