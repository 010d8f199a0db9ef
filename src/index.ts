/**
 * Downloads organizer library entry point
 */

export { DownloadsOrganizer, validateOrganizerOptions, MAX_CONCURRENCY } from './organizer.js';
export type { OrganizeRunOptions, OrganizerDependencies } from './organizer.js';
export {
  candidateExtensions,
  classify,
  classifyFile,
  createCategoryTable,
  loadDefaultCategoryTable,
  normalizeExtension,
} from './categories.js';
export type { Category, CategoryDefinition, CategoryTable } from './categories.js';
export { resolveDestination, pathExists } from './destination-resolver.js';
export { FileMover } from './file-mover.js';
export type { FileMoverOptions } from './file-mover.js';
export {
  evaluateFile,
  SKIP_REASONS,
  DEFAULT_IN_PROGRESS_EXTENSIONS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
} from './file-task.js';
export { ResultsAggregator, createEmptyResults } from './results.js';
export { ConfigManager, DEFAULT_CONFIG, createExampleConfig } from './config.js';
export type { OrganizerConfig, WatchConfig } from './config.js';
export { getDownloadsPath, downloadsCandidates } from './downloads-path.js';
export { formatRunReport, toJsonReport } from './report.js';
export { watchDownloads, createDebouncedRunner } from './watch.js';
export {
  ConfigValidationError,
  DirectoryAccessError,
  FolderCreationError,
  MoveError,
  ResolverExhaustedError,
} from './errors.js';
export { AppError, Logger, logger, handleError } from './logger.js';
export type { FileSystemOps } from './fs-ops.js';
export type * from './types.js';
