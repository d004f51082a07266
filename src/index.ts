/**
 * dupewarden library surface
 */

export * from './types.js';
export { Logger, logger, AppError, handleError, errorMessage, parseLogLevel, configureLogging } from './logger.js';
export type { ErrorCode, LogLevel, LogEntry, LoggerOptions, LoggingSettings } from './logger.js';
export {
  ConfigManager,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  applyEnvironment,
  createExampleConfig,
  toScanSettings
} from './config.js';
export type { AppConfig, PathsConfig, ScanConfig } from './config.js';
export { WardenDatabase, DEFAULT_DATABASE_PATH } from './database.js';
export { MigrationManager, coreMigrations } from './migrations.js';
export { fingerprintFile, hashFile, describeFile } from './fingerprint.js';
export { isIgnoredExtension, ignoredExtensions, IGNORE_CATEGORY_EXTENSIONS } from './ignore-rules.js';
export { listEligibleFiles, runScan, recordFile, isDirectoryEligible } from './scanner.js';
export { classifyDuplicates, findContentDuplicates, findFilenameDuplicates } from './classifier.js';
export { resolveDuplicates, selectKeeper, scoreGroup, groupByContentHash } from './resolution.js';
export { relocateFiles, destinationDirectory, nextAvailableName } from './relocator.js';
export { restoreOne, restoreAll } from './restore.js';
export { loadScanSettings, SETTING_KEYS } from './settings.js';
export { ensureWorkingDirectories } from './environment.js';
export { DuplicateWarden, openWarden } from './pipeline.js';
export type { RunResult, WardenOptions } from './pipeline.js';
export { ProgressTracker } from './progress.js';
