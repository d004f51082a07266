/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import YAML from 'js-yaml';
import { AppError, Logger, LogLevel, errorMessage, isLogLevel, parseLogLevel } from './logger.js';
import { DirectoryMode, HierarchyThresholds, IgnoreSettings, ScanSettings } from './types.js';
import { IGNORE_CATEGORIES } from './ignore-rules.js';

const logger = new Logger({ context: 'ConfigManager' });

export const DEFAULT_CONFIG_PATH = './dupewarden.yaml';

export interface PathsConfig {
  workingDir: string;
  databasePath: string;
  quarantineDir: string;
}

export interface ScanConfig {
  directoryMode: DirectoryMode;
  ignore: IgnoreSettings;
  hierarchy: HierarchyThresholds;
  progressInterval: number;
}

export interface AppConfig {
  paths: PathsConfig;
  scan: ScanConfig;
  logLevel: LogLevel;
}

type ConfigTree = Record<string, unknown>;

export const DEFAULT_CONFIG: AppConfig = {
  paths: {
    workingDir: './dupewarden_working',
    databasePath: './dupewarden_working/file_info.sqlite',
    quarantineDir: './dupewarden_working/duplicates'
  },
  scan: {
    directoryMode: 'flat',
    ignore: {
      images: false,
      documents: false,
      archives: false,
      metadata: false
    },
    hierarchy: {
      subdirectoryMinFiles: 3,
      rootMinFiles: 1
    },
    progressInterval: 10
  },
  logLevel: 'info'
};

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneTree<T>(value: T): T {
  return structuredClone(value);
}

function toTree(config: AppConfig): ConfigTree {
  return JSON.parse(JSON.stringify(config)) as ConfigTree;
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function readInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) ? value : fallback;
}

export function isDirectoryMode(value: unknown): value is DirectoryMode {
  return value === 'flat' || value === 'hierarchical';
}

/**
 * Read a loosely-typed tree into an AppConfig, taking defaults for any
 * missing or mistyped value
 */
export function normalizeConfig(tree: ConfigTree): AppConfig {
  const paths = isRecord(tree.paths) ? tree.paths : {};
  const scan = isRecord(tree.scan) ? tree.scan : {};
  const ignore = isRecord(scan.ignore) ? scan.ignore : {};
  const hierarchy = isRecord(scan.hierarchy) ? scan.hierarchy : {};
  const defaults = DEFAULT_CONFIG;

  const ignoreSettings: IgnoreSettings = { ...defaults.scan.ignore };
  for (const category of IGNORE_CATEGORIES) {
    ignoreSettings[category] = readBoolean(ignore[category], defaults.scan.ignore[category]);
  }

  return {
    paths: {
      workingDir: readString(paths.workingDir, defaults.paths.workingDir),
      databasePath: readString(paths.databasePath, defaults.paths.databasePath),
      quarantineDir: readString(paths.quarantineDir, defaults.paths.quarantineDir)
    },
    scan: {
      directoryMode: isDirectoryMode(scan.directoryMode) ? scan.directoryMode : defaults.scan.directoryMode,
      ignore: ignoreSettings,
      hierarchy: {
        subdirectoryMinFiles: readInteger(hierarchy.subdirectoryMinFiles, defaults.scan.hierarchy.subdirectoryMinFiles),
        rootMinFiles: readInteger(hierarchy.rootMinFiles, defaults.scan.hierarchy.rootMinFiles)
      },
      progressInterval: readInteger(scan.progressInterval, defaults.scan.progressInterval)
    },
    logLevel: parseLogLevel(typeof tree.logLevel === 'string' ? tree.logLevel : undefined, defaults.logLevel)
  };
}

/**
 * Merge user config with defaults (user config takes precedence)
 */
export function mergeConfigs(defaults: ConfigTree, user: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...defaults };

  for (const [key, value] of Object.entries(user)) {
    if (value === null || value === undefined) continue;

    const current = merged[key];
    if (isRecord(value) && isRecord(current)) {
      merged[key] = mergeConfigs(current, value);
    } else {
      merged[key] = value;
    }
  }

  return merged;
}

/**
 * Environment variables that override file settings
 */
export function applyEnvironment(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const next = cloneTree(config);
  if (env.DUPEWARDEN_DB_PATH) next.paths.databasePath = env.DUPEWARDEN_DB_PATH;
  if (env.DUPEWARDEN_QUARANTINE_DIR) next.paths.quarantineDir = env.DUPEWARDEN_QUARANTINE_DIR;
  if (env.DUPEWARDEN_WORKING_DIR) next.paths.workingDir = env.DUPEWARDEN_WORKING_DIR;
  if (env.LOG_LEVEL) next.logLevel = parseLogLevel(env.LOG_LEVEL, next.logLevel);
  return next;
}

/**
 * Scan settings derived from the config. The working directory, the
 * quarantine and the database file are never scanned.
 */
export function toScanSettings(config: AppConfig): ScanSettings {
  return {
    directoryMode: config.scan.directoryMode,
    ignore: { ...config.scan.ignore },
    hierarchy: { ...config.scan.hierarchy },
    progressInterval: config.scan.progressInterval,
    excludePaths: [
      resolve(config.paths.workingDir),
      resolve(config.paths.quarantineDir),
      resolve(config.paths.databasePath)
    ]
  };
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private tree: ConfigTree;
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.tree = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): ConfigTree {
    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return toTree(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new AppError(`Unsupported config format: ${this.configPath}`, 'UNSUPPORTED_CONFIG_FORMAT');
      }

      logger.info(`Loaded configuration from ${this.configPath}`);

      return mergeConfigs(toTree(DEFAULT_CONFIG), isRecord(parsed) ? parsed : {});
    } catch (error) {
      logger.warn(`Failed to load config: ${errorMessage(error)}`);
      return toTree(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return normalizeConfig(this.tree);
  }

  /**
   * Get nested configuration value
   */
  get(path: string): unknown {
    let value: unknown = this.tree;

    for (const part of path.split('.')) {
      if (!isRecord(value)) return undefined;
      value = value[part];
    }

    return value;
  }

  /**
   * Validate the raw values, before defaults paper over them
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const mode = this.get('scan.directoryMode');
    if (mode !== undefined && !isDirectoryMode(mode)) {
      errors.push('scan.directoryMode must be "flat" or "hierarchical"');
    }

    for (const key of ['scan.hierarchy.subdirectoryMinFiles', 'scan.hierarchy.rootMinFiles']) {
      const value = this.get(key);
      if (value !== undefined && (typeof value !== 'number' || !Number.isInteger(value) || value < 0)) {
        errors.push(`${key} must be a non-negative integer`);
      }
    }

    const interval = this.get('scan.progressInterval');
    if (interval !== undefined && (typeof interval !== 'number' || !Number.isInteger(interval) || interval < 1)) {
      errors.push('scan.progressInterval must be at least 1');
    }

    for (const category of IGNORE_CATEGORIES) {
      const value = this.get(`scan.ignore.${category}`);
      if (value !== undefined && typeof value !== 'boolean') {
        errors.push(`scan.ignore.${category} must be true or false`);
      }
    }

    const level = this.get('logLevel');
    if (level !== undefined && !isLogLevel(level)) {
      errors.push('logLevel must be one of debug, info, warn, error');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './dupewarden.example.yaml'): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, YAML.dump(DEFAULT_CONFIG));
  logger.info(`Example config created at ${outputPath}`);
}
