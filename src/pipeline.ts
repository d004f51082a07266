/**
 * Entry points for the CLI: scan, classify, resolve, relocate, restore.
 * Stages always run one after another, never interleaved.
 */

import { resolve } from 'path';
import { AppConfig, toScanSettings } from './config.js';
import { WardenDatabase } from './database.js';
import { ensureWorkingDirectories } from './environment.js';
import { classifyDuplicates } from './classifier.js';
import { Logger, errorMessage } from './logger.js';
import { relocateFiles } from './relocator.js';
import { resolveDuplicates } from './resolution.js';
import { restoreAll, restoreOne } from './restore.js';
import { runScan } from './scanner.js';
import { loadScanSettings } from './settings.js';
import {
  DuplicateGroupResolution,
  FileRecord,
  MoveRecord,
  ResolveResult,
  RestoreAllResult,
  RestoreOptions,
  RestoreResult,
  RootTotals,
  ScanOptions,
  ScanResult,
  ScanSettings
} from './types.js';

const logger = new Logger({ context: 'pipeline' });

export interface WardenOptions {
  quarantineDir: string;
  settings: ScanSettings;
}

export interface RunResult {
  scan: ScanResult;
  resolution: ResolveResult;
}

export class DuplicateWarden {
  constructor(
    private readonly db: WardenDatabase,
    private readonly options: WardenOptions
  ) {}

  get settings(): ScanSettings {
    return this.options.settings;
  }

  runScan(root: string, scanOptions: ScanOptions = {}): Promise<ScanResult> {
    return runScan(this.db, resolve(root), this.options.settings, scanOptions);
  }

  /**
   * Flag duplicates and pick keepers without moving anything
   */
  planResolution(root: string): DuplicateGroupResolution[] {
    const scanRoot = resolve(root);
    classifyDuplicates(this.db, scanRoot);
    return resolveDuplicates(this.db, scanRoot);
  }

  async classifyAndResolve(root: string): Promise<ResolveResult> {
    const scanRoot = resolve(root);
    const classification = classifyDuplicates(this.db, scanRoot);
    const resolutions = resolveDuplicates(this.db, scanRoot);

    const duplicateFileInfo: Record<string, string[]> = {};
    for (const group of resolutions) {
      duplicateFileInfo[group.contentHash] = [group.keeper, ...group.relocate].map(r => r.path).sort();
    }

    try {
      this.db.logFileStatistics(
        scanRoot,
        classification.totalFiles,
        classification.duplicateCount,
        duplicateFileInfo
      );
    } catch (error) {
      logger.warn(`Could not record duplicate statistics: ${errorMessage(error)}`);
    }

    const relocation = await relocateFiles(
      this.db,
      resolutions.flatMap(group => group.relocate.map(record => record.path)),
      {
        scanRoot,
        quarantineDir: this.options.quarantineDir,
        directoryMode: this.options.settings.directoryMode
      }
    );

    return {
      totalFiles: classification.totalFiles,
      duplicateCount: classification.duplicateCount,
      movedCount: relocation.moved,
      moveErrors: relocation.errors,
      errorLog: relocation.errorLog
    };
  }

  async run(root: string, scanOptions: ScanOptions = {}): Promise<RunResult> {
    const scan = await this.runScan(root, scanOptions);
    const resolution = await this.classifyAndResolve(root);
    return { scan, resolution };
  }

  restoreOne(moveId: number, options: RestoreOptions = {}): Promise<RestoreResult> {
    return restoreOne(this.db, moveId, options);
  }

  restoreAll(options: RestoreOptions = {}): Promise<RestoreAllResult> {
    return restoreAll(this.db, options);
  }

  listMoves(): MoveRecord[] {
    return this.db.listMoves();
  }

  listDuplicates(root: string): FileRecord[] {
    return this.db.getDuplicatesUnder(resolve(root));
  }

  getRootTotals(root: string): RootTotals {
    return this.db.getRootTotals(resolve(root));
  }
}

/**
 * Prepare directories, open the store and load persisted scan settings.
 * `overrides` win over both the file config and the persisted settings.
 */
export function openWarden(
  config: AppConfig,
  overrides: Partial<ScanSettings> = {}
): { db: WardenDatabase; warden: DuplicateWarden } {
  ensureWorkingDirectories(config.paths);
  const db = new WardenDatabase(config.paths.databasePath);
  const settings = { ...loadScanSettings(db, toScanSettings(config)), ...overrides };
  const warden = new DuplicateWarden(db, {
    quarantineDir: resolve(config.paths.quarantineDir),
    settings
  });
  return { db, warden };
}
