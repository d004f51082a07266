/**
 * Scanner: enumerates eligible files under a root and keeps the fingerprint
 * store in step with them.
 *
 * The first scan of a root fingerprints every eligible file. Later scans only
 * reconcile paths: new paths are fingerprinted and vanished paths dropped.
 * A file whose content changes in place keeps its old fingerprint until it is
 * removed and re-added.
 */

import { stat } from 'fs/promises';
import { userInfo } from 'os';
import { dirname, join, resolve, sep } from 'path';
import fg from 'fast-glob';
import { WardenDatabase } from './database.js';
import { describeFile, fingerprintFile } from './fingerprint.js';
import { ignoredExtensions } from './ignore-rules.js';
import { AppError, Logger, errorMessage } from './logger.js';
import { FileRecord, ScanOptions, ScanResult, ScanSettings } from './types.js';

const logger = new Logger({ context: 'scanner' });

export const TOOL_VERSION = '0.1.0';

function isExcluded(filePath: string, excludePaths: string[]): boolean {
  return excludePaths.some(excluded => filePath === excluded || filePath.startsWith(excluded + sep));
}

/**
 * Whether a directory holding `fileCount` files contributes them to a
 * hierarchical scan
 */
export function isDirectoryEligible(
  isRoot: boolean,
  fileCount: number,
  thresholds: ScanSettings['hierarchy']
): boolean {
  return isRoot
    ? fileCount >= thresholds.rootMinFiles
    : fileCount > thresholds.subdirectoryMinFiles;
}

/**
 * Lists the absolute paths a scan of `root` would fingerprint, sorted.
 * Symbolic links are never followed.
 */
export async function listEligibleFiles(root: string, settings: ScanSettings): Promise<string[]> {
  const scanRoot = resolve(root);
  const pattern = settings.directoryMode === 'flat' ? '*' : '**/*';

  const relativePaths = await fg(pattern, {
    cwd: scanRoot,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    unique: true,
    absolute: false,
    suppressErrors: true
  });

  const excludePaths = settings.excludePaths.map(p => resolve(p));
  let candidates = relativePaths
    .map(relativePath => join(scanRoot, relativePath))
    .filter(filePath => !isExcluded(filePath, excludePaths));

  if (settings.directoryMode === 'hierarchical') {
    const counts = new Map<string, number>();
    for (const filePath of candidates) {
      const dir = dirname(filePath);
      counts.set(dir, (counts.get(dir) ?? 0) + 1);
    }

    candidates = candidates.filter(filePath => {
      const dir = dirname(filePath);
      return isDirectoryEligible(dir === scanRoot, counts.get(dir) ?? 0, settings.hierarchy);
    });
  }

  const ignored = ignoredExtensions(settings.ignore);
  return candidates
    .filter(filePath => !ignored.has(describeFile(filePath).extension.toLowerCase()))
    .sort();
}

export function describeDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours} hours ${minutes} minutes ${seconds} seconds`;
}

function currentUserName(): string | null {
  try {
    return userInfo().username;
  } catch {
    return null;
  }
}

async function assertDirectory(root: string): Promise<void> {
  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new AppError(`Scan root is not a directory: ${root}`, 'INVALID_ROOT', { root });
    }
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new AppError(`Scan root not accessible: ${root}`, 'INVALID_ROOT', {
      root,
      cause: errorMessage(error)
    });
  }
}

/**
 * Fingerprint one file and upsert its record. A file that cannot be read is
 * still recorded, with the unreadable hash.
 */
export async function recordFile(
  db: WardenDatabase,
  filePath: string
): Promise<{ written: boolean; errors: string[] }> {
  const fingerprint = await fingerprintFile(filePath);
  const errors: string[] = [];
  if (fingerprint.error) {
    errors.push(fingerprint.error);
  }

  const record: FileRecord = {
    path: filePath,
    ...describeFile(filePath),
    contentHash: fingerprint.contentHash,
    sizeBytes: fingerprint.sizeBytes,
    createdAt: fingerprint.createdAt,
    modifiedAt: fingerprint.modifiedAt,
    isDuplicate: false
  };

  try {
    db.upsertFile(record);
    return { written: true, errors };
  } catch (error) {
    errors.push(`Could not record ${filePath}: ${errorMessage(error)}`);
    return { written: false, errors };
  }
}

/**
 * Scan `root` into the store. Throws only when the root itself is unusable;
 * per-file failures are counted and returned in the error log.
 */
export async function runScan(
  db: WardenDatabase,
  root: string,
  settings: ScanSettings,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const scanRoot = resolve(root);
  await assertDirectory(scanRoot);

  const startedAt = new Date();
  const firstScan = !db.hasScannedBefore(scanRoot);
  const eligible = await listEligibleFiles(scanRoot, settings);

  let toAdd = eligible;
  let toRemove: string[] = [];

  if (!firstScan) {
    const stored = new Set(db.getPathsUnder(scanRoot));
    const current = new Set(eligible);
    toAdd = eligible.filter(filePath => !stored.has(filePath));
    toRemove = [...stored].filter(filePath => !current.has(filePath));
  }

  logger.info(firstScan ? 'Performing full scan' : 'Reconciling against previous scan', {
    root: scanRoot,
    toAdd: toAdd.length,
    toRemove: toRemove.length
  });

  const errorLines: string[] = [];
  const addError = (message: string) => {
    logger.warn(message);
    errorLines.push(`${new Date().toISOString()} - ${message}`);
  };

  const interval = Math.max(1, settings.progressInterval);
  let processed = 0;
  for (const filePath of toAdd) {
    const outcome = await recordFile(db, filePath);
    outcome.errors.forEach(addError);
    if (outcome.written) {
      processed++;
      if (processed % interval === 0) {
        options.onProgress?.(processed, toAdd.length);
      }
    }
  }

  let removed = 0;
  for (const filePath of toRemove) {
    try {
      if (db.deleteFile(filePath)) removed++;
    } catch (error) {
      addError(`Could not remove record for ${filePath}: ${errorMessage(error)}`);
    }
  }

  const endedAt = new Date();
  const durationSeconds = Math.floor((endedAt.getTime() - startedAt.getTime()) / 1000);
  const errorLog = errorLines.join('\n');

  try {
    db.logScanMetrics({
      startTime: startedAt.toISOString(),
      endTime: endedAt.toISOString(),
      durationSeconds,
      durationVerbose: describeDuration(durationSeconds),
      errorsEncountered: errorLines.length,
      errorLog,
      toolVersion: TOOL_VERSION,
      scanDirectory: scanRoot,
      userName: currentUserName(),
      databasePath: db.getDatabasePath(),
      filesProcessed: processed
    });
  } catch (error) {
    logger.warn(`Could not record scan metrics for ${scanRoot}: ${errorMessage(error)}`);
  }

  // Next run is incremental only once the history row exists
  try {
    db.updateScanHistory(scanRoot, endedAt.toISOString());
  } catch (error) {
    logger.warn(`Could not record scan history for ${scanRoot}: ${errorMessage(error)}`);
  }

  const result: ScanResult = {
    kind: firstScan ? 'full' : 'incremental',
    processed,
    errors: errorLines.length,
    errorLog,
    durationSeconds,
    discovered: eligible.length,
    removed
  };

  logger.info('Scan finished', {
    root: scanRoot,
    kind: result.kind,
    processed,
    removed,
    errors: result.errors
  });
  return result;
}
