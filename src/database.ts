/**
 * SQLite store for file fingerprints, the relocation ledger and run history
 */

import Database from 'better-sqlite3';
import { sep } from 'path';
import {
  FileRecord,
  MoveRecord,
  RootTotals,
  ScanHistoryEntry,
  ScanMetrics
} from './types.js';
import { MigrationManager, coreMigrations } from './migrations.js';

export const DEFAULT_DATABASE_PATH = './dupewarden_working/file_info.sqlite';

interface FileRow {
  path: string;
  filename: string;
  content_hash: string;
  simplified_name: string;
  size_bytes: number;
  created_at: string | null;
  modified_at: string | null;
  extension: string;
  is_duplicate: number;
}

interface MoveRow {
  id: number;
  original_path: string;
  destination_path: string;
  moved_at: string;
}

export interface ScanMetricsRecord extends ScanMetrics {
  durationVerbose: string;
  toolVersion: string;
  userName: string | null;
  databasePath: string;
}

export interface FileStatisticsRecord {
  id: number;
  recordedAt: string;
  scanDirectory: string;
  totalFiles: number;
  potentialDuplicates: number;
  duplicateFileInfo: Record<string, string[]>;
}

export interface NewMove {
  originalPath: string;
  destinationPath: string;
  movedAt?: string;
}

/**
 * Bounds `[lower, upper)` holding every path strictly below `root` under
 * BINARY collation: `root + sep` up to `root` followed by the next code point
 * after the separator. Comparison is exact, so `/x/Roms` never takes in `/x/ROMS`.
 */
export function rootRange(root: string): [lower: string, upper: string] {
  const base = root.endsWith(sep) ? root.slice(0, -1) : root;
  return [base + sep, base + String.fromCharCode(sep.charCodeAt(0) + 1)];
}

function toFileRecord(row: FileRow): FileRecord {
  return {
    path: row.path,
    filename: row.filename,
    simplifiedName: row.simplified_name,
    extension: row.extension,
    contentHash: row.content_hash,
    sizeBytes: row.size_bytes,
    createdAt: row.created_at,
    modifiedAt: row.modified_at,
    isDuplicate: row.is_duplicate === 1
  };
}

function toMoveRecord(row: MoveRow): MoveRecord {
  return {
    id: row.id,
    originalPath: row.original_path,
    destinationPath: row.destination_path,
    movedAt: row.moved_at
  };
}

export class WardenDatabase {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = DEFAULT_DATABASE_PATH) {
    this.dbPath = dbPath;
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    new MigrationManager(this.db).runPendingMigrations(coreMigrations);
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  // ---------------------------------------------------------------------------
  // Fingerprint store
  // ---------------------------------------------------------------------------

  /**
   * Insert or overwrite a record. The duplicate flag always starts cleared;
   * only classification sets it.
   */
  upsertFile(record: FileRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO files
      (path, filename, content_hash, simplified_name, size_bytes, created_at, modified_at, extension, is_duplicate)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0)
    `).run(
      record.path,
      record.filename,
      record.contentHash,
      record.simplifiedName,
      record.sizeBytes,
      record.createdAt,
      record.modifiedAt,
      record.extension
    );
  }

  deleteFile(path: string): boolean {
    const result = this.db.prepare('DELETE FROM files WHERE path = ?').run(path);
    return result.changes > 0;
  }

  getFile(path: string): FileRecord | undefined {
    const row = this.db.prepare('SELECT * FROM files WHERE path = ?').get(path) as FileRow | undefined;
    return row ? toFileRecord(row) : undefined;
  }

  getFilesUnder(root: string): FileRecord[] {
    const rows = this.db.prepare(`
      SELECT * FROM files WHERE path >= ? AND path < ? ORDER BY path
    `).all(...rootRange(root)) as FileRow[];
    return rows.map(toFileRecord);
  }

  getPathsUnder(root: string): string[] {
    const rows = this.db.prepare(`
      SELECT path FROM files WHERE path >= ? AND path < ? ORDER BY path
    `).all(...rootRange(root)) as Array<{ path: string }>;
    return rows.map(row => row.path);
  }

  getDuplicatesUnder(root: string): FileRecord[] {
    const rows = this.db.prepare(`
      SELECT * FROM files
      WHERE is_duplicate = 1 AND path >= ? AND path < ?
      ORDER BY content_hash, path
    `).all(...rootRange(root)) as FileRow[];
    return rows.map(toFileRecord);
  }

  /**
   * Replace every duplicate flag under `root`: cleared first, then set for
   * exactly the given paths.
   */
  replaceDuplicateFlags(root: string, duplicatePaths: Iterable<string>): void {
    const reset = this.db.prepare(`
      UPDATE files SET is_duplicate = 0 WHERE path >= ? AND path < ?
    `);
    const mark = this.db.prepare('UPDATE files SET is_duplicate = 1 WHERE path = ?');

    const apply = this.db.transaction((paths: Iterable<string>) => {
      reset.run(...rootRange(root));
      for (const path of paths) {
        mark.run(path);
      }
    });

    apply(duplicatePaths);
  }

  getRootTotals(root: string): RootTotals {
    const row = this.db.prepare(`
      SELECT
        COUNT(*) AS total_files,
        COALESCE(SUM(size_bytes), 0) AS total_bytes,
        COALESCE(SUM(is_duplicate), 0) AS duplicate_files,
        COALESCE(SUM(CASE WHEN is_duplicate = 1 THEN size_bytes ELSE 0 END), 0) AS duplicate_bytes
      FROM files WHERE path >= ? AND path < ?
    `).get(...rootRange(root)) as {
      total_files: number;
      total_bytes: number;
      duplicate_files: number;
      duplicate_bytes: number;
    };

    return {
      totalFiles: row.total_files,
      totalBytes: row.total_bytes,
      duplicateFiles: row.duplicate_files,
      duplicateBytes: row.duplicate_bytes
    };
  }

  // ---------------------------------------------------------------------------
  // Ledger
  // ---------------------------------------------------------------------------

  insertMove(move: NewMove): MoveRecord {
    const movedAt = move.movedAt ?? new Date().toISOString();
    const result = this.db.prepare(`
      INSERT INTO moved_files (original_path, destination_path, moved_at)
      VALUES (?, ?, ?)
    `).run(move.originalPath, move.destinationPath, movedAt);

    return {
      id: Number(result.lastInsertRowid),
      originalPath: move.originalPath,
      destinationPath: move.destinationPath,
      movedAt
    };
  }

  /**
   * Ledger the move and drop the file's fingerprint in one transaction
   */
  recordRelocation(move: NewMove): MoveRecord {
    const record = this.db.transaction((pending: NewMove) => {
      const inserted = this.insertMove(pending);
      this.deleteFile(pending.originalPath);
      return inserted;
    });
    return record(move);
  }

  getMove(id: number): MoveRecord | undefined {
    const row = this.db.prepare('SELECT * FROM moved_files WHERE id = ?').get(id) as MoveRow | undefined;
    return row ? toMoveRecord(row) : undefined;
  }

  getMoveByOriginalPath(originalPath: string): MoveRecord | undefined {
    const row = this.db.prepare(
      'SELECT * FROM moved_files WHERE original_path = ?'
    ).get(originalPath) as MoveRow | undefined;
    return row ? toMoveRecord(row) : undefined;
  }

  listMoves(): MoveRecord[] {
    const rows = this.db.prepare('SELECT * FROM moved_files ORDER BY id').all() as MoveRow[];
    return rows.map(toMoveRecord);
  }

  deleteMove(id: number): boolean {
    return this.db.prepare('DELETE FROM moved_files WHERE id = ?').run(id).changes > 0;
  }

  countMoves(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM moved_files').get() as { count: number };
    return row.count;
  }

  // ---------------------------------------------------------------------------
  // Scan history and statistics
  // ---------------------------------------------------------------------------

  hasScannedBefore(directory: string): boolean {
    const row = this.db.prepare(
      'SELECT COUNT(*) AS count FROM scan_history WHERE directory = ?'
    ).get(directory) as { count: number };
    return row.count > 0;
  }

  updateScanHistory(directory: string, lastScanTime: string = new Date().toISOString()): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO scan_history (directory, last_scan_time) VALUES (?, ?)
    `).run(directory, lastScanTime);
  }

  getScanHistory(): ScanHistoryEntry[] {
    const rows = this.db.prepare(
      'SELECT directory, last_scan_time FROM scan_history ORDER BY directory'
    ).all() as Array<{ directory: string; last_scan_time: string }>;
    return rows.map(row => ({ directory: row.directory, lastScanTime: row.last_scan_time }));
  }

  logScanMetrics(metrics: ScanMetricsRecord): void {
    this.db.prepare(`
      INSERT INTO scan_metrics
      (start_time, end_time, duration_seconds, duration_verbose, errors_encountered, error_log,
       tool_version, scan_directory, user_name, database_path, files_processed)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      metrics.startTime,
      metrics.endTime,
      metrics.durationSeconds,
      metrics.durationVerbose,
      metrics.errorsEncountered,
      metrics.errorLog,
      metrics.toolVersion,
      metrics.scanDirectory,
      metrics.userName,
      metrics.databasePath,
      metrics.filesProcessed
    );
  }

  getLatestScanMetrics(directory: string): ScanMetricsRecord | undefined {
    const row = this.db.prepare(`
      SELECT * FROM scan_metrics WHERE scan_directory = ? ORDER BY id DESC LIMIT 1
    `).get(directory) as {
      start_time: string;
      end_time: string;
      duration_seconds: number;
      duration_verbose: string;
      errors_encountered: number;
      error_log: string | null;
      tool_version: string | null;
      scan_directory: string;
      user_name: string | null;
      database_path: string | null;
      files_processed: number;
    } | undefined;

    if (!row) return undefined;

    return {
      startTime: row.start_time,
      endTime: row.end_time,
      durationSeconds: row.duration_seconds,
      durationVerbose: row.duration_verbose,
      errorsEncountered: row.errors_encountered,
      errorLog: row.error_log ?? '',
      toolVersion: row.tool_version ?? '',
      scanDirectory: row.scan_directory,
      userName: row.user_name,
      databasePath: row.database_path ?? '',
      filesProcessed: row.files_processed
    };
  }

  logFileStatistics(
    directory: string,
    totalFiles: number,
    potentialDuplicates: number,
    duplicateFileInfo: Record<string, string[]>
  ): void {
    this.db.prepare(`
      INSERT INTO file_statistics (recorded_at, scan_directory, total_files, potential_duplicates, duplicate_file_info)
      VALUES (?, ?, ?, ?, ?)
    `).run(
      new Date().toISOString(),
      directory,
      totalFiles,
      potentialDuplicates,
      JSON.stringify(duplicateFileInfo)
    );
  }

  getFileStatistics(directory: string): FileStatisticsRecord[] {
    const rows = this.db.prepare(`
      SELECT * FROM file_statistics WHERE scan_directory = ? ORDER BY id
    `).all(directory) as Array<{
      id: number;
      recorded_at: string;
      scan_directory: string;
      total_files: number;
      potential_duplicates: number;
      duplicate_file_info: string;
    }>;

    return rows.map(row => ({
      id: row.id,
      recordedAt: row.recorded_at,
      scanDirectory: row.scan_directory,
      totalFiles: row.total_files,
      potentialDuplicates: row.potential_duplicates,
      duplicateFileInfo: JSON.parse(row.duplicate_file_info) as Record<string, string[]>
    }));
  }

  // ---------------------------------------------------------------------------
  // Persisted settings
  // ---------------------------------------------------------------------------

  getSetting(key: string): string | undefined {
    const row = this.db.prepare('SELECT value FROM config WHERE key = ?').get(key) as
      | { value: string | null }
      | undefined;
    return row?.value ?? undefined;
  }

  setSetting(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO config (key, value) VALUES (?, ?)').run(key, value);
  }

  getAllSettings(): Record<string, string> {
    const rows = this.db.prepare('SELECT key, value FROM config ORDER BY key').all() as Array<{
      key: string;
      value: string | null;
    }>;
    const settings: Record<string, string> = {};
    for (const row of rows) {
      if (row.value !== null) settings[row.key] = row.value;
    }
    return settings;
  }

  close(): void {
    this.db.close();
  }
}
