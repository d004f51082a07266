/**
 * Database migration system for managing schema versions
 */

import Database from 'better-sqlite3';
import { Logger } from './logger.js';

const logger = new Logger({ context: 'migrations' });

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

export class MigrationManager {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.ensureMigrationsTable();
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  /**
   * Get the current schema version
   */
  getCurrentVersion(): number {
    const result = this.db.prepare(`
      SELECT MAX(version) as version FROM schema_migrations
    `).get() as { version: number | null };

    return result.version ?? 0;
  }

  /**
   * Run all pending migrations
   */
  runPendingMigrations(migrations: Migration[]): number {
    const currentVersion = this.getCurrentVersion();
    const pendingMigrations = migrations
      .filter(m => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pendingMigrations.length === 0) {
      logger.debug('No pending migrations', { currentVersion });
      return 0;
    }

    logger.info(`Running ${pendingMigrations.length} migrations`, {
      from: currentVersion,
      to: pendingMigrations[pendingMigrations.length - 1].version
    });

    for (const migration of pendingMigrations) {
      try {
        const transaction = this.db.transaction(() => {
          migration.up(this.db);
          this.db.prepare(`
            INSERT INTO schema_migrations (version, name)
            VALUES (?, ?)
          `).run(migration.version, migration.name);
        });

        transaction();
        logger.debug(`Migration ${migration.version}: ${migration.name} applied`);
      } catch (error) {
        logger.error(
          `Migration ${migration.version} failed`,
          error instanceof Error ? error : new Error(String(error))
        );
        throw error;
      }
    }

    return pendingMigrations.length;
  }
}

/**
 * Schema of the fingerprint store, ledger and run history
 */
export const coreMigrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS files (
          path TEXT PRIMARY KEY,
          filename TEXT NOT NULL,
          content_hash TEXT NOT NULL DEFAULT '',
          simplified_name TEXT NOT NULL,
          size_bytes INTEGER NOT NULL DEFAULT 0,
          created_at TEXT,
          modified_at TEXT,
          extension TEXT NOT NULL DEFAULT '',
          is_duplicate INTEGER NOT NULL DEFAULT 0
        );

        CREATE TABLE IF NOT EXISTS moved_files (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          original_path TEXT NOT NULL UNIQUE,
          destination_path TEXT NOT NULL,
          moved_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS scan_history (
          directory TEXT PRIMARY KEY,
          last_scan_time TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS config (
          key TEXT PRIMARY KEY,
          value TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_files_hash ON files(content_hash);
        CREATE INDEX IF NOT EXISTS idx_files_filename ON files(filename);
      `);
    }
  },
  {
    version: 2,
    name: 'add_run_statistics',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS scan_metrics (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          start_time TEXT NOT NULL,
          end_time TEXT NOT NULL,
          duration_seconds INTEGER NOT NULL,
          duration_verbose TEXT NOT NULL,
          errors_encountered INTEGER NOT NULL,
          error_log TEXT,
          tool_version TEXT,
          scan_directory TEXT NOT NULL,
          user_name TEXT,
          database_path TEXT,
          files_processed INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS file_statistics (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          recorded_at TEXT NOT NULL,
          scan_directory TEXT NOT NULL,
          total_files INTEGER NOT NULL,
          potential_duplicates INTEGER NOT NULL,
          duplicate_file_info TEXT NOT NULL
        );
      `);
    }
  }
];
