/**
 * Scan settings persisted in the store's `config` table. Values saved there
 * override the file configuration they are loaded over.
 */

import { WardenDatabase } from './database.js';
import { IGNORE_CATEGORIES } from './ignore-rules.js';
import { isDirectoryMode } from './config.js';
import { ScanSettings } from './types.js';

export const SETTING_KEYS = {
  directoryMode: 'directory_mode',
  subdirectoryMinFiles: 'subdirectory_min_files',
  rootMinFiles: 'root_min_files',
  ignorePrefix: 'ignore_'
} as const;

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return fallback;
}

function parseCount(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadScanSettings(db: WardenDatabase, defaults: ScanSettings): ScanSettings {
  const mode = db.getSetting(SETTING_KEYS.directoryMode);
  const ignore = { ...defaults.ignore };
  for (const category of IGNORE_CATEGORIES) {
    ignore[category] = parseFlag(db.getSetting(SETTING_KEYS.ignorePrefix + category), ignore[category]);
  }

  return {
    ...defaults,
    directoryMode: isDirectoryMode(mode) ? mode : defaults.directoryMode,
    ignore,
    hierarchy: {
      subdirectoryMinFiles: parseCount(
        db.getSetting(SETTING_KEYS.subdirectoryMinFiles),
        defaults.hierarchy.subdirectoryMinFiles
      ),
      rootMinFiles: parseCount(db.getSetting(SETTING_KEYS.rootMinFiles), defaults.hierarchy.rootMinFiles)
    },
    excludePaths: [...defaults.excludePaths]
  };
}
