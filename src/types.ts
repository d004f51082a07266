/**
 * Core types for the duplicate warden
 */

export type DirectoryMode = 'flat' | 'hierarchical';

/** Content hash value recorded when a file could not be read */
export const UNREADABLE_HASH = '';

/**
 * One fingerprinted file under a scanned root
 */
export interface FileRecord {
  path: string;
  filename: string;
  simplifiedName: string;
  /** Extension without the leading dot, '' when the name has none */
  extension: string;
  /** MD5 hex digest, or UNREADABLE_HASH */
  contentHash: string;
  sizeBytes: number;
  createdAt: string | null;
  modifiedAt: string | null;
  isDuplicate: boolean;
}

/**
 * One open relocation in the ledger
 */
export interface MoveRecord {
  id: number;
  originalPath: string;
  destinationPath: string;
  movedAt: string;
}

export interface ScanHistoryEntry {
  directory: string;
  lastScanTime: string;
}

/**
 * Independent ignore-by-extension toggles
 */
export interface IgnoreSettings {
  images: boolean;
  documents: boolean;
  archives: boolean;
  metadata: boolean;
}

export type IgnoreCategory = keyof IgnoreSettings;

/**
 * Directory inclusion thresholds for hierarchical scans. A subdirectory
 * contributes files only when it holds more than `subdirectoryMinFiles`
 * files; the root contributes when it holds at least `rootMinFiles`.
 */
export interface HierarchyThresholds {
  subdirectoryMinFiles: number;
  rootMinFiles: number;
}

export interface ScanSettings {
  directoryMode: DirectoryMode;
  ignore: IgnoreSettings;
  hierarchy: HierarchyThresholds;
  /** Files or directories never scanned (working dir, quarantine, database) */
  excludePaths: string[];
  /** Report progress every N files */
  progressInterval: number;
}

export interface ScanOptions {
  onProgress?: (processed: number, total: number) => void;
}

export interface ScanResult {
  kind: 'full' | 'incremental';
  processed: number;
  errors: number;
  /** Newline-joined, one line per error */
  errorLog: string;
  durationSeconds: number;
  /** Eligible files found on disk */
  discovered: number;
  /** Records dropped because their file is gone */
  removed: number;
}

export interface ClassificationResult {
  totalFiles: number;
  duplicateCount: number;
  byFilename: number;
  byContent: number;
}

export interface ScoredMember {
  record: FileRecord;
  score: number;
}

export interface DuplicateGroupResolution {
  contentHash: string;
  keeper: FileRecord;
  relocate: FileRecord[];
  scores: ScoredMember[];
}

export interface RelocationOptions {
  scanRoot: string;
  quarantineDir: string;
  directoryMode: DirectoryMode;
}

export interface RelocationResult {
  moved: number;
  errors: number;
  errorLog: string;
  moves: MoveRecord[];
}

export interface ResolveResult {
  totalFiles: number;
  duplicateCount: number;
  movedCount: number;
  moveErrors: number;
  errorLog: string;
}

export interface RestoreOptions {
  /** Fingerprint the restored file and record it again */
  reregister?: boolean;
}

export type RestoreFailureCode =
  | 'MOVE_NOT_FOUND'
  | 'DESTINATION_MISSING'
  | 'ORIGINAL_OCCUPIED'
  | 'MOVE_FAILED';

export type RestoreResult =
  | { ok: true; move: MoveRecord }
  | { ok: false; moveId: number; code: RestoreFailureCode; error: string };

export interface RestoreAllResult {
  restoredCount: number;
  errors: number;
  errorLog: string;
}

export interface RootTotals {
  totalFiles: number;
  totalBytes: number;
  duplicateFiles: number;
  duplicateBytes: number;
}

export interface ScanMetrics {
  startTime: string;
  endTime: string;
  durationSeconds: number;
  errorsEncountered: number;
  errorLog: string;
  scanDirectory: string;
  filesProcessed: number;
}
