/**
 * Duplicate classification. Two independent criteria, OR-ed together:
 * a shared filename, or a shared non-empty content hash. Content does not
 * matter for the first; the unreadable hash never matches for the second.
 */

import { WardenDatabase } from './database.js';
import { Logger } from './logger.js';
import { ClassificationResult, FileRecord, UNREADABLE_HASH } from './types.js';

const logger = new Logger({ context: 'classifier' });

function pathsSharingKey(records: FileRecord[], keyOf: (record: FileRecord) => string | null): Set<string> {
  const byKey = new Map<string, string[]>();
  for (const record of records) {
    const key = keyOf(record);
    if (key === null) continue;
    const group = byKey.get(key);
    if (group) {
      group.push(record.path);
    } else {
      byKey.set(key, [record.path]);
    }
  }

  const matches = new Set<string>();
  for (const paths of byKey.values()) {
    // A record never matches itself, so a key needs two distinct paths
    if (new Set(paths).size > 1) {
      paths.forEach(path => matches.add(path));
    }
  }
  return matches;
}

export function findFilenameDuplicates(records: FileRecord[]): Set<string> {
  return pathsSharingKey(records, record => record.filename);
}

export function findContentDuplicates(records: FileRecord[]): Set<string> {
  return pathsSharingKey(records, record =>
    record.contentHash === UNREADABLE_HASH ? null : record.contentHash
  );
}

/**
 * Recompute every duplicate flag under `root` from scratch
 */
export function classifyDuplicates(db: WardenDatabase, root: string): ClassificationResult {
  const records = db.getFilesUnder(root);
  const byFilename = findFilenameDuplicates(records);
  const byContent = findContentDuplicates(records);
  const duplicates = new Set([...byFilename, ...byContent]);

  db.replaceDuplicateFlags(root, duplicates);

  const result: ClassificationResult = {
    totalFiles: records.length,
    duplicateCount: duplicates.size,
    byFilename: byFilename.size,
    byContent: byContent.size
  };

  logger.info('Classification complete', { root, ...result });
  return result;
}
