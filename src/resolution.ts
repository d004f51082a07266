/**
 * Keeper selection for content-hash duplicate groups
 */

import { WardenDatabase } from './database.js';
import { Logger } from './logger.js';
import { DuplicateGroupResolution, FileRecord, ScoredMember, UNREADABLE_HASH } from './types.js';

const logger = new Logger({ context: 'resolution' });

export const SCORE_SHORTEST_NAME = 3;
export const SCORE_FIRST_ALPHABETICALLY = 2;
export const SCORE_SMALLEST_SIZE = 1;

/**
 * Score each member: +3 for the shortest simplified name, +2 for the
 * alphabetically first simplified name, +1 for the smallest non-zero size.
 * Ties on a criterion reward every tied member.
 */
export function scoreGroup(records: FileRecord[]): ScoredMember[] {
  if (records.length === 0) return [];

  const minLen = Math.min(...records.map(r => r.simplifiedName.length));
  const firstAlpha = records
    .map(r => r.simplifiedName)
    .reduce((first, name) => (name < first ? name : first));
  const minSize = Math.min(...records.map(r => r.sizeBytes));

  return records.map(record => {
    let score = 0;
    if (record.simplifiedName.length === minLen) score += SCORE_SHORTEST_NAME;
    if (record.simplifiedName === firstAlpha) score += SCORE_FIRST_ALPHABETICALLY;
    if (minSize > 0 && record.sizeBytes === minSize) score += SCORE_SMALLEST_SIZE;
    return { record, score };
  });
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Exactly one keeper: the highest score, ties going to the smallest path
 */
export function selectKeeper(records: FileRecord[]): Omit<DuplicateGroupResolution, 'contentHash'> {
  const scores = scoreGroup(records);
  if (scores.length === 0) {
    throw new Error('Cannot select a keeper from an empty group');
  }

  const ranked = [...scores].sort((a, b) => b.score - a.score || comparePaths(a.record.path, b.record.path));
  const keeper = ranked[0].record;

  return {
    keeper,
    relocate: records.filter(record => record.path !== keeper.path),
    scores
  };
}

/**
 * Duplicate-flagged records sharing a non-empty hash, groups of two or more.
 * Filename-only duplicates never form a group.
 */
export function groupByContentHash(records: FileRecord[]): Map<string, FileRecord[]> {
  const groups = new Map<string, FileRecord[]>();
  for (const record of records) {
    if (!record.isDuplicate || record.contentHash === UNREADABLE_HASH) continue;
    const group = groups.get(record.contentHash);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.contentHash, [record]);
    }
  }

  for (const [hash, members] of groups) {
    if (members.length < 2) groups.delete(hash);
  }
  return groups;
}

/**
 * Resolve every content-hash group under `root`, ordered by hash
 */
export function resolveDuplicates(db: WardenDatabase, root: string): DuplicateGroupResolution[] {
  const groups = groupByContentHash(db.getDuplicatesUnder(root));
  const resolutions: DuplicateGroupResolution[] = [];

  for (const hash of [...groups.keys()].sort()) {
    const members = groups.get(hash) ?? [];
    const resolution = { contentHash: hash, ...selectKeeper(members) };
    logger.debug('Keeper selected', {
      contentHash: hash,
      keeper: resolution.keeper.path,
      relocate: resolution.relocate.map(r => r.path)
    });
    resolutions.push(resolution);
  }

  logger.info(`Resolved ${resolutions.length} duplicate groups`, { root });
  return resolutions;
}
