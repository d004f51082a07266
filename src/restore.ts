/**
 * Reverses ledgered relocations. Touches the ledger and the filesystem;
 * fingerprint records are only rewritten when `reregister` is asked for.
 */

import { WardenDatabase } from './database.js';
import { moveFile, pathExists } from './fs-utils.js';
import { Logger, errorMessage } from './logger.js';
import { recordFile } from './scanner.js';
import {
  MoveRecord,
  RestoreAllResult,
  RestoreFailureCode,
  RestoreOptions,
  RestoreResult
} from './types.js';

const logger = new Logger({ context: 'restore' });

function failure(moveId: number, code: RestoreFailureCode, error: string): RestoreResult {
  logger.warn(error, { moveId, code });
  return { ok: false, moveId, code, error };
}

async function restoreMove(
  db: WardenDatabase,
  move: MoveRecord,
  options: RestoreOptions
): Promise<RestoreResult> {
  if (!(await pathExists(move.destinationPath))) {
    return failure(move.id, 'DESTINATION_MISSING', `Quarantined file is missing: ${move.destinationPath}`);
  }
  if (await pathExists(move.originalPath)) {
    return failure(move.id, 'ORIGINAL_OCCUPIED', `Original path is occupied: ${move.originalPath}`);
  }

  try {
    await moveFile(move.destinationPath, move.originalPath);
  } catch (error) {
    return failure(move.id, 'MOVE_FAILED', `Could not restore ${move.originalPath}: ${errorMessage(error)}`);
  }

  try {
    db.deleteMove(move.id);
  } catch (error) {
    // The row still says quarantined, so put the file back there
    try {
      await moveFile(move.originalPath, move.destinationPath);
    } catch (rollbackError) {
      logger.error(
        `Ledger entry ${move.id} still open but file is back at ${move.originalPath}`,
        rollbackError instanceof Error ? rollbackError : undefined
      );
    }
    return failure(move.id, 'MOVE_FAILED', `Could not clear ledger entry ${move.id}: ${errorMessage(error)}`);
  }

  if (options.reregister) {
    const outcome = await recordFile(db, move.originalPath);
    outcome.errors.forEach(message => logger.warn(message));
  }

  logger.debug('Restored file', { moveId: move.id, path: move.originalPath });
  return { ok: true, move };
}

export async function restoreOne(
  db: WardenDatabase,
  moveId: number,
  options: RestoreOptions = {}
): Promise<RestoreResult> {
  const move = db.getMove(moveId);
  if (!move) {
    return failure(moveId, 'MOVE_NOT_FOUND', `No relocation with id ${moveId}`);
  }
  return restoreMove(db, move, options);
}

/**
 * Restore every open relocation, oldest first, continuing past failures
 */
export async function restoreAll(db: WardenDatabase, options: RestoreOptions = {}): Promise<RestoreAllResult> {
  const errorLines: string[] = [];
  let restoredCount = 0;

  for (const move of db.listMoves()) {
    const result = await restoreMove(db, move, options);
    if (result.ok) {
      restoredCount++;
    } else {
      errorLines.push(`${new Date().toISOString()} - [${result.code}] ${result.error}`);
    }
  }

  logger.info(`Restored ${restoredCount} files`, { errors: errorLines.length });

  return {
    restoredCount,
    errors: errorLines.length,
    errorLog: errorLines.join('\n')
  };
}
