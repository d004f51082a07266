/**
 * Moves non-keeper duplicates into quarantine and ledgers every move
 */

import { dirname, isAbsolute, join, parse, relative, resolve } from 'path';
import { WardenDatabase } from './database.js';
import { moveFile, pathExists } from './fs-utils.js';
import { Logger, errorMessage } from './logger.js';
import { DirectoryMode, MoveRecord, RelocationOptions, RelocationResult } from './types.js';

const logger = new Logger({ context: 'relocator' });

/**
 * Quarantine directory for a file. Hierarchical mode mirrors the file's
 * directory relative to the scan root.
 */
export function destinationDirectory(
  filePath: string,
  scanRoot: string,
  quarantineDir: string,
  mode: DirectoryMode
): string {
  const quarantineRoot = resolve(quarantineDir);
  if (mode === 'flat') return quarantineRoot;

  const relativeDir = dirname(relative(resolve(scanRoot), resolve(filePath)));
  if (relativeDir === '.' || relativeDir.startsWith('..') || isAbsolute(relativeDir)) {
    return quarantineRoot;
  }
  return join(quarantineRoot, relativeDir);
}

/**
 * Candidate name for the nth collision: name.ext, name_1.ext, name_2.ext
 */
export function suffixedName(filename: string, attempt: number): string {
  if (attempt === 0) return filename;
  const { name, ext } = parse(filename);
  return `${name}_${attempt}${ext}`;
}

/**
 * First name in `dir` not already taken on disk
 */
export async function nextAvailableName(dir: string, filename: string): Promise<string> {
  let attempt = 0;
  while (await pathExists(join(dir, suffixedName(filename, attempt)))) {
    attempt++;
  }
  return suffixedName(filename, attempt);
}

/**
 * Relocate each path in turn. A failed move leaves the file and its record
 * where they were; a failed ledger write moves the file back. Neither stops
 * the batch.
 */
export async function relocateFiles(
  db: WardenDatabase,
  paths: string[],
  options: RelocationOptions
): Promise<RelocationResult> {
  const moves: MoveRecord[] = [];
  const errorLines: string[] = [];
  const addError = (message: string) => {
    logger.warn(message);
    errorLines.push(`${new Date().toISOString()} - ${message}`);
  };

  for (const originalPath of paths) {
    const targetDir = destinationDirectory(originalPath, options.scanRoot, options.quarantineDir, options.directoryMode);
    let destinationPath: string;

    try {
      const targetName = await nextAvailableName(targetDir, parse(originalPath).base);
      destinationPath = join(targetDir, targetName);
      await moveFile(originalPath, destinationPath);
    } catch (error) {
      addError(`Could not move ${originalPath}: ${errorMessage(error)}`);
      continue;
    }

    try {
      const move = db.recordRelocation({ originalPath, destinationPath });
      moves.push(move);
      logger.debug('Relocated duplicate', { from: originalPath, to: destinationPath, moveId: move.id });
    } catch (error) {
      addError(`Could not ledger move of ${originalPath}: ${errorMessage(error)}`);
      try {
        await moveFile(destinationPath, originalPath);
      } catch (rollbackError) {
        logger.error(
          `File left unledgered at ${destinationPath}`,
          rollbackError instanceof Error ? rollbackError : undefined
        );
      }
    }
  }

  logger.info(`Relocated ${moves.length} files`, { errors: errorLines.length, quarantine: options.quarantineDir });

  return {
    moved: moves.length,
    errors: errorLines.length,
    errorLog: errorLines.join('\n'),
    moves
  };
}
