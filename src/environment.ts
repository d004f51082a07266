import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { AppError, errorMessage } from './logger.js';
import { PathsConfig } from './config.js';

/**
 * Create the working directory, the database's directory and the quarantine.
 * Without them nothing can run, so failure is fatal.
 */
export function ensureWorkingDirectories(paths: PathsConfig): void {
  const directories = [
    resolve(paths.workingDir),
    dirname(resolve(paths.databasePath)),
    resolve(paths.quarantineDir)
  ];

  for (const dir of directories) {
    try {
      mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new AppError(`Could not create directory ${dir}: ${errorMessage(error)}`, 'ENVIRONMENT_SETUP_FAILED', {
        directory: dir
      });
    }
  }
}
