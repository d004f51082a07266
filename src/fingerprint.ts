/**
 * File fingerprinting: streamed content hash plus stat metadata
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { basename, extname } from 'path';
import { UNREADABLE_HASH } from './types.js';
import { errorMessage } from './logger.js';

/** Read size per chunk; memory stays flat regardless of file size */
export const HASH_CHUNK_BYTES = 64 * 1024;

export interface Fingerprint {
  contentHash: string;
  sizeBytes: number;
  createdAt: string | null;
  modifiedAt: string | null;
  /** Set when stat or hashing failed */
  error?: string;
}

export interface FileNameParts {
  filename: string;
  simplifiedName: string;
  extension: string;
}

export function describeFile(filePath: string): FileNameParts {
  const filename = basename(filePath);
  const ext = extname(filename);
  return {
    filename,
    simplifiedName: ext ? filename.slice(0, -ext.length) : filename,
    extension: ext.replace(/^\./, '')
  };
}

/**
 * Computes the MD5 of a file without loading it into memory
 */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    const stream = createReadStream(filePath, { highWaterMark: HASH_CHUNK_BYTES });

    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Never throws. On failure the hash is the unreadable sentinel and any
 * metadata that could not be read is zero or null.
 */
export async function fingerprintFile(filePath: string): Promise<Fingerprint> {
  const fingerprint: Fingerprint = {
    contentHash: UNREADABLE_HASH,
    sizeBytes: 0,
    createdAt: null,
    modifiedAt: null
  };

  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) {
      fingerprint.error = `Not a regular file: ${filePath}`;
      return fingerprint;
    }
    fingerprint.sizeBytes = stats.size;
    // birthtime is zero on filesystems that do not record it
    const created = stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
    fingerprint.createdAt = created.toISOString();
    fingerprint.modifiedAt = stats.mtime.toISOString();
  } catch (error) {
    fingerprint.error = `Could not stat ${filePath}: ${errorMessage(error)}`;
    return fingerprint;
  }

  try {
    fingerprint.contentHash = await hashFile(filePath);
  } catch (error) {
    fingerprint.error = `Could not hash ${filePath}: ${errorMessage(error)}`;
  }

  return fingerprint;
}
