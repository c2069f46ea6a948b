/**
 * SHA-256 Hash Utilities
 *
 * Source files are fingerprinted so extraction logs can tell re-runs of the
 * same document apart from new ones.
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
const HASH_PREFIX = 'sha256:';

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer | Uint8Array): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');

  return HASH_PREFIX + hash;
}

/**
 * Compute SHA-256 hash of a file by streaming it
 *
 * @param filePath - Absolute path to file
 * @throws Error if file doesn't exist, path is not absolute, or can't be read
 */
export async function hashFile(filePath: string): Promise<string> {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    if (code === 'EACCES') {
      throw new Error(`Permission denied: ${filePath}`);
    }
    throw new Error(
      `Cannot access file: ${filePath} - ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const stats = await fs.promises.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });

    stream.on('error', (error: NodeJS.ErrnoException) => {
      stream.destroy();
      if (error.code === 'ENOENT') {
        reject(new Error(`File not found: ${filePath}`));
      } else if (error.code === 'EACCES') {
        reject(new Error(`Permission denied: ${filePath}`));
      } else {
        reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
      }
    });
  });
}
