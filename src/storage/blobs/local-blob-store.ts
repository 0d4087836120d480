/**
 * Filesystem Blob Store
 *
 * Stores blobs as plain files under a root directory (the media root). A key
 * maps directly onto a relative path, so 'resources/3/images/a.png' lives at
 * `${root}/resources/3/images/a.png`. Directories are created on demand and
 * pruned again once a delete leaves them empty.
 */

import { randomInt } from 'node:crypto';
import { mkdir, readFile, rmdir, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { BlobStore } from './types';
import { withSuffix } from './keys';

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const SUFFIX_LENGTH = 7;

/** Give up finding a free key after this many suffixed attempts */
const MAX_SAVE_ATTEMPTS = 100;

/**
 * Error codes a filesystem call may report for a missing or busy path.
 */
function hasErrorCode(err: unknown, ...codes: string[]): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    codes.includes(err.code)
  );
}

function randomSuffix(): string {
  let suffix = '';
  for (let i = 0; i < SUFFIX_LENGTH; i++) {
    suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  }
  return suffix;
}

/**
 * Raised for keys that are empty, absolute, or climb out of the root.
 */
export class InvalidBlobKeyError extends Error {
  constructor(public readonly key: string) {
    super(`Invalid blob key '${key}'`);
    this.name = 'InvalidBlobKeyError';
  }
}

export class LocalBlobStore implements BlobStore {
  private readonly root: string;

  /**
   * @param root - Directory blobs are stored under; created lazily
   */
  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Absolute path of the file holding `key`.
   *
   * @throws InvalidBlobKeyError if the key would resolve outside the root
   */
  resolvePath(key: string): string {
    if (key === '' || isAbsolute(key) || key.includes('\0')) {
      throw new InvalidBlobKeyError(key);
    }

    const path = resolve(this.root, key);
    const rel = relative(this.root, path);

    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new InvalidBlobKeyError(key);
    }

    return path;
  }

  async save(key: string, content: Uint8Array): Promise<string> {
    let candidate = key;

    for (let attempt = 0; attempt < MAX_SAVE_ATTEMPTS; attempt++) {
      const path = this.resolvePath(candidate);
      await mkdir(dirname(path), { recursive: true });

      try {
        // 'wx' fails instead of overwriting an existing blob
        await writeFile(path, content, { flag: 'wx' });
        return candidate;
      } catch (err) {
        if (!hasErrorCode(err, 'EEXIST')) {
          throw err;
        }
      }

      candidate = withSuffix(key, randomSuffix());
    }

    throw new Error(`Could not find a free blob key for '${key}'`);
  }

  async read(key: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.resolvePath(key)));
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT', 'EISDIR')) {
        return null;
      }
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.resolvePath(key));
      return info.isFile();
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return false;
      }
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    const path = this.resolvePath(key);

    try {
      await unlink(path);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return;
      }
      throw err;
    }

    await this.pruneEmptyDirectories(dirname(path));
  }

  /**
   * Removes `dir` and its ancestors while they are empty, stopping at the root.
   */
  private async pruneEmptyDirectories(dir: string): Promise<void> {
    let current = dir;

    while (current !== this.root && current.startsWith(this.root + sep)) {
      try {
        await rmdir(current);
      } catch (err) {
        if (hasErrorCode(err, 'ENOTEMPTY', 'EEXIST', 'ENOENT')) {
          return;
        }
        throw err;
      }
      current = dirname(current);
    }
  }
}
