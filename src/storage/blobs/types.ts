/**
 * Blob Storage Types
 *
 * Binary uploads (resource files and images) live outside the database in a
 * key/value blob store. Keys are forward-slash paths relative to the store
 * root, e.g. 'resources/12/images/cover.png'; they double as the path
 * component of the public media URL.
 */

/**
 * A file received from a client, detached from any HTTP representation.
 */
export interface UploadedFile {
  /** Original file name as sent by the client */
  filename: string;
  /** File contents */
  content: Uint8Array;
}

/**
 * Storage backend for blobs.
 *
 * Implementations must refuse keys that would resolve outside their root.
 */
export interface BlobStore {
  /**
   * Stores `content` under `key`, or under a suffixed variant of `key` when
   * it is already taken.
   *
   * @returns The key the blob was actually stored under
   */
  save(key: string, content: Uint8Array): Promise<string>;

  /**
   * Reads a blob.
   *
   * @returns The blob contents, or null when no blob exists under `key`
   */
  read(key: string): Promise<Uint8Array | null>;

  /** Reports whether a blob exists under `key` */
  exists(key: string): Promise<boolean>;

  /** Removes a blob; removing a missing blob is a no-op */
  delete(key: string): Promise<void>;
}
