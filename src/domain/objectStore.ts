export interface PutObjectOptions {
  /** Only write when nothing is stored under the key yet. */
  ifAbsent?: boolean;
}

/**
 * Key-value view of a single storage bucket.
 *
 * Implementations return `null` / `false` for missing keys and reject with
 * `StorageError` on I/O failures. `putText` writes the whole body in one
 * operation; it resolves `false` only when `ifAbsent` is set and the key is
 * already taken.
 */
export interface ObjectStore {
  readonly bucket: string;
  getText(key: string): Promise<string | null>;
  exists(key: string): Promise<boolean>;
  putText(key: string, body: string, options?: PutObjectOptions): Promise<boolean>;
}
