import type { ChunkSet } from "./types.js";

export interface ChunkCache {
  exists(key: string): Promise<boolean>;
  /** Rejects with NotFoundError when nothing is stored under `key`. */
  read(key: string): Promise<ChunkSet>;
  write(key: string, chunkSet: ChunkSet): Promise<void>;
  /** Create-only write. Resolves false and leaves the entry untouched when `key` is taken. */
  create(key: string, chunkSet: ChunkSet): Promise<boolean>;
}

export interface DocumentSource {
  /** Rejects with DocumentNotFoundError when the document is absent. */
  load(documentKey: string): Promise<string>;
}
