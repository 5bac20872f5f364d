import { z } from "zod";
import type { ChunkCache } from "../../domain/chunkCache.js";
import { NotFoundError, SerializationError } from "../../domain/errors.js";
import type { ObjectStore } from "../../domain/objectStore.js";
import type { Chunk, ChunkSet } from "../../domain/types.js";

const CURRENT_FORMAT_VERSION = 1;

// Chunk settings the first deployments split with.
const LEGACY_CHUNK_SIZE = 2000;
const LEGACY_CHUNK_OVERLAP = 200;

const chunkMetadataSchema = z.object({
  source: z.string(),
  index: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const chunkSetSchema = z.object({
  documentKey: z.string(),
  chunks: z.array(z.object({ text: z.string(), metadata: chunkMetadataSchema })),
  metadata: chunkMetadataSchema.nullable(),
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().nonnegative(),
  createdAt: z.string().nullable(),
});

const persistedEntrySchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  chunk_set: z.unknown(),
});

const legacyEntrySchema = z.object({
  chunks: z.array(z.string()),
  metadata: z.string().nullable().optional(),
});

/** Chunk sets stored as one JSON object per cache key. */
export class ObjectChunkCache implements ChunkCache {
  constructor(private readonly objectStore: ObjectStore) {}

  async exists(key: string): Promise<boolean> {
    return this.objectStore.exists(key);
  }

  async read(key: string): Promise<ChunkSet> {
    const raw = await this.objectStore.getText(key);
    if (raw === null) {
      throw new NotFoundError(key);
    }
    return parseCacheEntry(raw, key);
  }

  async write(key: string, chunkSet: ChunkSet): Promise<void> {
    await this.objectStore.putText(key, serializeChunkSet(chunkSet));
  }

  async create(key: string, chunkSet: ChunkSet): Promise<boolean> {
    return this.objectStore.putText(key, serializeChunkSet(chunkSet), { ifAbsent: true });
  }
}

export function serializeChunkSet(chunkSet: ChunkSet): string {
  return JSON.stringify({
    format_version: CURRENT_FORMAT_VERSION,
    saved_at: new Date().toISOString(),
    chunk_set: chunkSet,
  });
}

export function parseCacheEntry(raw: string, key: string): ChunkSet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(`Cached chunk set at ${key} is not valid JSON.`, { cause: error });
  }

  const current = persistedEntrySchema.safeParse(parsed);
  if (current.success) {
    if (current.data.format_version !== CURRENT_FORMAT_VERSION) {
      throw new SerializationError(
        `Unsupported chunk cache format version at ${key}: ${current.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
      );
    }
    const chunkSet = chunkSetSchema.safeParse(current.data.chunk_set);
    if (!chunkSet.success) {
      throw new SerializationError(
        `Cached chunk set at ${key} is malformed: ${chunkSet.error.issues[0]?.message ?? "invalid shape"}`,
      );
    }
    return chunkSet.data;
  }

  const legacy = legacyEntrySchema.safeParse(parsed);
  if (legacy.success) {
    return fromLegacyEntry(key, legacy.data.chunks);
  }

  throw new SerializationError(`Cached chunk set at ${key} has an unknown format.`);
}

// Legacy entries kept no offsets; chunks are laid end to end, so positions are approximate.
function fromLegacyEntry(key: string, texts: string[]): ChunkSet {
  const chunks: Chunk[] = [];
  let offset = 0;
  for (const [index, text] of texts.entries()) {
    chunks.push({
      text,
      metadata: { source: key, index, start: offset, end: offset + text.length },
    });
    offset += text.length;
  }

  return {
    documentKey: key,
    chunks,
    metadata: chunks[0]?.metadata ?? null,
    chunkSize: LEGACY_CHUNK_SIZE,
    chunkOverlap: LEGACY_CHUNK_OVERLAP,
    createdAt: null,
  };
}
