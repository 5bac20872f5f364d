import type { CacheKeyMode } from "../config/env.js";
import type { ChunkCache, DocumentSource } from "../domain/chunkCache.js";
import { describeError } from "../domain/errors.js";
import type { ChunkSet, PipelineResult } from "../domain/types.js";
import { createChunkSet } from "../pipelines/chunking.js";
import type { ChunkingOptions } from "../pipelines/chunking.js";

export const SHARED_CACHE_KEY = "chunks/processed.json";

export interface ChunkingPipelineOptions extends ChunkingOptions {
  cacheKeyMode?: CacheKeyMode;
}

export function resolveCacheKey(documentKey: string, mode: CacheKeyMode = "per-document"): string {
  if (mode === "shared") {
    return SHARED_CACHE_KEY;
  }
  // Same key the document is loaded with, so distinct objects never share an entry.
  return `chunks/${documentKey}.json`;
}

/**
 * Serves a document's chunk set from the cache, splitting and storing it on
 * the first request. Failures come back as `{ ok: false }` results.
 */
export class ChunkingPipeline {
  constructor(
    private readonly cache: ChunkCache,
    private readonly documents: DocumentSource,
    private readonly options: ChunkingPipelineOptions = {},
  ) {}

  async process(documentKey: string, question: string): Promise<PipelineResult> {
    try {
      const cacheKey = resolveCacheKey(documentKey, this.options.cacheKeyMode);

      if (await this.cache.exists(cacheKey)) {
        const cached = await this.cache.read(cacheKey);
        return {
          ok: true,
          answer: `Found ${cached.chunks.length} chunks`,
          chunkCount: cached.chunks.length,
          cacheKey,
          cacheHit: true,
          question: question.trim(),
        };
      }

      const chunkSet = await this.split(documentKey);
      const stored = await this.persist(cacheKey, chunkSet);

      return {
        ok: true,
        answer: `Processed ${stored.chunks.length} chunks`,
        chunkCount: stored.chunks.length,
        cacheKey,
        cacheHit: false,
        question: question.trim(),
      };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  private async split(documentKey: string): Promise<ChunkSet> {
    const text = await this.documents.load(documentKey);
    return createChunkSet(documentKey, text, {
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
      separators: this.options.separators,
    });
  }

  // First writer wins; a concurrent cold request adopts the stored set.
  private async persist(cacheKey: string, chunkSet: ChunkSet): Promise<ChunkSet> {
    const created = await this.cache.create(cacheKey, chunkSet);
    if (created) {
      return chunkSet;
    }
    return this.cache.read(cacheKey);
  }
}
