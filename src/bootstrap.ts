import type { AppConfig } from "./config/env.js";
import { ObjectStoreDocumentSource } from "./infra/parsers/documentLoader.js";
import { createObjectStore } from "./infra/store/createObjectStore.js";
import { ObjectChunkCache } from "./infra/store/objectChunkCache.js";
import { ChunkingPipeline } from "./services/chunkingPipeline.js";

export interface ChunkingApp {
  pipeline: ChunkingPipeline;
  close: () => Promise<void>;
}

export async function createChunkingApp(config: AppConfig): Promise<ChunkingApp> {
  const { objectStore, close } = await createObjectStore(config);
  const pipeline = new ChunkingPipeline(
    new ObjectChunkCache(objectStore),
    new ObjectStoreDocumentSource(objectStore),
    {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      cacheKeyMode: config.cacheKeyMode,
    },
  );
  return { pipeline, close };
}
