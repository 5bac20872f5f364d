import { describe, expect, it, vi } from "vitest";
import type { DocumentSource } from "../src/domain/chunkCache.js";
import { StorageError } from "../src/domain/errors.js";
import { ObjectStoreDocumentSource } from "../src/infra/parsers/documentLoader.js";
import { InMemoryObjectStore } from "../src/infra/store/inMemoryObjectStore.js";
import { ObjectChunkCache } from "../src/infra/store/objectChunkCache.js";
import {
  ChunkingPipeline,
  resolveCacheKey,
  SHARED_CACHE_KEY,
} from "../src/services/chunkingPipeline.js";

const SENTENCE = "Worker bees visit flowers to gather sweet nectar. ";
const PROSE = SENTENCE.repeat(100);

async function createFixture(options: { cacheKeyMode?: "per-document" | "shared" } = {}) {
  const store = new InMemoryObjectStore("docs");
  await store.putText("input.txt", PROSE);
  const documents = new ObjectStoreDocumentSource(store);
  const load = vi.spyOn(documents, "load");
  const cache = new ObjectChunkCache(store);
  const pipeline = new ChunkingPipeline(cache, documents, {
    chunkSize: 2000,
    cacheKeyMode: options.cacheKeyMode,
  });
  return { store, cache, load, pipeline };
}

describe("resolveCacheKey", () => {
  it("derives one key per document", () => {
    expect(resolveCacheKey("input.txt")).toBe("chunks/input.txt.json");
    expect(resolveCacheKey("reports/q1.md")).toBe("chunks/reports/q1.md.json");
    expect(resolveCacheKey("/reports/q1.md")).toBe("chunks//reports/q1.md.json");
  });

  it("uses the fixed key in shared mode", () => {
    expect(resolveCacheKey("input.txt", "shared")).toBe(SHARED_CACHE_KEY);
    expect(SHARED_CACHE_KEY).toBe("chunks/processed.json");
  });
});

describe("ChunkingPipeline", () => {
  it("splits and stores the document on a cache miss", async () => {
    const { cache, load, pipeline } = await createFixture();

    const result = await pipeline.process("input.txt", "What do bees gather?");

    expect(result).toEqual({
      ok: true,
      answer: "Processed 3 chunks",
      chunkCount: 3,
      cacheKey: "chunks/input.txt.json",
      cacheHit: false,
      question: "What do bees gather?",
    });
    expect(load).toHaveBeenCalledTimes(1);

    const stored = await cache.read("chunks/input.txt.json");
    expect(stored.chunks.map((chunk) => chunk.text.length)).toEqual([2000, 2000, 999]);
    expect(stored.metadata).toEqual({ source: "input.txt", index: 0, start: 0, end: 2000 });
  });

  it("serves repeated requests from the cache without loading the document again", async () => {
    const { load, pipeline } = await createFixture();

    const first = await pipeline.process("input.txt", "first");
    const second = await pipeline.process("input.txt", "second");
    const third = await pipeline.process("input.txt", "third");

    expect(first).toMatchObject({ ok: true, answer: "Processed 3 chunks", cacheHit: false });
    expect(second).toMatchObject({ ok: true, answer: "Found 3 chunks", cacheHit: true });
    expect(third).toMatchObject({ ok: true, answer: "Found 3 chunks", cacheHit: true });
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("answers with the chunk count whatever the question is", async () => {
    const { pipeline } = await createFixture();
    await pipeline.process("input.txt", "warm up");

    const a = await pipeline.process("input.txt", "Who is the queen?");
    const b = await pipeline.process("input.txt", "  ");

    expect(a.ok && a.answer).toBe("Found 3 chunks");
    expect(b.ok && b.answer).toBe("Found 3 chunks");
    expect(b.ok && b.question).toBe("");
  });

  it("keeps separate cache entries per document", async () => {
    const { store, pipeline } = await createFixture();
    await store.putText("short.txt", "Just one chunk.");

    await pipeline.process("input.txt", "q");
    const result = await pipeline.process("short.txt", "q");

    expect(result).toMatchObject({ ok: true, answer: "Processed 1 chunks", cacheHit: false });
    expect(store.keys()).toEqual([
      "chunks/input.txt.json",
      "chunks/short.txt.json",
      "input.txt",
      "short.txt",
    ]);
  });

  it("does not let keys that differ only by a leading slash share an entry", async () => {
    const { store, pipeline } = await createFixture();
    await store.putText("/input.txt", "Just one chunk.");

    await pipeline.process("input.txt", "q");
    const result = await pipeline.process("/input.txt", "q");

    expect(result).toEqual({
      ok: true,
      answer: "Processed 1 chunks",
      chunkCount: 1,
      cacheKey: "chunks//input.txt.json",
      cacheHit: false,
      question: "q",
    });
  });

  it("serves the first document for every key in shared mode", async () => {
    const { store, pipeline } = await createFixture({ cacheKeyMode: "shared" });
    await store.putText("short.txt", "Just one chunk.");

    await pipeline.process("input.txt", "q");
    const result = await pipeline.process("short.txt", "q");

    expect(result).toMatchObject({
      ok: true,
      answer: "Found 3 chunks",
      cacheKey: "chunks/processed.json",
      cacheHit: true,
    });
  });

  it("reports a missing document as an error", async () => {
    const { store, pipeline } = await createFixture();

    const result = await pipeline.process("missing.txt", "anything?");

    expect(result).toEqual({ ok: false, error: "Document not found: missing.txt" });
    await expect(store.exists("chunks/missing.txt.json")).resolves.toBe(false);
  });

  it("surfaces a corrupt cache entry instead of re-splitting", async () => {
    const { store, load, pipeline } = await createFixture();
    await store.putText("chunks/input.txt.json", "{broken");

    const result = await pipeline.process("input.txt", "q");

    expect(result).toEqual({
      ok: false,
      error: "Cached chunk set at chunks/input.txt.json is not valid JSON.",
    });
    expect(load).not.toHaveBeenCalled();
  });

  it("surfaces storage failures", async () => {
    const { store, pipeline } = await createFixture();
    vi.spyOn(store, "exists").mockRejectedValue(new StorageError("Failed to stat docs: access denied"));

    const result = await pipeline.process("input.txt", "q");

    expect(result).toEqual({ ok: false, error: "Failed to stat docs: access denied" });
  });

  it("converges concurrent cold requests on the first stored chunk set", async () => {
    const store = new InMemoryObjectStore("docs");
    const cache = new ObjectChunkCache(store);
    const load = vi
      .fn<(documentKey: string) => Promise<string>>()
      .mockResolvedValueOnce(PROSE)
      .mockResolvedValueOnce("Edited down to one chunk.");
    const documents: DocumentSource = { load };
    const pipeline = new ChunkingPipeline(cache, documents, { chunkSize: 2000 });

    const [first, second] = await Promise.all([
      pipeline.process("input.txt", "a"),
      pipeline.process("input.txt", "b"),
    ]);

    expect(load).toHaveBeenCalledTimes(2);
    expect(first).toMatchObject({ ok: true, answer: "Processed 3 chunks" });
    expect(second).toMatchObject({ ok: true, answer: "Processed 3 chunks" });
    const stored = await cache.read("chunks/input.txt.json");
    expect(stored.chunks).toHaveLength(3);
  });
});
