import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ConfigError } from "../src/domain/errors.js";
import { createObjectStore } from "../src/infra/store/createObjectStore.js";
import { InMemoryObjectStore } from "../src/infra/store/inMemoryObjectStore.js";

describe("createObjectStore", () => {
  it("builds the in-memory backend for the configured bucket", async () => {
    const config = loadConfig({ BUCKET_NAME: "docs", STORAGE_BACKEND: "memory" });

    const { objectStore, close } = await createObjectStore(config);

    expect(objectStore).toBeInstanceOf(InMemoryObjectStore);
    expect(objectStore.bucket).toBe("docs");
    await close();
  });

  it("refuses the postgres backend without a database URL", async () => {
    const config = {
      ...loadConfig({ BUCKET_NAME: "docs" }),
      storageBackend: "postgres" as const,
    };

    const attempt = createObjectStore(config);

    await expect(attempt).rejects.toBeInstanceOf(ConfigError);
    await expect(attempt).rejects.toThrow("DATABASE_URL is required when STORAGE_BACKEND=postgres.");
  });
});
