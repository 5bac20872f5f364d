import type { AppConfig } from "../../config/env.js";
import { ConfigError } from "../../domain/errors.js";
import type { ObjectStore } from "../../domain/objectStore.js";
import { FileObjectStore } from "./fileObjectStore.js";
import { InMemoryObjectStore } from "./inMemoryObjectStore.js";
import { createPostgresPool, PgObjectStore } from "./pgObjectStore.js";
import { createS3Client, S3ObjectStore } from "./s3ObjectStore.js";

export interface ObjectStoreBootstrapResult {
  objectStore: ObjectStore;
  close: () => Promise<void>;
}

export async function createObjectStore(
  config: AppConfig,
): Promise<ObjectStoreBootstrapResult> {
  switch (config.storageBackend) {
    case "memory":
      return {
        objectStore: new InMemoryObjectStore(config.bucketName),
        close: async () => {},
      };
    case "filesystem":
      return {
        objectStore: new FileObjectStore(config.storageRoot, config.bucketName),
        close: async () => {},
      };
    case "s3": {
      const client = createS3Client({
        region: config.awsRegion ?? undefined,
        endpoint: config.s3Endpoint ?? undefined,
      });
      return {
        objectStore: new S3ObjectStore(client, config.bucketName),
        close: async () => {
          client.destroy();
        },
      };
    }
    case "postgres": {
      if (!config.databaseUrl) {
        throw new ConfigError("DATABASE_URL is required when STORAGE_BACKEND=postgres.");
      }
      const pool = createPostgresPool(config.databaseUrl);
      const objectStore = new PgObjectStore(pool, config.bucketName);
      await objectStore.initialize();
      return {
        objectStore,
        close: async () => {
          await pool.end();
        },
      };
    }
  }
}
