import { z } from "zod";
import { ConfigError } from "../domain/errors.js";
import { DEFAULT_CHUNK_SIZE } from "../pipelines/chunking.js";

const envSchema = z.object({
  BUCKET_NAME: z.string().trim().optional(),
  STORAGE_BACKEND: z.enum(["filesystem", "s3", "postgres", "memory"]).default("filesystem"),
  STORAGE_ROOT: z.string().default(".data"),
  AWS_REGION: z.string().optional(),
  S3_ENDPOINT: z.string().url().optional(),
  DATABASE_URL: z.string().optional(),
  DOCUMENT_KEY: z.string().min(1).default("input.txt"),
  CACHE_KEY_MODE: z.enum(["per-document", "shared"]).default("per-document"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(0),
  TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type StorageBackend = "filesystem" | "s3" | "postgres" | "memory";
export type CacheKeyMode = "per-document" | "shared";

export interface AppConfig {
  bucketName: string;
  storageBackend: StorageBackend;
  storageRoot: string;
  awsRegion: string | null;
  s3Endpoint: string | null;
  databaseUrl: string | null;
  documentKey: string;
  cacheKeyMode: CacheKeyMode;
  chunkSize: number;
  chunkOverlap: number;
  transport: "http" | "stdio";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${details}`);
  }
  const parsed = result.data;

  if (!parsed.BUCKET_NAME) {
    throw new ConfigError("BUCKET_NAME is required.");
  }
  if (parsed.STORAGE_BACKEND === "postgres" && !parsed.DATABASE_URL) {
    throw new ConfigError("STORAGE_BACKEND=postgres requires DATABASE_URL.");
  }
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigError(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  return {
    bucketName: parsed.BUCKET_NAME,
    storageBackend: parsed.STORAGE_BACKEND,
    storageRoot: parsed.STORAGE_ROOT,
    awsRegion: parsed.AWS_REGION ?? null,
    s3Endpoint: parsed.S3_ENDPOINT ?? null,
    databaseUrl: parsed.DATABASE_URL ?? null,
    documentKey: parsed.DOCUMENT_KEY,
    cacheKeyMode: parsed.CACHE_KEY_MODE,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    transport: parsed.TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
  };
}
