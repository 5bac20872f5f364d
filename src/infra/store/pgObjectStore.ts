import { Pool } from "pg";
import { describeError, StorageError } from "../../domain/errors.js";
import type { ObjectStore, PutObjectOptions } from "../../domain/objectStore.js";

export function createPostgresPool(connectionString: string): Pool {
  return new Pool({ connectionString, max: 5 });
}

/**
 * Bucket-scoped rows in a single `objects` table. Each write is one
 * statement, so a reader never sees a partial body.
 */
export class PgObjectStore implements ObjectStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    readonly bucket: string,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.run("initialize object table", async () => {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS objects (
          bucket TEXT NOT NULL,
          key TEXT NOT NULL,
          body TEXT NOT NULL,
          updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          PRIMARY KEY (bucket, key)
        )
      `);
    });

    this.initialized = true;
  }

  async getText(key: string): Promise<string | null> {
    await this.initialize();
    const result = await this.run(`read ${this.bucket}/${key}`, () =>
      this.pool.query<{ body: string }>(
        `SELECT body FROM objects WHERE bucket = $1 AND key = $2`,
        [this.bucket, key],
      ),
    );
    return result.rows[0]?.body ?? null;
  }

  async exists(key: string): Promise<boolean> {
    await this.initialize();
    const result = await this.run(`stat ${this.bucket}/${key}`, () =>
      this.pool.query(`SELECT 1 FROM objects WHERE bucket = $1 AND key = $2`, [this.bucket, key]),
    );
    return (result.rowCount ?? 0) > 0;
  }

  async putText(key: string, body: string, options?: PutObjectOptions): Promise<boolean> {
    await this.initialize();
    const conflictClause = options?.ifAbsent
      ? "ON CONFLICT (bucket, key) DO NOTHING"
      : "ON CONFLICT (bucket, key) DO UPDATE SET body = EXCLUDED.body, updated_at = NOW()";

    const result = await this.run(`write ${this.bucket}/${key}`, () =>
      this.pool.query(
        `
          INSERT INTO objects (bucket, key, body, updated_at)
          VALUES ($1, $2, $3, NOW())
          ${conflictClause}
        `,
        [this.bucket, key, body],
      ),
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async run<T>(action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new StorageError(`Failed to ${action}: ${describeError(error)}`, { cause: error });
    }
  }
}
