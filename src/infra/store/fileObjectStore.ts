import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { describeError, StorageError } from "../../domain/errors.js";
import type { ObjectStore, PutObjectOptions } from "../../domain/objectStore.js";

/**
 * Stores each bucket as a directory under `rootDir`. Writes go to a temp file
 * first and are moved into place, so readers see either the previous body or
 * the complete new one.
 */
export class FileObjectStore implements ObjectStore {
  private readonly bucketDir: string;

  constructor(
    rootDir: string,
    readonly bucket: string,
  ) {
    this.bucketDir = path.resolve(rootDir, bucket);
  }

  async getText(key: string): Promise<string | null> {
    const filePath = this.resolveKey(key);
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw new StorageError(`Failed to read ${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async exists(key: string): Promise<boolean> {
    const filePath = this.resolveKey(key);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (isFileMissing(error)) {
        return false;
      }
      throw new StorageError(`Failed to stat ${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async putText(key: string, body: string, options?: PutObjectOptions): Promise<boolean> {
    const filePath = this.resolveKey(key);
    const tempPath = `${filePath}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, body, "utf-8");

      if (options?.ifAbsent) {
        return await linkIfAbsent(tempPath, filePath, body);
      }

      await replaceFileSafely(tempPath, filePath, body);
      return true;
    } catch (error) {
      throw new StorageError(`Failed to write ${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.bucketDir, key);
    if (!resolved.startsWith(this.bucketDir + path.sep)) {
      throw new StorageError(`Object key escapes bucket ${this.bucket}: ${key}`);
    }
    return resolved;
  }
}

async function linkIfAbsent(tempPath: string, targetPath: string, content: string): Promise<boolean> {
  try {
    await fs.link(tempPath, targetPath);
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return false;
    }
    if (!isLinkUnsupported(error)) {
      throw error;
    }
  }

  // Filesystems without hard links: exclusive create, written in one call.
  try {
    await fs.writeFile(targetPath, content, { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  }
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content, "utf-8");
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}

function isFileMissing(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

function isLinkUnsupported(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "ENOTSUP" || code === "EXDEV";
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
