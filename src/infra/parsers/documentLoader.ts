import path from "node:path";
import type { DocumentSource } from "../../domain/chunkCache.js";
import { DocumentNotFoundError, StorageError } from "../../domain/errors.js";
import type { ObjectStore } from "../../domain/objectStore.js";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set(["", ".md", ".txt"]);

export function isSupportedDocumentKey(documentKey: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.posix.extname(documentKey).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS].filter(Boolean);
}

export class ObjectStoreDocumentSource implements DocumentSource {
  constructor(private readonly objectStore: ObjectStore) {}

  async load(documentKey: string): Promise<string> {
    if (!isSupportedDocumentKey(documentKey)) {
      const ext = path.posix.extname(documentKey).toLowerCase();
      throw new StorageError(
        `Unsupported document extension: ${ext}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
      );
    }

    const raw = await this.objectStore.getText(documentKey);
    if (raw === null) {
      throw new DocumentNotFoundError(documentKey);
    }
    return normalizeText(raw);
  }
}
