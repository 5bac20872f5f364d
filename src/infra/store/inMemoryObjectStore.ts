import type { ObjectStore, PutObjectOptions } from "../../domain/objectStore.js";

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, string>();

  constructor(readonly bucket: string) {}

  async getText(key: string): Promise<string | null> {
    return this.objects.get(key) ?? null;
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async putText(key: string, body: string, options?: PutObjectOptions): Promise<boolean> {
    if (options?.ifAbsent && this.objects.has(key)) {
      return false;
    }
    this.objects.set(key, body);
    return true;
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
