import { describe, expect, it } from "vitest";
import { DocumentNotFoundError, StorageError } from "../src/domain/errors.js";
import {
  getSupportedDocumentExtensions,
  isSupportedDocumentKey,
  ObjectStoreDocumentSource,
} from "../src/infra/parsers/documentLoader.js";
import { InMemoryObjectStore } from "../src/infra/store/inMemoryObjectStore.js";

describe("ObjectStoreDocumentSource", () => {
  it("accepts text, markdown and extensionless keys", () => {
    expect(getSupportedDocumentExtensions()).toEqual([".md", ".txt"]);
    expect(isSupportedDocumentKey("input.txt")).toBe(true);
    expect(isSupportedDocumentKey("notes/README.MD")).toBe(true);
    expect(isSupportedDocumentKey("uploads/latest")).toBe(true);
    expect(isSupportedDocumentKey("report.pdf")).toBe(false);
  });

  it("loads and normalizes document text", async () => {
    const store = new InMemoryObjectStore("docs");
    await store.putText("input.txt", "\uFEFFline 1\r\nline\t2\n\n");

    const source = new ObjectStoreDocumentSource(store);

    await expect(source.load("input.txt")).resolves.toBe("line 1\nline 2");
  });

  it("fails with DocumentNotFoundError when the document is absent", async () => {
    const source = new ObjectStoreDocumentSource(new InMemoryObjectStore("docs"));

    await expect(source.load("input.txt")).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it("rejects unsupported extensions", async () => {
    const source = new ObjectStoreDocumentSource(new InMemoryObjectStore("docs"));

    await expect(source.load("report.pdf")).rejects.toBeInstanceOf(StorageError);
    await expect(source.load("report.pdf")).rejects.toThrow(
      "Unsupported document extension: .pdf. Allowed: .md, .txt",
    );
  });
});
