export class NotFoundError extends Error {
  constructor(readonly key: string) {
    super(`No cached chunk set at ${key}.`);
    this.name = "NotFoundError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(readonly documentKey: string) {
    super(`Document not found: ${documentKey}`);
    this.name = "DocumentNotFoundError";
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class SerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SerializationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown error";
}
