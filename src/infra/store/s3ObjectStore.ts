import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { describeError, StorageError } from "../../domain/errors.js";
import type { ObjectStore, PutObjectOptions } from "../../domain/objectStore.js";

export interface S3ObjectStoreOptions {
  region?: string;
  endpoint?: string;
}

export function createS3Client(options: S3ObjectStoreOptions): S3Client {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint,
    forcePathStyle: Boolean(options.endpoint),
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
  ) {}

  async getText(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      if (!response.Body) {
        return "";
      }
      return await response.Body.transformToString("utf-8");
    } catch (error) {
      if (isS3NotFound(error)) {
        return null;
      }
      throw new StorageError(`Failed to read s3://${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isS3NotFound(error)) {
        return false;
      }
      throw new StorageError(`Failed to stat s3://${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async putText(key: string, body: string, options?: PutObjectOptions): Promise<boolean> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: "application/json; charset=utf-8",
          IfNoneMatch: options?.ifAbsent ? "*" : undefined,
        }),
      );
      return true;
    } catch (error) {
      if (options?.ifAbsent && isS3WriteConflict(error)) {
        return false;
      }
      throw new StorageError(`Failed to write s3://${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

export function isS3NotFound(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return (
    error.name === "NoSuchKey" ||
    error.name === "NotFound" ||
    error.$metadata.httpStatusCode === 404
  );
}

/** Conditional put lost to an existing object or to a concurrent conditional put. */
export function isS3WriteConflict(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  const status = error.$metadata.httpStatusCode;
  return (
    error.name === "PreconditionFailed" ||
    error.name === "ConditionalRequestConflict" ||
    status === 412 ||
    status === 409
  );
}
