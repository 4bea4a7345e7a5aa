/**
 * S3DocumentStore
 *
 * DocumentStore backed by any S3-compatible object store (AWS S3, MinIO, ...).
 * Path-style addressing is used whenever a custom endpoint is configured.
 */

import {
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";

import {
  NotFoundError,
  StoreWriteError,
  TransportError,
  describeError,
} from "../errors.js";
import { storeLogger } from "../logger.js";

import type { ObjectStoreConfig } from "../config.js";
import type { DocumentStore } from "../types/sync.js";

/** The subset of S3Client the store talks to */
export type S3Sender = Pick<S3Client, "send">;

const NOT_FOUND_NAMES = new Set(["NoSuchKey", "NotFound", "NoSuchBucket"]);

/**
 * Whether an SDK error means the object (or bucket) does not exist.
 */
export function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return (
      NOT_FOUND_NAMES.has(error.name) || error.$metadata.httpStatusCode === 404
    );
  }
  return false;
}

/**
 * Encode a key for the x-amz-copy-source header, keeping "/" separators.
 */
export function encodeCopySource(bucket: string, key: string): string {
  return `${bucket}/${key.split("/").map(encodeURIComponent).join("/")}`;
}

export function createS3Client(config: ObjectStoreConfig): S3Client {
  const clientConfig: S3ClientConfig = {
    region: config.region,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  };

  if (config.endpoint !== undefined) {
    clientConfig.endpoint = config.endpoint;
    clientConfig.forcePathStyle = true;
  }

  return new S3Client(clientConfig);
}

export class S3DocumentStore implements DocumentStore {
  constructor(
    private readonly client: S3Sender,
    readonly bucket: string
  ) {}

  static fromConfig(config: ObjectStoreConfig, bucket: string): S3DocumentStore {
    return new S3DocumentStore(createS3Client(config), bucket);
  }

  /**
   * Create the bucket when it does not exist yet
   */
  async ensureBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      storeLogger.debug({ bucket: this.bucket }, "Bucket exists");
      return;
    } catch (error) {
      if (!isNotFound(error)) {
        throw new TransportError(
          `Cannot access bucket ${this.bucket}: ${describeError(error)}`,
          { cause: error }
        );
      }
    }

    storeLogger.info({ bucket: this.bucket }, "Creating bucket");
    try {
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      throw new StoreWriteError(
        this.bucket,
        `Failed to create bucket ${this.bucket}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async put(key: string, bytes: Uint8Array, contentType?: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: bytes,
          ContentLength: bytes.byteLength,
          ContentType: contentType ?? "application/octet-stream",
        })
      );
    } catch (error) {
      storeLogger.error(
        { bucket: this.bucket, key, error: describeError(error) },
        "Failed to write object"
      );
      throw new StoreWriteError(
        key,
        `Failed to write ${key}: ${describeError(error)}`,
        { cause: error }
      );
    }

    storeLogger.debug(
      { bucket: this.bucket, key, sizeBytes: bytes.byteLength },
      "Object written"
    );
  }

  async get(key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (response.Body === undefined) {
        throw new NotFoundError(`Object ${key} has no body`);
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      if (isNotFound(error)) {
        throw new NotFoundError(`Object not found: ${key}`);
      }
      throw new TransportError(
        `Failed to read ${key}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key })
      );
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new TransportError(
        `Failed to check ${key}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async copy(sourceKey: string, targetKey: string): Promise<void> {
    try {
      await this.client.send(
        new CopyObjectCommand({
          Bucket: this.bucket,
          Key: targetKey,
          CopySource: encodeCopySource(this.bucket, sourceKey),
        })
      );
    } catch (error) {
      throw new StoreWriteError(
        targetKey,
        `Failed to copy ${sourceKey} to ${targetKey}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({ Bucket: this.bucket, Key: key })
      );
    } catch (error) {
      throw new StoreWriteError(
        key,
        `Failed to delete ${key}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}
