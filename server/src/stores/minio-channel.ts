import { Client } from "minio";
import {
  DestinationUnavailableError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  TransferError,
  toError,
} from "../errors/transfer.errors";
import type { ByteRange } from "../models/transfer.model";
import logger from "../utils/logger";
import { readAll } from "../utils/streams";
import type { ChannelTransport } from "./channel-transport";

const PERMISSION_CODES = new Set([
  "AccessDenied",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "NoSuchBucket",
]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function mapMinioError(error: unknown, key: string, channel: string): TransferError {
  if (error instanceof TransferError) {
    return error;
  }

  const code = errorCode(error);
  if (code === "NoSuchKey" || code === "NotFound") {
    return new ObjectNotFoundError(key);
  }
  if (code === "InvalidRange") {
    return new RangeNotSatisfiableError(0, undefined, `Invalid range for ${key}`);
  }
  if (code !== undefined && PERMISSION_CODES.has(code)) {
    return new TransferError(`${channel} rejected ${key}: ${code}`, `Backup.${code}`, {
      cause: error,
    });
  }
  return new DestinationUnavailableError(`${channel} failed on ${key}: ${toError(error).message}`, {
    destination: channel,
    cause: error,
  });
}

export interface MinioChannelOptions {
  client: Client;
  bucket: string;
  region?: string;
  name?: string;
}

/** Backup channel over a MinIO (or any S3-compatible) bucket. */
export class MinioChannel implements ChannelTransport {
  readonly name: string;
  readonly bucket: string;
  private readonly client: Client;
  private readonly region: string;

  constructor(options: MinioChannelOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.region = options.region ?? "us-east-1";
    this.name = options.name ?? "backup";
  }

  async ensureBucket(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, this.region);
        logger.info(`Bucket created: ${this.bucket}`);
      } else {
        logger.info(`Bucket already exists: ${this.bucket}`);
      }
    } catch (error) {
      logger.error(`Error ensuring bucket ${this.bucket}:`, error);
      throw error;
    }
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.client.putObject(this.bucket, key, body, body.length, {
        "Content-Type": contentType,
      });
    } catch (error) {
      throw mapMinioError(error, key, this.name);
    }
  }

  async getObject(key: string, range?: ByteRange): Promise<Buffer> {
    try {
      const stream = range
        ? await this.client.getPartialObject(
            this.bucket,
            key,
            range.start,
            range.end - range.start + 1,
          )
        : await this.client.getObject(this.bucket, key);
      return await readAll(stream);
    } catch (error) {
      throw mapMinioError(error, key, this.name);
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    try {
      const items: AsyncIterable<unknown> = this.client.listObjectsV2(this.bucket, prefix, true);
      for await (const item of items) {
        if (typeof item === "object" && item !== null && "name" in item && typeof item.name === "string") {
          keys.push(item.name);
        }
      }
    } catch (error) {
      throw mapMinioError(error, prefix, this.name);
    }
    return keys;
  }

  async removeObjects(keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    try {
      await this.client.removeObjects(this.bucket, keys);
    } catch (error) {
      throw mapMinioError(error, keys[0], this.name);
    }
  }
}
