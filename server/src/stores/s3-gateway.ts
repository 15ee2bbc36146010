import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateBucketCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  UploadPartCommand,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { TransferError } from "../errors/transfer.errors";
import type { ByteRange } from "../models/transfer.model";
import logger from "../utils/logger";

export interface CompletedPart {
  partNumber: number;
  etag: string;
}

/**
 * The S3 calls the primary store makes, keyed by full object key. Errors
 * are the SDK's own; callers translate them with `mapS3Error`.
 */
export interface S3Gateway {
  readonly bucket: string;
  createMultipartUpload(key: string, contentType: string): Promise<string>;
  uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Buffer,
    signal?: AbortSignal,
  ): Promise<string>;
  completeMultipartUpload(key: string, uploadId: string, parts: CompletedPart[]): Promise<void>;
  abortMultipartUpload(key: string, uploadId: string): Promise<void>;
  putObject(key: string, body: Buffer, contentType: string): Promise<void>;
  getObject(key: string, range?: ByteRange, signal?: AbortSignal): Promise<Buffer>;
  listKeys(prefix: string): Promise<string[]>;
  deleteObject(key: string): Promise<void>;
}

export interface AwsS3GatewayOptions {
  client: S3Client;
  bucket: string;
  /** Separate client for signing URLs handed to outside callers. */
  presignClient?: S3Client;
}

export class AwsS3Gateway implements S3Gateway {
  readonly bucket: string;
  private readonly client: S3Client;
  private readonly presignClient: S3Client;

  constructor(options: AwsS3GatewayOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.presignClient = options.presignClient ?? options.client;
  }

  async ensureBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      logger.info(`Bucket already exists: ${this.bucket}`);
    } catch (error) {
      if (!(error instanceof S3ServiceException) || error.$metadata.httpStatusCode !== 404) {
        logger.error(`Error ensuring bucket ${this.bucket}:`, error);
        throw error;
      }
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
      logger.info(`Bucket created: ${this.bucket}`);
    }
  }

  async createMultipartUpload(key: string, contentType: string): Promise<string> {
    const response = await this.client.send(
      new CreateMultipartUploadCommand({
        Bucket: this.bucket,
        Key: key,
        ContentType: contentType,
      }),
    );
    if (!response.UploadId) {
      throw new TransferError(`No upload id returned for ${key}`, "S3.MissingUploadId", {
        retryable: true,
      });
    }
    return response.UploadId;
  }

  async uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Buffer,
    signal?: AbortSignal,
  ): Promise<string> {
    const response = await this.client.send(
      new UploadPartCommand({
        Bucket: this.bucket,
        Key: key,
        UploadId: uploadId,
        PartNumber: partNumber,
        Body: body,
        ContentLength: body.length,
      }),
      { abortSignal: signal },
    );
    if (!response.ETag) {
      throw new TransferError(`No ETag returned for part ${partNumber} of ${key}`, "S3.MissingETag", {
        retryable: true,
      });
    }
    return response.ETag;
  }

  async completeMultipartUpload(
    key: string,
    uploadId: string,
    parts: CompletedPart[],
  ): Promise<void> {
    await this.client.send(
      new CompleteMultipartUploadCommand({
        Bucket: this.bucket,
        Key: key,
        UploadId: uploadId,
        MultipartUpload: {
          Parts: parts.map((part) => ({ PartNumber: part.partNumber, ETag: part.etag })),
        },
      }),
    );
  }

  async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
    await this.client.send(
      new AbortMultipartUploadCommand({ Bucket: this.bucket, Key: key, UploadId: uploadId }),
    );
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ContentLength: body.length,
      }),
    );
  }

  async getObject(key: string, range?: ByteRange, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
        ...(range && { Range: `bytes=${range.start}-${range.end}` }),
      }),
      { abortSignal: signal },
    );
    if (!response.Body) {
      throw new TransferError(`Empty response body for ${key}`, "S3.EmptyBody", {
        retryable: true,
      });
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }),
      );
      for (const item of response.Contents ?? []) {
        if (item.Key) {
          keys.push(item.Key);
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  async deleteObject(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  /** GET URL signed offline, suitable for players outside the network. */
  async presignGet(key: string, expiresIn: number, fileName?: string): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: key,
      ...(fileName && { ResponseContentDisposition: `attachment; filename="${fileName}"` }),
    });
    return getSignedUrl(this.presignClient, command, { expiresIn });
  }
}
