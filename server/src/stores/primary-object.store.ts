import { ObjectNotFoundError, TransferError } from "../errors/transfer.errors";
import { parseStoredMetadata, serializeMetadata } from "../models/metadata.schema";
import type {
  ChunkDescriptor,
  ObjectId,
  StoredObjectMetadata,
  UploadInit,
} from "../models/transfer.model";
import logger from "../utils/logger";
import type { RemoteStoreAdapter } from "./remote-store";
import { mapS3Error } from "./s3-errors";
import type { CompletedPart, S3Gateway } from "./s3-gateway";

export interface PrimaryObjectStoreOptions {
  gateway: S3Gateway;
  keyPrefix?: string;
  name?: string;
}

interface MultipartUpload {
  uploadId: string;
  contentType: string;
  /** ETag per part number. */
  parts: Map<number, string>;
  /** Data object is in place; only the metadata write is left. */
  dataCommitted: boolean;
}

const DATA_FILE = "data";
const METADATA_FILE = "metadata.json";

/**
 * Primary destination: one S3 multipart upload per object, part number =
 * sequence number + 1, with a metadata document beside the data.
 */
export class PrimaryObjectStore implements RemoteStoreAdapter {
  readonly name: string;
  readonly kind = "primary" as const;
  private readonly gateway: S3Gateway;
  private readonly keyPrefix: string;
  private readonly uploads = new Map<ObjectId, MultipartUpload>();

  constructor(options: PrimaryObjectStoreOptions) {
    this.gateway = options.gateway;
    this.keyPrefix = options.keyPrefix ?? "";
    this.name = options.name ?? "primary";
  }

  dataKey(objectId: ObjectId): string {
    return `${this.keyPrefix}${objectId}/${DATA_FILE}`;
  }

  metadataKey(objectId: ObjectId): string {
    return `${this.keyPrefix}${objectId}/${METADATA_FILE}`;
  }

  location(objectId: ObjectId): string {
    return `s3://${this.gateway.bucket}/${this.dataKey(objectId)}`;
  }

  async beginUpload(objectId: ObjectId, init: UploadInit): Promise<void> {
    const uploadId = await this.call(objectId, () =>
      this.gateway.createMultipartUpload(this.dataKey(objectId), init.contentType),
    );
    this.uploads.set(objectId, {
      uploadId,
      contentType: init.contentType,
      parts: new Map(),
      dataCommitted: false,
    });
    logger.debug(`Multipart upload created for ${objectId}`, { uploadId });
  }

  async putChunk(
    objectId: ObjectId,
    descriptor: ChunkDescriptor,
    bytes: Buffer,
    signal?: AbortSignal,
  ): Promise<void> {
    const upload = this.upload(objectId);
    const partNumber = descriptor.sequenceNumber + 1;
    const etag = await this.call(objectId, () =>
      this.gateway.uploadPart(this.dataKey(objectId), upload.uploadId, partNumber, bytes, signal),
    );
    upload.parts.set(partNumber, etag);
  }

  async completeUpload(objectId: ObjectId, metadata: StoredObjectMetadata): Promise<void> {
    const upload = this.upload(objectId);

    // a retry after a failed metadata write must not complete the upload twice
    if (!upload.dataCommitted) {
      await this.commitData(objectId, upload);
      upload.dataCommitted = true;
    }

    await this.call(objectId, () =>
      this.gateway.putObject(
        this.metadataKey(objectId),
        serializeMetadata(metadata),
        "application/json",
      ),
    );
    this.uploads.delete(objectId);
  }

  async abortUpload(objectId: ObjectId): Promise<void> {
    const upload = this.uploads.get(objectId);
    if (!upload) {
      return;
    }
    this.uploads.delete(objectId);
    if (!upload.dataCommitted) {
      await this.releaseMultipart(objectId, upload.uploadId);
      return;
    }
    // the data already replaced whatever the old metadata describes
    await this.deleteObject(objectId);
  }

  async getRange(
    objectId: ObjectId,
    startByte: number,
    endByteInclusive: number,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    return this.call(
      objectId,
      () =>
        this.gateway.getObject(
          this.dataKey(objectId),
          { start: startByte, end: endByteInclusive },
          signal,
        ),
      startByte,
    );
  }

  async headObject(objectId: ObjectId): Promise<StoredObjectMetadata | null> {
    const key = this.metadataKey(objectId);
    try {
      const raw = await this.call(objectId, () => this.gateway.getObject(key));
      return parseStoredMetadata(raw, key);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  async listObjects(prefix: string): Promise<StoredObjectMetadata[]> {
    const keys = await this.call(prefix, () =>
      this.gateway.listKeys(`${this.keyPrefix}${prefix}`),
    );
    const objectIds = keys
      .filter((key) => key.endsWith(`/${METADATA_FILE}`))
      .map((key) => key.slice(this.keyPrefix.length, -(METADATA_FILE.length + 1)));

    const listed: StoredObjectMetadata[] = [];
    for (const objectId of objectIds) {
      try {
        const metadata = await this.headObject(objectId);
        if (metadata) {
          listed.push(metadata);
        }
      } catch (error) {
        if (!(error instanceof TransferError) || error.code !== "Metadata.Invalid") {
          throw error;
        }
        logger.warn(`Skipping object with unreadable metadata: ${objectId}`, {
          error: error.message,
        });
      }
    }
    return listed;
  }

  async deleteObject(objectId: ObjectId): Promise<void> {
    await this.call(objectId, () => this.gateway.deleteObject(this.dataKey(objectId)));
    await this.call(objectId, () => this.gateway.deleteObject(this.metadataKey(objectId)));
  }

  private upload(objectId: ObjectId): MultipartUpload {
    const upload = this.uploads.get(objectId);
    if (!upload) {
      throw new TransferError(`No upload in progress for ${objectId}`, "Upload.NotFound");
    }
    return upload;
  }

  private async commitData(objectId: ObjectId, upload: MultipartUpload): Promise<void> {
    const key = this.dataKey(objectId);
    if (upload.parts.size === 0) {
      // S3 refuses to complete a multipart upload without parts
      await this.releaseMultipart(objectId, upload.uploadId);
      await this.call(objectId, () =>
        this.gateway.putObject(key, Buffer.alloc(0), upload.contentType),
      );
      return;
    }

    const parts: CompletedPart[] = [...upload.parts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([partNumber, etag]) => ({ partNumber, etag }));
    await this.call(objectId, () =>
      this.gateway.completeMultipartUpload(key, upload.uploadId, parts),
    );
  }

  /** Aborts the multipart upload; one that is already gone counts as aborted. */
  private async releaseMultipart(objectId: ObjectId, uploadId: string): Promise<void> {
    try {
      await this.gateway.abortMultipartUpload(this.dataKey(objectId), uploadId);
    } catch (error) {
      const mapped = mapS3Error(error, { destination: this.name, objectId });
      if (!(mapped instanceof ObjectNotFoundError)) {
        throw mapped;
      }
    }
  }

  private async call<T>(objectId: string, operation: () => Promise<T>, start?: number): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw mapS3Error(error, { destination: this.name, objectId, start });
    }
  }
}
