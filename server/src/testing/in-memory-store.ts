import {
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  TransferError,
} from "../errors/transfer.errors";
import type {
  ChunkDescriptor,
  ObjectId,
  StoredObjectMetadata,
  UploadInit,
} from "../models/transfer.model";
import type { RemoteStoreAdapter, StoreKind } from "../stores/remote-store";

export interface InMemoryStoreOptions {
  /** Return an error to fail this attempt of a chunk put. */
  failPut?: (descriptor: ChunkDescriptor, attempt: number) => Error | undefined;
  failBegin?: () => Error | undefined;
  failComplete?: () => Error | undefined;
  failRead?: () => Error | undefined;
  /** Awaited before each put is recorded; lets tests hold puts in flight. */
  beforePut?: (descriptor: ChunkDescriptor) => Promise<void>;
}

interface StoredObject {
  data: Buffer;
  metadata: StoredObjectMetadata;
}

/**
 * In-process stand-in for a remote store. Records every call so tests can
 * assert on what reached the destination.
 */
export class InMemoryStore implements RemoteStoreAdapter {
  readonly objects = new Map<ObjectId, StoredObject>();
  readonly uploads = new Map<ObjectId, Map<number, Buffer>>();
  readonly acked: ChunkDescriptor[] = [];
  readonly putAttempts = new Map<number, number>();
  readonly aborted: ObjectId[] = [];
  readonly begun: ObjectId[] = [];
  rangeReads = 0;

  constructor(
    readonly name: string,
    readonly kind: StoreKind = "primary",
    private readonly options: InMemoryStoreOptions = {},
  ) {}

  seed(metadata: StoredObjectMetadata, data: Buffer): void {
    this.objects.set(metadata.objectId, { data, metadata });
  }

  async beginUpload(objectId: ObjectId, _init: UploadInit): Promise<void> {
    const failure = this.options.failBegin?.();
    if (failure) {
      throw failure;
    }
    this.begun.push(objectId);
    this.uploads.set(objectId, new Map());
  }

  async putChunk(
    objectId: ObjectId,
    descriptor: ChunkDescriptor,
    bytes: Buffer,
  ): Promise<void> {
    const attempt = (this.putAttempts.get(descriptor.sequenceNumber) ?? 0) + 1;
    this.putAttempts.set(descriptor.sequenceNumber, attempt);

    await this.options.beforePut?.(descriptor);
    const failure = this.options.failPut?.(descriptor, attempt);
    if (failure) {
      throw failure;
    }

    const parts = this.uploads.get(objectId);
    if (!parts) {
      throw new TransferError(`No upload in progress for ${objectId}`, "Upload.NotFound");
    }
    parts.set(descriptor.sequenceNumber, Buffer.from(bytes));
    this.acked.push(descriptor);
  }

  async completeUpload(objectId: ObjectId, metadata: StoredObjectMetadata): Promise<void> {
    const failure = this.options.failComplete?.();
    if (failure) {
      throw failure;
    }
    const parts = this.uploads.get(objectId);
    if (!parts) {
      throw new TransferError(`No upload in progress for ${objectId}`, "Upload.NotFound");
    }

    const ordered: Buffer[] = [];
    for (let sequence = 0; sequence < parts.size; sequence++) {
      const part = parts.get(sequence);
      if (!part) {
        throw new TransferError(`Missing part ${sequence}`, "Upload.MissingPart");
      }
      ordered.push(part);
    }

    this.uploads.delete(objectId);
    this.objects.set(objectId, { data: Buffer.concat(ordered), metadata });
  }

  async abortUpload(objectId: ObjectId): Promise<void> {
    this.aborted.push(objectId);
    this.uploads.delete(objectId);
  }

  async getRange(objectId: ObjectId, start: number, end: number): Promise<Buffer> {
    this.rangeReads++;
    const failure = this.options.failRead?.();
    if (failure) {
      throw failure;
    }
    const object = this.objects.get(objectId);
    if (!object) {
      throw new ObjectNotFoundError(objectId);
    }
    if (start >= object.data.length) {
      throw new RangeNotSatisfiableError(start, object.data.length);
    }
    return Buffer.from(object.data.subarray(start, Math.min(end + 1, object.data.length)));
  }

  async headObject(objectId: ObjectId): Promise<StoredObjectMetadata | null> {
    const failure = this.options.failRead?.();
    if (failure) {
      throw failure;
    }
    return this.objects.get(objectId)?.metadata ?? null;
  }

  async listObjects(prefix: string): Promise<StoredObjectMetadata[]> {
    const failure = this.options.failRead?.();
    if (failure) {
      throw failure;
    }
    return [...this.objects.values()]
      .map((object) => object.metadata)
      .filter((metadata) => metadata.objectId.startsWith(prefix));
  }

  async deleteObject(objectId: ObjectId): Promise<void> {
    this.objects.delete(objectId);
  }

  location(objectId: ObjectId): string {
    return `memory://${this.name}/${objectId}`;
  }
}
