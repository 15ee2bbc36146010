import type {
  ChunkDescriptor,
  ObjectId,
  StoredObjectMetadata,
  UploadInit,
} from "../models/transfer.model";

export type StoreKind = "primary" | "backup";

/**
 * Capability set every destination offers. Variants differ only in how the
 * calls map onto their transport; all of them must serve partial reads.
 */
export interface RemoteStoreAdapter {
  readonly name: string;
  readonly kind: StoreKind;

  beginUpload(objectId: ObjectId, init: UploadInit): Promise<void>;
  putChunk(
    objectId: ObjectId,
    descriptor: ChunkDescriptor,
    bytes: Buffer,
    signal?: AbortSignal,
  ): Promise<void>;
  /** Seals the upload and persists its metadata. */
  completeUpload(objectId: ObjectId, metadata: StoredObjectMetadata): Promise<void>;
  /** Abandons a partial upload, removing anything written for it. */
  abortUpload(objectId: ObjectId): Promise<void>;

  /** Inclusive byte range. */
  getRange(
    objectId: ObjectId,
    startByte: number,
    endByteInclusive: number,
    signal?: AbortSignal,
  ): Promise<Buffer>;
  /** Metadata of a completed object, or null when the store does not hold it. */
  headObject(objectId: ObjectId): Promise<StoredObjectMetadata | null>;
  listObjects(prefix: string): Promise<StoredObjectMetadata[]>;
  deleteObject(objectId: ObjectId): Promise<void>;
  location(objectId: ObjectId): string;
}

export interface DestinationTarget {
  store: RemoteStoreAdapter;
  mandatory: boolean;
}
