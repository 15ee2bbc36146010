import { Readable } from "stream";
import {
  DestinationUnavailableError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  TransferError,
  toError,
} from "../errors/transfer.errors";
import type {
  ByteRange,
  ObjectId,
  RangeReadResult,
  RetryPolicy,
  StoredObjectMetadata,
} from "../models/transfer.model";
import type { RemoteStoreAdapter } from "../stores/remote-store";
import { LruCache } from "../utils/lru-cache";
import logger from "../utils/logger";
import { withRetry } from "./retry";

export interface RangeServerOptions {
  primary: RemoteStoreAdapter;
  backup?: RemoteStoreAdapter;
  retry: RetryPolicy;
  timeoutMs: number;
  metadataCacheSize?: number;
  /** Window for streamed bodies when the object records no chunk size. */
  defaultWindowSize?: number;
}

export interface OpenedRange {
  range: ByteRange;
  totalSize: number;
  contentType: string;
  metadata: StoredObjectMetadata;
  /** Lazily reads the range one window at a time. */
  body: Readable;
}

type ReadSource = RangeReadResult["source"];

function isPermanent(error: unknown): boolean {
  return error instanceof TransferError && error.permanent;
}

/**
 * Partial reads against stored objects, with fallback to a fully
 * replicated backup when the primary is unreachable.
 */
export class RangeServer {
  private readonly metadataCache: LruCache<ObjectId, StoredObjectMetadata>;
  private readonly windowSize: number;

  constructor(private readonly options: RangeServerOptions) {
    this.metadataCache = new LruCache(options.metadataCacheSize ?? 256);
    this.windowSize = options.defaultWindowSize ?? 8 * 1024 * 1024;
  }

  async read(
    objectId: ObjectId,
    start: number,
    end?: number,
    signal?: AbortSignal,
  ): Promise<RangeReadResult> {
    const metadata = await this.metadata(objectId);
    const range = this.resolveRange(metadata, start, end);
    const { bytes, source } = await this.readWindow(metadata, range, signal);

    return {
      bytes,
      range,
      totalSize: metadata.size,
      contentType: metadata.contentType,
      source,
    };
  }

  async open(objectId: ObjectId, start: number, end?: number): Promise<OpenedRange> {
    const metadata = await this.metadata(objectId);
    const range = this.resolveRange(metadata, start, end);
    const window = metadata.chunkSize > 0 ? metadata.chunkSize : this.windowSize;

    return {
      range,
      totalSize: metadata.size,
      contentType: metadata.contentType,
      metadata,
      body: Readable.from(this.windows(metadata, range, window)),
    };
  }

  /** Metadata of a completed object, cached. */
  async metadata(objectId: ObjectId): Promise<StoredObjectMetadata> {
    const cached = this.metadataCache.get(objectId);
    if (cached) {
      return cached;
    }

    let metadata: StoredObjectMetadata | null;
    try {
      metadata = await this.options.primary.headObject(objectId);
    } catch (error) {
      if (isPermanent(error) || !this.options.backup) {
        throw error;
      }
      logger.warn(`Primary metadata lookup failed for ${objectId}, asking backup`, {
        error: toError(error).message,
      });
      metadata = await this.fromBackup(objectId, async () => {
        const found = await this.backupStore().headObject(objectId);
        if (!found) {
          throw new ObjectNotFoundError(objectId);
        }
        return found;
      });
    }

    if (!metadata) {
      throw new ObjectNotFoundError(objectId);
    }
    this.metadataCache.set(objectId, metadata);
    return metadata;
  }

  invalidate(objectId: ObjectId): void {
    this.metadataCache.delete(objectId);
  }

  private async *windows(
    metadata: StoredObjectMetadata,
    range: ByteRange,
    window: number,
  ): AsyncGenerator<Buffer> {
    for (let offset = range.start; offset <= range.end; offset += window) {
      const { bytes } = await this.readWindow(metadata, {
        start: offset,
        end: Math.min(offset + window - 1, range.end),
      });
      yield bytes;
    }
  }

  private resolveRange(
    metadata: StoredObjectMetadata,
    start: number,
    end: number | undefined,
  ): ByteRange {
    const size = metadata.size;
    if (!Number.isInteger(start) || start < 0) {
      throw new RangeNotSatisfiableError(start, size, `Invalid range start: ${start}`);
    }
    if (end !== undefined && (!Number.isInteger(end) || end < start)) {
      throw new RangeNotSatisfiableError(start, size, `Invalid range end: ${end}`);
    }
    if (start >= size) {
      throw new RangeNotSatisfiableError(start, size);
    }
    return { start, end: Math.min(end ?? size - 1, size - 1) };
  }

  private async readWindow(
    metadata: StoredObjectMetadata,
    range: ByteRange,
    signal?: AbortSignal,
  ): Promise<{ bytes: Buffer; source: ReadSource }> {
    const { objectId } = metadata;
    try {
      const bytes = await this.retrying(
        (attemptSignal) =>
          this.options.primary.getRange(objectId, range.start, range.end, attemptSignal),
        signal,
      );
      return { bytes, source: "primary" };
    } catch (error) {
      if (isPermanent(error)) {
        throw error;
      }
      if (!this.options.backup || !metadata.backupLocation) {
        throw new DestinationUnavailableError(
          `Primary store could not serve ${objectId}: ${toError(error).message}`,
          { destination: this.options.primary.name, cause: error },
        );
      }

      logger.warn(`Primary read failed for ${objectId}, falling back to backup`, {
        start: range.start,
        end: range.end,
        error: toError(error).message,
      });
      const bytes = await this.fromBackup(objectId, async () => {
        const backup = this.backupStore();
        if (!(await backup.headObject(objectId))) {
          throw new ObjectNotFoundError(objectId);
        }
        return this.retrying(
          (attemptSignal) => backup.getRange(objectId, range.start, range.end, attemptSignal),
          signal,
        );
      });
      return { bytes, source: "backup" };
    }
  }

  /** Runs a backup call; any failure means every source is exhausted. */
  private async fromBackup<T>(objectId: ObjectId, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      logger.error(`Backup could not serve ${objectId}:`, error);
      throw new DestinationUnavailableError(
        `No store could serve ${objectId}: ${toError(error).message}`,
        { destination: this.backupStore().name, cause: error },
      );
    }
  }

  private backupStore(): RemoteStoreAdapter {
    if (!this.options.backup) {
      throw new DestinationUnavailableError("No backup store configured");
    }
    return this.options.backup;
  }

  private retrying<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    return withRetry(operation, {
      ...this.options.retry,
      timeoutMs: this.options.timeoutMs,
      signal,
    });
  }
}
