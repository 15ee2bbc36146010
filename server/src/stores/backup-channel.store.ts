import Joi from "joi";
import { v4 as uuidv4 } from "uuid";
import {
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  TransferError,
} from "../errors/transfer.errors";
import { storedObjectMetadataSchema } from "../models/metadata.schema";
import type {
  ChunkDescriptor,
  ObjectId,
  StoredObjectMetadata,
  UploadInit,
} from "../models/transfer.model";
import { LruCache } from "../utils/lru-cache";
import logger from "../utils/logger";
import type { ChannelTransport } from "./channel-transport";
import type { RemoteStoreAdapter } from "./remote-store";

export interface BackupManifest {
  version: 1;
  /** Upload that wrote the chunks; each upload stages under its own key space. */
  generation: string;
  metadata: StoredObjectMetadata;
  chunks: ChunkDescriptor[];
}

const manifestSchema = Joi.object<BackupManifest>({
  version: Joi.number().valid(1).required(),
  generation: Joi.string().required(),
  metadata: storedObjectMetadataSchema.required(),
  chunks: Joi.array()
    .items(
      Joi.object<ChunkDescriptor>({
        sequenceNumber: Joi.number().integer().min(0).required(),
        offset: Joi.number().integer().min(0).required(),
        length: Joi.number().integer().min(1).required(),
        checksum: Joi.string().hex().length(64),
      }),
    )
    .required(),
});

export interface BackupChannelStoreOptions {
  transport: ChannelTransport;
  keyPrefix?: string;
  name?: string;
  manifestCacheSize?: number;
}

const MANIFEST_FILE = "manifest.json";

interface StagedUpload {
  generation: string;
  chunks: Map<number, ChunkDescriptor>;
}

/** A sealed upload and the manifest it replaced, kept so an abort can roll it back. */
interface SealedUpload {
  generation: string;
  previous: BackupManifest | null;
}

/**
 * Secondary destination: every chunk is its own blob on the channel. Each
 * upload writes its chunks under a fresh generation and the manifest is
 * swapped last, so the replica in place stays readable until a new one is
 * complete, and an object without a manifest reads as absent.
 */
export class BackupChannelStore implements RemoteStoreAdapter {
  readonly name: string;
  readonly kind = "backup" as const;
  private readonly transport: ChannelTransport;
  private readonly keyPrefix: string;
  private readonly uploads = new Map<ObjectId, StagedUpload>();
  private readonly sealed: LruCache<ObjectId, SealedUpload>;
  private readonly manifests: LruCache<ObjectId, BackupManifest>;

  constructor(options: BackupChannelStoreOptions) {
    this.transport = options.transport;
    this.keyPrefix = options.keyPrefix ?? "";
    this.name = options.name ?? options.transport.name;
    this.manifests = new LruCache(options.manifestCacheSize ?? 128);
    this.sealed = new LruCache(options.manifestCacheSize ?? 128);
  }

  objectPrefix(objectId: ObjectId): string {
    return `${this.keyPrefix}${objectId}/`;
  }

  generationPrefix(objectId: ObjectId, generation: string): string {
    return `${this.objectPrefix(objectId)}${generation}/`;
  }

  chunkKey(objectId: ObjectId, generation: string, sequenceNumber: number): string {
    const sequence = String(sequenceNumber).padStart(8, "0");
    return `${this.generationPrefix(objectId, generation)}chunks/${sequence}`;
  }

  manifestKey(objectId: ObjectId): string {
    return `${this.objectPrefix(objectId)}${MANIFEST_FILE}`;
  }

  location(objectId: ObjectId): string {
    return `${this.transport.name}://${this.objectPrefix(objectId)}`;
  }

  async beginUpload(objectId: ObjectId, _init: UploadInit): Promise<void> {
    this.sealed.delete(objectId);
    this.uploads.set(objectId, { generation: uuidv4(), chunks: new Map() });
  }

  async putChunk(objectId: ObjectId, descriptor: ChunkDescriptor, bytes: Buffer): Promise<void> {
    const upload = this.upload(objectId);
    await this.transport.putObject(
      this.chunkKey(objectId, upload.generation, descriptor.sequenceNumber),
      bytes,
      "application/octet-stream",
    );
    upload.chunks.set(descriptor.sequenceNumber, descriptor);
  }

  /**
   * Swaps the manifest to the new generation. Chunks of the replaced
   * generation stay until the next replacement; older ones are pruned.
   */
  async completeUpload(objectId: ObjectId, metadata: StoredObjectMetadata): Promise<void> {
    const upload = this.upload(objectId);
    const chunks: ChunkDescriptor[] = [];
    for (let sequence = 0; sequence < metadata.chunkCount; sequence++) {
      const descriptor = upload.chunks.get(sequence);
      if (!descriptor) {
        throw new TransferError(
          `Backup of ${objectId} is missing chunk ${sequence}`,
          "Backup.IncompleteChunks",
        );
      }
      chunks.push(descriptor);
    }

    const previous = await this.replacedManifest(objectId);
    const manifest: BackupManifest = {
      version: 1,
      generation: upload.generation,
      metadata,
      chunks,
    };
    await this.writeManifest(objectId, manifest);
    this.uploads.delete(objectId);
    this.sealed.set(objectId, { generation: upload.generation, previous });

    const keep = previous ? [upload.generation, previous.generation] : [upload.generation];
    try {
      await this.prune(objectId, keep);
    } catch (error) {
      logger.warn(`Failed to prune stale backup chunks of ${objectId}:`, error);
    }
  }

  /**
   * Drops a staged upload's chunks. An upload that was already sealed is
   * rolled back to the manifest it replaced, or removed if it replaced none.
   */
  async abortUpload(objectId: ObjectId): Promise<void> {
    const staged = this.uploads.get(objectId);
    if (staged) {
      this.uploads.delete(objectId);
      await this.removeGeneration(objectId, staged.generation);
      return;
    }

    const sealed = this.sealed.get(objectId);
    if (!sealed) {
      return;
    }
    this.sealed.delete(objectId);
    if (sealed.previous) {
      await this.writeManifest(objectId, sealed.previous);
    } else {
      this.manifests.delete(objectId);
      await this.transport.removeObjects([this.manifestKey(objectId)]);
    }
    await this.removeGeneration(objectId, sealed.generation);
  }

  async getRange(objectId: ObjectId, startByte: number, endByteInclusive: number): Promise<Buffer> {
    const manifest = await this.manifest(objectId);
    if (!manifest) {
      throw new ObjectNotFoundError(objectId);
    }
    const { size } = manifest.metadata;
    if (startByte >= size) {
      throw new RangeNotSatisfiableError(startByte, size);
    }
    const end = Math.min(endByteInclusive, size - 1);

    const parts: Buffer[] = [];
    for (const chunk of manifest.chunks) {
      const chunkEnd = chunk.offset + chunk.length - 1;
      if (chunkEnd < startByte || chunk.offset > end) {
        continue;
      }
      const key = this.chunkKey(objectId, manifest.generation, chunk.sequenceNumber);
      parts.push(
        await this.transport.getObject(key, {
          start: Math.max(startByte, chunk.offset) - chunk.offset,
          end: Math.min(end, chunkEnd) - chunk.offset,
        }),
      );
    }
    return Buffer.concat(parts);
  }

  async headObject(objectId: ObjectId): Promise<StoredObjectMetadata | null> {
    const manifest = await this.manifest(objectId);
    return manifest?.metadata ?? null;
  }

  async listObjects(prefix: string): Promise<StoredObjectMetadata[]> {
    const keys = await this.transport.listKeys(`${this.keyPrefix}${prefix}`);
    const listed: StoredObjectMetadata[] = [];

    for (const key of keys) {
      if (!key.endsWith(`/${MANIFEST_FILE}`)) {
        continue;
      }
      const objectId = key.slice(this.keyPrefix.length, -(MANIFEST_FILE.length + 1));
      try {
        const metadata = await this.headObject(objectId);
        if (metadata) {
          listed.push(metadata);
        }
      } catch (error) {
        if (!(error instanceof TransferError) || error.code !== "Metadata.Invalid") {
          throw error;
        }
        logger.warn(`Skipping backup object with unreadable manifest: ${objectId}`, {
          error: error.message,
        });
      }
    }
    return listed;
  }

  async deleteObject(objectId: ObjectId): Promise<void> {
    this.sealed.delete(objectId);
    await this.removeAll(objectId);
  }

  private async writeManifest(objectId: ObjectId, manifest: BackupManifest): Promise<void> {
    await this.transport.putObject(
      this.manifestKey(objectId),
      Buffer.from(JSON.stringify(manifest)),
      "application/json",
    );
    this.manifests.set(objectId, manifest);
  }

  /** Manifest about to be replaced; an unreadable one is treated as absent. */
  private async replacedManifest(objectId: ObjectId): Promise<BackupManifest | null> {
    try {
      return await this.manifest(objectId);
    } catch (error) {
      if (error instanceof TransferError && error.code === "Metadata.Invalid") {
        logger.warn(`Replacing unreadable backup manifest of ${objectId}:`, error);
        return null;
      }
      throw error;
    }
  }

  private async manifest(objectId: ObjectId): Promise<BackupManifest | null> {
    const cached = this.manifests.get(objectId);
    if (cached) {
      return cached;
    }

    const key = this.manifestKey(objectId);
    let raw: Buffer;
    try {
      raw = await this.transport.getObject(key);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString());
    } catch (error) {
      throw new TransferError(`Manifest at ${key} is not valid JSON`, "Metadata.Invalid", {
        cause: error,
      });
    }
    const result = manifestSchema.validate(parsed, { convert: false });
    if (result.error) {
      throw new TransferError(
        `Manifest at ${key} is invalid: ${result.error.message}`,
        "Metadata.Invalid",
        { cause: result.error },
      );
    }

    this.manifests.set(objectId, result.value);
    return result.value;
  }

  /** Manifest first, so a half-removed object already reads as absent. */
  private async removeAll(objectId: ObjectId): Promise<void> {
    this.manifests.delete(objectId);
    const manifestKey = this.manifestKey(objectId);
    const keys = await this.transport.listKeys(this.objectPrefix(objectId));
    if (keys.includes(manifestKey)) {
      await this.transport.removeObjects([manifestKey]);
    }
    await this.transport.removeObjects(keys.filter((key) => key !== manifestKey));
  }

  /** Removes chunk keys of every generation not in `keep`. */
  private async prune(objectId: ObjectId, keep: string[]): Promise<void> {
    const prefix = this.objectPrefix(objectId);
    const manifestKey = this.manifestKey(objectId);
    const keys = await this.transport.listKeys(prefix);
    const stale = keys.filter((key) => {
      if (key === manifestKey) {
        return false;
      }
      const [generation] = key.slice(prefix.length).split("/");
      return !keep.includes(generation);
    });
    if (stale.length > 0) {
      await this.transport.removeObjects(stale);
    }
  }

  private async removeGeneration(objectId: ObjectId, generation: string): Promise<void> {
    const keys = await this.transport.listKeys(this.generationPrefix(objectId, generation));
    if (keys.length > 0) {
      await this.transport.removeObjects(keys);
    }
  }

  private upload(objectId: ObjectId): StagedUpload {
    const upload = this.uploads.get(objectId);
    if (!upload) {
      throw new TransferError(`No upload in progress for ${objectId}`, "Upload.NotFound");
    }
    return upload;
  }
}
