import crypto from "crypto";
import {
  ConfigurationError,
  ObjectTooLargeError,
  ShortReadError,
} from "../errors/transfer.errors";
import type { Chunk, ChunkSource } from "../models/transfer.model";

export interface ChunkStreamOptions {
  chunkSize: number;
  /** Declared total size; null or omitted when the source length is unknown. */
  expectedSize?: number | null;
  maxSize?: number;
  checksums?: boolean;
}

export function sha256Hex(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

/**
 * Cuts a byte source into ordered, fixed-size chunks.
 *
 * The sequence is lazy and forward-only: the source is only pulled when
 * `next()` needs more bytes for the current chunk, so a caller that stops
 * calling `next()` applies backpressure all the way to the source. Only the
 * final chunk may be shorter than `chunkSize`.
 */
export class ChunkStream {
  private readonly iterator: AsyncIterator<Uint8Array | string>;
  private readonly chunkSize: number;
  private readonly expectedSize: number | null;
  private readonly maxSize?: number;
  private readonly checksums: boolean;
  private readonly objectHash?: crypto.Hash;

  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private sourceDone = false;
  private finished = false;
  private received = 0;
  private emitted = 0;
  private nextSequence = 0;
  private digest?: string;

  constructor(source: ChunkSource, options: ChunkStreamOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ConfigurationError(
        `chunkSize must be a positive integer, got ${options.chunkSize}`,
      );
    }
    this.iterator = source[Symbol.asyncIterator]();
    this.chunkSize = options.chunkSize;
    this.expectedSize = options.expectedSize ?? null;
    this.maxSize = options.maxSize;
    this.checksums = options.checksums ?? false;
    if (this.checksums) {
      this.objectHash = crypto.createHash("sha256");
    }
  }

  /** Bytes pulled from the source so far. */
  get bytesRead(): number {
    return this.received;
  }

  get chunksEmitted(): number {
    return this.nextSequence;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** SHA-256 of the whole object, available once the stream is drained. */
  get checksum(): string | undefined {
    return this.digest;
  }

  async next(): Promise<Chunk | null> {
    if (this.finished) {
      return null;
    }

    while (this.pendingBytes < this.chunkSize && !this.sourceDone) {
      await this.pull();
    }

    if (this.pendingBytes === 0) {
      this.finish();
      return null;
    }

    const length = Math.min(this.chunkSize, this.pendingBytes);
    const bytes = this.take(length);
    const chunk: Chunk = {
      descriptor: {
        sequenceNumber: this.nextSequence,
        offset: this.emitted,
        length,
        ...(this.checksums && { checksum: sha256Hex(bytes) }),
      },
      bytes,
    };

    this.nextSequence++;
    this.emitted += length;
    return chunk;
  }

  /** Stops reading and releases the source (destroys a Node stream). */
  async close(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.pending = [];
    this.pendingBytes = 0;
    if (this.iterator.return) {
      await this.iterator.return();
    }
  }

  private async pull(): Promise<void> {
    let result: IteratorResult<Uint8Array | string>;
    try {
      result = await this.iterator.next();
    } catch (error) {
      this.finished = true;
      throw new ShortReadError(
        `Source failed after ${this.received} bytes`,
        {
          bytesRead: this.received,
          expectedSize: this.expectedSize ?? undefined,
          cause: error,
        },
      );
    }

    if (result.done) {
      this.sourceDone = true;
      if (this.expectedSize !== null && this.received < this.expectedSize) {
        this.finished = true;
        throw new ShortReadError(
          `Source ended after ${this.received} of ${this.expectedSize} bytes`,
          { bytesRead: this.received, expectedSize: this.expectedSize },
        );
      }
      return;
    }

    const piece = toBuffer(result.value);
    if (piece.length === 0) {
      return;
    }

    this.received += piece.length;
    if (this.expectedSize !== null && this.received > this.expectedSize) {
      this.finished = true;
      throw new ObjectTooLargeError(
        this.expectedSize,
        `Source produced more than the declared ${this.expectedSize} bytes`,
      );
    }
    if (this.maxSize !== undefined && this.received > this.maxSize) {
      this.finished = true;
      throw new ObjectTooLargeError(this.maxSize);
    }

    this.objectHash?.update(piece);
    this.pending.push(piece);
    this.pendingBytes += piece.length;
  }

  private take(length: number): Buffer {
    const parts: Buffer[] = [];
    let remaining = length;

    while (remaining > 0) {
      const head = this.pending[0];
      if (head.length <= remaining) {
        parts.push(head);
        this.pending.shift();
        remaining -= head.length;
      } else {
        parts.push(head.subarray(0, remaining));
        this.pending[0] = head.subarray(remaining);
        remaining = 0;
      }
    }

    this.pendingBytes -= length;
    return Buffer.concat(parts, length);
  }

  private finish(): void {
    this.finished = true;
    if (this.objectHash) {
      this.digest = this.objectHash.digest("hex");
    }
  }
}

function toBuffer(value: Uint8Array | string): Buffer {
  if (typeof value === "string") {
    return Buffer.from(value);
  }
  if (Buffer.isBuffer(value)) {
    return value;
  }
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}
