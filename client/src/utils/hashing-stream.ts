import crypto from "crypto";
import { Transform, TransformCallback } from "stream";

/**
 * Pass-through that hashes (SHA-256) and counts the bytes flowing through
 * it. The digest is available once the stream has flushed.
 */
export class HashingStream extends Transform {
  private readonly hash = crypto.createHash("sha256");
  private bytes = 0;
  private digest?: string;

  constructor(private readonly onBytes?: (total: number) => void) {
    super();
  }

  get bytesSeen(): number {
    return this.bytes;
  }

  get sha256(): string | undefined {
    return this.digest;
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hash.update(chunk);
    this.bytes += chunk.length;
    this.onBytes?.(this.bytes);
    callback(null, chunk);
  }

  _flush(callback: TransformCallback): void {
    this.digest = this.hash.digest("hex");
    callback();
  }
}
