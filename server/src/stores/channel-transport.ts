import type { ByteRange } from "../models/transfer.model";

/**
 * Flat key/value blob channel the backup store writes through.
 *
 * Implementations throw ObjectNotFoundError for a missing key and
 * RangeNotSatisfiableError for a range starting past the end of a blob;
 * transport failures surface as DestinationUnavailableError.
 */
export interface ChannelTransport {
  readonly name: string;
  putObject(key: string, body: Buffer, contentType: string): Promise<void>;
  /** Whole blob, or the inclusive `range` of it. */
  getObject(key: string, range?: ByteRange): Promise<Buffer>;
  listKeys(prefix: string): Promise<string[]>;
  removeObjects(keys: string[]): Promise<void>;
}
