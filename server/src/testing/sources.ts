import { readAll } from "../utils/streams";

/** Deterministic test payload: byte i is i mod 251. */
export function patternBytes(size: number): Buffer {
  const bytes = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = i % 251;
  }
  return bytes;
}

/** Yields `data` in pieces of `pieceSize` bytes. */
export async function* sourceFrom(
  data: Buffer,
  pieceSize: number,
): AsyncGenerator<Buffer> {
  for (let offset = 0; offset < data.length; offset += pieceSize) {
    yield data.subarray(offset, Math.min(offset + pieceSize, data.length));
  }
}

/** Yields `failAfter` bytes of `data`, then throws like a dropped socket. */
export async function* failingSource(
  data: Buffer,
  pieceSize: number,
  failAfter: number,
): AsyncGenerator<Buffer> {
  let sent = 0;
  while (sent < failAfter) {
    const end = Math.min(sent + pieceSize, failAfter);
    yield data.subarray(sent, end);
    sent = end;
  }
  throw new Error("socket hang up");
}

export const collect = readAll;
