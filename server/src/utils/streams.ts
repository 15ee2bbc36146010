/** Drains a byte stream (a Node Readable or any async iterable) into one buffer. */
export async function readAll(source: AsyncIterable<Uint8Array | string>): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const part of source) {
    parts.push(typeof part === "string" ? Buffer.from(part) : Buffer.from(part));
  }
  return Buffer.concat(parts);
}
