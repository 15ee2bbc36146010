export type RangeRequest =
  | { kind: "bounded"; start: number; end: number }
  | { kind: "open"; start: number }
  | { kind: "suffix"; length: number };

const RANGE_PATTERN = /^bytes=(\d*)-(\d*)$/;

/**
 * Parses a single-range `Range` header. Returns null when the header is
 * absent, malformed or asks for several ranges; callers then serve the whole
 * object.
 */
export function parseRangeHeader(header: string | undefined): RangeRequest | null {
  if (!header) {
    return null;
  }
  const match = RANGE_PATTERN.exec(header.trim());
  if (!match) {
    return null;
  }

  const [, startText, endText] = match;
  if (startText === "") {
    if (endText === "") {
      return null;
    }
    return { kind: "suffix", length: Number(endText) };
  }

  const start = Number(startText);
  if (endText === "") {
    return { kind: "open", start };
  }
  const end = Number(endText);
  return end < start ? null : { kind: "bounded", start, end };
}

/**
 * Start and optional end for a range read against an object of `size`
 * bytes. A suffix longer than the object covers all of it; a zero-length
 * suffix yields a start of `size`, which the read rejects.
 */
export function toReadBounds(
  range: RangeRequest,
  size: number,
): { start: number; end?: number } {
  switch (range.kind) {
    case "bounded":
      return { start: range.start, end: range.end };
    case "open":
      return { start: range.start };
    case "suffix":
      return { start: Math.max(0, size - range.length) };
  }
}

export function contentRange(start: number, end: number, size: number): string {
  return `bytes ${start}-${end}/${size}`;
}

export function unsatisfiedRange(size: number): string {
  return `bytes */${size}`;
}
