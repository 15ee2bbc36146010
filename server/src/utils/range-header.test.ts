import { describe, it, expect } from "vitest";
import { contentRange, parseRangeHeader, toReadBounds, unsatisfiedRange } from "./range-header";

describe("parseRangeHeader", () => {
  it.each([
    ["bytes=0-499", { kind: "bounded", start: 0, end: 499 }],
    ["bytes=1000-", { kind: "open", start: 1000 }],
    ["bytes=-500", { kind: "suffix", length: 500 }],
    [" bytes=5-5 ", { kind: "bounded", start: 5, end: 5 }],
  ])("should parse %j", (header, expected) => {
    expect(parseRangeHeader(header)).toEqual(expected);
  });

  it.each([undefined, "", "bytes=-", "bytes=5-1", "bytes=0-1,4-5", "items=0-1", "bytes=a-b"])(
    "should ignore %j",
    (header) => {
      expect(parseRangeHeader(header)).toBeNull();
    },
  );
});

describe("toReadBounds", () => {
  it("should resolve a suffix against the object size", () => {
    expect(toReadBounds({ kind: "suffix", length: 500 }, 5000)).toEqual({ start: 4500 });
    expect(toReadBounds({ kind: "suffix", length: 9000 }, 5000)).toEqual({ start: 0 });
  });

  it("should pass explicit bounds through", () => {
    expect(toReadBounds({ kind: "bounded", start: 1000, end: 1999 }, 5000)).toEqual({
      start: 1000,
      end: 1999,
    });
    expect(toReadBounds({ kind: "open", start: 10 }, 5000)).toEqual({ start: 10 });
  });
});

describe("header values", () => {
  it("should format Content-Range", () => {
    expect(contentRange(1000, 1999, 5000)).toBe("bytes 1000-1999/5000");
    expect(unsatisfiedRange(5000)).toBe("bytes */5000");
  });
});
