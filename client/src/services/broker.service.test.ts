import { describe, it, expect } from "vitest";
import { parseProgressMessage } from "./broker.service";

describe("parseProgressMessage", () => {
  it("should parse a published snapshot", () => {
    const snapshot = {
      sessionId: "s-1",
      objectId: "obj-1",
      direction: "upload",
      state: "active",
      bytesTransferred: 64,
      totalSize: 128,
      percent: 50,
      etaSeconds: 1,
      currentRateBytesPerSec: 64,
      startedAt: "2026-03-01T12:00:00.000Z",
      updatedAt: "2026-03-01T12:00:01.000Z",
    };
    expect(parseProgressMessage(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  it("should ignore malformed JSON", () => {
    expect(parseProgressMessage("{not json")).toBeNull();
  });

  it("should ignore other payloads", () => {
    expect(parseProgressMessage(JSON.stringify({ event: "transfer_complete" }))).toBeNull();
    expect(parseProgressMessage("42")).toBeNull();
  });
});
