import { describe, it, expect, vi } from "vitest";
import { TransferSession } from "./transfer-session";
import type { TransferSessionOptions } from "./transfer-session";
import { ProgressTracker } from "./progress-tracker";
import { sha256Hex } from "./chunk-stream";
import {
  AlreadyStartedError,
  ChunkPutError,
  DestinationUnavailableError,
  InvalidStateError,
  ShortReadError,
} from "../errors/transfer.errors";
import type { ChunkSource, SessionOutcome, TransferConfig } from "../models/transfer.model";
import { testTransferConfig } from "../testing/config";
import { InMemoryStore } from "../testing/in-memory-store";
import { failingSource, patternBytes, sourceFrom } from "../testing/sources";

function createSession(
  source: ChunkSource,
  stores: { primary: InMemoryStore; backup?: InMemoryStore },
  options: Partial<Omit<TransferSessionOptions, "config">> & { config?: Partial<TransferConfig> } = {},
) {
  const tracker = new ProgressTracker({ rateWindowMs: 10_000, retentionMs: 60_000 });
  const { config, ...rest } = options;
  const session = new TransferSession({
    objectId: "obj-1",
    fileName: "payload.bin",
    source,
    targets: [
      { store: stores.primary, mandatory: true },
      ...(stores.backup ? [{ store: stores.backup, mandatory: false }] : []),
    ],
    config: testTransferConfig(config),
    tracker,
    ...rest,
  });
  return { session, tracker };
}

async function run(session: TransferSession): Promise<SessionOutcome> {
  session.start();
  return session.awaitCompletion();
}

describe("TransferSession", () => {
  it("should upload every chunk in order and seal the object", async () => {
    const data = patternBytes(100);
    const primary = new InMemoryStore("primary");
    const { session, tracker } = createSession(sourceFrom(data, 10), { primary }, {
      expectedSize: 100,
    });

    const outcome = await run(session);

    expect(outcome.state).toBe("completed");
    if (outcome.state !== "completed") return;
    expect(outcome.metadata).toMatchObject({
      objectId: "obj-1",
      fileName: "payload.bin",
      size: 100,
      chunkSize: 16,
      chunkCount: 7,
      checksum: sha256Hex(data),
      primaryLocation: "memory://primary/obj-1",
    });
    expect(primary.objects.get("obj-1")?.data.equals(data)).toBe(true);
    expect(primary.acked.map((d) => d.sequenceNumber).sort((a, b) => a - b)).toEqual([
      0, 1, 2, 3, 4, 5, 6,
    ]);
    expect(tracker.peek(session.sessionId)).toMatchObject({
      state: "completed",
      bytesTransferred: 100,
      percent: 100,
    });
    expect(session.currentState).toBe("completed");
  });

  it("should complete on the primary while a failing backup drops out", async () => {
    const data = patternBytes(250);
    const primary = new InMemoryStore("primary");
    const backup = new InMemoryStore("backup", "backup", {
      failPut: (descriptor) =>
        descriptor.sequenceNumber % 3 === 2
          ? new DestinationUnavailableError("backup unavailable")
          : undefined,
    });
    const { session } = createSession(sourceFrom(data, 16), { primary, backup }, {
      expectedSize: 250,
    });

    const outcome = await run(session);

    expect(outcome.state).toBe("completed");
    if (outcome.state !== "completed") return;
    expect(outcome.metadata.chunkCount).toBe(16);
    expect(outcome.metadata.backupLocation).toBeUndefined();
    expect(primary.acked).toHaveLength(16);
    expect(primary.objects.get("obj-1")?.data.equals(data)).toBe(true);
    expect(backup.objects.has("obj-1")).toBe(false);
    expect(backup.aborted).toEqual(["obj-1"]);

    const [primaryStatus, backupStatus] = session.info().destinations;
    expect(primaryStatus).toMatchObject({
      state: "complete",
      lastChunkAcked: 15,
      confirmedOffset: 250,
      bytesTransferred: 250,
    });
    expect(backupStatus.state).toBe("failed");
    expect(backupStatus.error).toContain("backup unavailable");
  });

  it("should fail with the confirmed offset when the primary exhausts retries", async () => {
    const primary = new InMemoryStore("primary", "primary", {
      failPut: (descriptor) =>
        descriptor.sequenceNumber === 3 ? new DestinationUnavailableError("503") : undefined,
    });
    const { session } = createSession(sourceFrom(patternBytes(100), 16), { primary }, {
      config: { maxInFlightChunks: 1 },
    });

    const outcome = await run(session);

    expect(outcome.state).toBe("failed");
    if (outcome.state !== "failed") return;
    expect(outcome.confirmedOffset).toBe(48);
    expect(outcome.error).toBeInstanceOf(ChunkPutError);
    expect(outcome.error).toMatchObject({ sequenceNumber: 3, attempts: 4 });
    expect(primary.putAttempts.get(3)).toBe(4);
    expect(session.chunksDispatched).toBe(4);
    expect(primary.objects.has("obj-1")).toBe(false);
    expect(primary.aborted).toEqual(["obj-1"]);
  });

  it("should stop dispatching once cancelled", async () => {
    const primary = new InMemoryStore("primary");
    const data = patternBytes(320);
    let session: TransferSession | undefined;

    async function* source(): AsyncGenerator<Buffer> {
      for (let piece = 0; piece < 20; piece++) {
        if (piece === 5) {
          session?.cancel();
        }
        yield data.subarray(piece * 16, (piece + 1) * 16);
      }
    }

    const created = createSession(source(), { primary }, { expectedSize: 320 });
    session = created.session;
    const outcome = await run(session);

    expect(outcome.state).toBe("cancelled");
    if (outcome.state !== "cancelled") return;
    expect(outcome.confirmedOffset).toBeLessThanOrEqual(80);
    expect(session.chunksDispatched).toBe(5);
    expect(primary.acked.length).toBeLessThanOrEqual(5);
    expect(created.tracker.peek(session.sessionId)?.state).toBe("cancelled");
    expect(created.tracker.peek(session.sessionId)?.bytesTransferred).toBeLessThanOrEqual(80);
    expect(primary.objects.has("obj-1")).toBe(false);
    expect(primary.aborted).toEqual(["obj-1"]);
  });

  it("should never hold more than maxInFlightChunks puts at once", async () => {
    let active = 0;
    let peak = 0;
    const primary = new InMemoryStore("primary", "primary", {
      beforePut: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 2));
        active--;
      },
    });
    const { session } = createSession(sourceFrom(patternBytes(160), 16), { primary }, {
      config: { maxInFlightChunks: 2 },
    });

    const outcome = await run(session);

    expect(outcome.state).toBe("completed");
    expect(peak).toBe(2);
  });

  it("should count a transient retry and still complete", async () => {
    const primary = new InMemoryStore("primary", "primary", {
      failPut: (descriptor, attempt) =>
        descriptor.sequenceNumber === 2 && attempt === 1
          ? new DestinationUnavailableError("connection reset")
          : undefined,
    });
    const { session } = createSession(sourceFrom(patternBytes(64), 16), { primary });

    const outcome = await run(session);

    expect(outcome.state).toBe("completed");
    expect(session.info().destinations[0].retryCount).toBe(1);
    expect(primary.putAttempts.get(2)).toBe(2);
  });

  it("should fail with a short read when the source breaks", async () => {
    const primary = new InMemoryStore("primary");
    const { session } = createSession(failingSource(patternBytes(100), 10, 40), { primary });

    const outcome = await run(session);

    expect(outcome.state).toBe("failed");
    if (outcome.state !== "failed") return;
    expect(outcome.error).toBeInstanceOf(ShortReadError);
    expect(outcome.confirmedOffset).toBe(32);
    expect(primary.aborted).toEqual(["obj-1"]);
  });

  it("should store an empty object", async () => {
    const primary = new InMemoryStore("primary");
    const { session } = createSession(sourceFrom(Buffer.alloc(0), 16), { primary }, {
      expectedSize: 0,
    });

    const outcome = await run(session);

    expect(outcome.state).toBe("completed");
    if (outcome.state !== "completed") return;
    expect(outcome.metadata).toMatchObject({ size: 0, chunkCount: 0 });
    expect(primary.objects.get("obj-1")?.data.length).toBe(0);
  });

  describe("lifecycle", () => {
    it("should reject a second start", async () => {
      const { session } = createSession(sourceFrom(patternBytes(16), 16), {
        primary: new InMemoryStore("primary"),
      });

      session.start();

      expect(() => session.start()).toThrow(AlreadyStartedError);
      await session.awaitCompletion();
    });

    it("should reject cancel on a finished session", async () => {
      const { session } = createSession(sourceFrom(patternBytes(16), 16), {
        primary: new InMemoryStore("primary"),
      });

      await run(session);

      expect(() => session.cancel()).toThrow(InvalidStateError);
    });

    it("should cancel a session that never started", async () => {
      const primary = new InMemoryStore("primary");
      const onSettled = vi.fn();
      const { session } = createSession(sourceFrom(patternBytes(16), 16), { primary }, {
        onSettled,
      });

      session.cancel();

      await expect(session.awaitCompletion()).resolves.toEqual({
        state: "cancelled",
        confirmedOffset: 0,
      });
      expect(session.currentState).toBe("cancelled");
      expect(primary.begun).toEqual([]);
      expect(onSettled).toHaveBeenCalledTimes(1);
      expect(() => session.start()).toThrow(AlreadyStartedError);
    });
  });
});
