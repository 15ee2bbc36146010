import { describe, it, expect, beforeEach } from "vitest";
import { BackupChannelStore } from "./backup-channel.store";
import {
  DestinationUnavailableError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
} from "../errors/transfer.errors";
import type { StoredObjectMetadata, UploadInit } from "../models/transfer.model";
import { InMemoryChannel } from "../testing/in-memory-channel";
import { patternBytes } from "../testing/sources";

const init: UploadInit = {
  fileName: "song.mp3",
  contentType: "audio/mpeg",
  chunkSize: 16,
  expectedSize: null,
};

function metadata(objectId: string, size: number): StoredObjectMetadata {
  return {
    objectId,
    fileName: "song.mp3",
    size,
    contentType: "audio/mpeg",
    chunkSize: 16,
    chunkCount: Math.ceil(size / 16),
    createdAt: "2026-01-01T00:00:00.000Z",
    primaryLocation: `s3://test-bucket/${objectId}/data`,
    backupLocation: `memory://backup/${objectId}/`,
  };
}

describe("BackupChannelStore", () => {
  let channel: InMemoryChannel;
  let store: BackupChannelStore;

  beforeEach(() => {
    channel = new InMemoryChannel();
    store = new BackupChannelStore({ transport: channel, keyPrefix: "backup/" });
  });

  async function put(objectId: string, data: Buffer, sequences?: number[]): Promise<void> {
    const count = Math.ceil(data.length / 16);
    for (const seq of sequences ?? [...Array(count).keys()]) {
      const bytes = data.subarray(seq * 16, (seq + 1) * 16);
      await store.putChunk(objectId, { sequenceNumber: seq, offset: seq * 16, length: bytes.length }, bytes);
    }
  }

  async function replicate(objectId: string, data: Buffer): Promise<void> {
    await store.beginUpload(objectId, init);
    await put(objectId, data);
    await store.completeUpload(objectId, metadata(objectId, data.length));
  }

  /** Generation segments present under an object's prefix. */
  function generations(objectId: string): string[] {
    const prefix = `backup/${objectId}/`;
    const found = new Set<string>();
    for (const key of channel.blobs.keys()) {
      if (key.startsWith(prefix) && !key.endsWith("/manifest.json")) {
        found.add(key.slice(prefix.length).split("/")[0]);
      }
    }
    return [...found];
  }

  function chunkKey(objectId: string, sequence: number) {
    const padded = String(sequence).padStart(8, "0");
    return expect.stringMatching(new RegExp(`^backup/${objectId}/[0-9a-f-]{36}/chunks/${padded}$`));
  }

  it("should store each chunk as its own blob and the manifest last", async () => {
    await store.beginUpload("obj-1", init);
    await put("obj-1", patternBytes(40));

    expect([...channel.blobs.keys()].sort()).toEqual([
      chunkKey("obj-1", 0),
      chunkKey("obj-1", 1),
      chunkKey("obj-1", 2),
    ]);
    expect(generations("obj-1")).toHaveLength(1);
    await expect(store.headObject("obj-1")).resolves.toBeNull();

    await store.completeUpload("obj-1", metadata("obj-1", 40));

    expect(channel.blobs.has("backup/obj-1/manifest.json")).toBe(true);
    await expect(store.headObject("obj-1")).resolves.toEqual(metadata("obj-1", 40));
  });

  it("should refuse to seal an upload with missing chunks", async () => {
    await store.beginUpload("obj-1", init);
    await put("obj-1", patternBytes(48), [0, 2]);

    await expect(store.completeUpload("obj-1", metadata("obj-1", 48))).rejects.toMatchObject({
      code: "Backup.IncompleteChunks",
    });
    expect(channel.blobs.has("backup/obj-1/manifest.json")).toBe(false);
  });

  it("should stitch a range across chunk boundaries", async () => {
    const data = patternBytes(100);
    await replicate("obj-1", data);
    channel.reads.length = 0;

    const bytes = await store.getRange("obj-1", 10, 40);

    expect(bytes.equals(data.subarray(10, 41))).toBe(true);
    expect(channel.reads).toEqual([
      chunkKey("obj-1", 0),
      chunkKey("obj-1", 1),
      chunkKey("obj-1", 2),
    ]);
  });

  it("should clamp the end to the object size", async () => {
    const data = patternBytes(20);
    await replicate("obj-1", data);

    const bytes = await store.getRange("obj-1", 18, 500);

    expect([...bytes]).toEqual([18, 19]);
  });

  it("should reject ranges past the end and unknown objects", async () => {
    await replicate("obj-1", patternBytes(20));

    await expect(store.getRange("obj-1", 20, 30)).rejects.toBeInstanceOf(
      RangeNotSatisfiableError,
    );
    await expect(store.getRange("missing", 0, 1)).rejects.toBeInstanceOf(ObjectNotFoundError);
  });

  it("should remove every blob on abort", async () => {
    await store.beginUpload("obj-1", init);
    await put("obj-1", patternBytes(32));

    await store.abortUpload("obj-1");

    expect(channel.blobs.size).toBe(0);
  });

  it("should remove a sealed first upload on abort", async () => {
    await replicate("obj-1", patternBytes(32));
    await store.headObject("obj-1");

    await store.abortUpload("obj-1");

    await expect(store.headObject("obj-1")).resolves.toBeNull();
    expect(channel.blobs.size).toBe(0);
  });

  it("should keep serving the replica while a new upload is staged", async () => {
    const old = patternBytes(32);
    await replicate("obj-1", old);

    await store.beginUpload("obj-1", init);
    await put("obj-1", Buffer.alloc(48, 5), [0, 1]);

    await expect(store.headObject("obj-1")).resolves.toEqual(metadata("obj-1", 32));
    expect((await store.getRange("obj-1", 0, 31)).equals(old)).toBe(true);
    expect(generations("obj-1")).toHaveLength(2);
  });

  it("should keep the replica when a re-upload is aborted", async () => {
    const old = patternBytes(32);
    await replicate("obj-1", old);
    const [kept] = generations("obj-1");

    await store.beginUpload("obj-1", init);
    await put("obj-1", Buffer.alloc(48, 5), [0, 1]);
    await store.abortUpload("obj-1");

    expect(generations("obj-1")).toEqual([kept]);
    expect((await store.getRange("obj-1", 0, 31)).equals(old)).toBe(true);
  });

  it("should swap to a completed re-upload and prune older generations", async () => {
    await replicate("obj-1", patternBytes(32));
    const [first] = generations("obj-1");
    await replicate("obj-1", Buffer.alloc(20, 1));
    const data = Buffer.alloc(40, 2);
    await replicate("obj-1", data);

    await expect(store.headObject("obj-1")).resolves.toEqual(metadata("obj-1", 40));
    expect((await store.getRange("obj-1", 0, 39)).equals(data)).toBe(true);
    expect(generations("obj-1")).toHaveLength(2);
    expect(generations("obj-1")).not.toContain(first);
  });

  it("should roll back to the replaced replica when a sealed re-upload is aborted", async () => {
    const old = patternBytes(32);
    await replicate("obj-1", old);
    const [kept] = generations("obj-1");
    await replicate("obj-1", Buffer.alloc(40, 2));

    await store.abortUpload("obj-1");

    await expect(store.headObject("obj-1")).resolves.toEqual(metadata("obj-1", 32));
    expect(generations("obj-1")).toEqual([kept]);

    const fresh = new BackupChannelStore({ transport: channel, keyPrefix: "backup/" });
    expect((await fresh.getRange("obj-1", 0, 31)).equals(old)).toBe(true);
  });

  it("should prune leftovers of an earlier attempt once an upload completes", async () => {
    channel.blobs.set("backup/obj-1/crashed-attempt/chunks/00000007", Buffer.from("stale"));

    await replicate("obj-1", patternBytes(16));

    expect(channel.blobs.has("backup/obj-1/crashed-attempt/chunks/00000007")).toBe(false);
    expect(generations("obj-1")).toHaveLength(1);
  });

  it("should list only fully replicated objects", async () => {
    await replicate("videos-a", patternBytes(16));
    await store.beginUpload("videos-b", init);
    await put("videos-b", patternBytes(16));
    await replicate("other", patternBytes(16));

    const listed = await store.listObjects("videos-");

    expect(listed.map((m) => m.objectId)).toEqual(["videos-a"]);
  });

  it("should delete an object without touching its neighbours", async () => {
    await replicate("obj-1", patternBytes(16));
    await replicate("obj-10", patternBytes(16));

    await store.deleteObject("obj-1");

    expect([...channel.blobs.keys()].every((key) => key.startsWith("backup/obj-10/"))).toBe(true);
    await expect(store.headObject("obj-10")).resolves.not.toBeNull();
  });

  it("should propagate transport failures", async () => {
    await store.beginUpload("obj-1", init);
    channel.failWith = new DestinationUnavailableError("channel down");

    await expect(
      store.putChunk("obj-1", { sequenceNumber: 0, offset: 0, length: 1 }, Buffer.from("a")),
    ).rejects.toBeInstanceOf(DestinationUnavailableError);
  });

  it("should reject a corrupt manifest", async () => {
    channel.blobs.set("backup/obj-1/manifest.json", Buffer.from("{\"version\":2}"));

    await expect(store.headObject("obj-1")).rejects.toMatchObject({ code: "Metadata.Invalid" });
  });
});
