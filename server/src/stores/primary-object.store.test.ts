import { describe, it, expect, beforeEach } from "vitest";
import { PrimaryObjectStore } from "./primary-object.store";
import {
  DestinationUnavailableError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
} from "../errors/transfer.errors";
import type { StoredObjectMetadata, UploadInit } from "../models/transfer.model";
import { InMemoryS3Gateway, s3ServiceError } from "../testing/in-memory-s3-gateway";
import { patternBytes } from "../testing/sources";

const init: UploadInit = {
  fileName: "clip.mp4",
  contentType: "video/mp4",
  chunkSize: 16,
  expectedSize: null,
};

function metadata(objectId: string, size: number): StoredObjectMetadata {
  return {
    objectId,
    fileName: "clip.mp4",
    size,
    contentType: "video/mp4",
    chunkSize: 16,
    chunkCount: Math.ceil(size / 16),
    createdAt: "2026-01-01T00:00:00.000Z",
    primaryLocation: `s3://test-bucket/uploads/${objectId}/data`,
  };
}

describe("PrimaryObjectStore", () => {
  let gateway: InMemoryS3Gateway;
  let store: PrimaryObjectStore;

  beforeEach(() => {
    gateway = new InMemoryS3Gateway();
    store = new PrimaryObjectStore({ gateway, keyPrefix: "uploads/" });
  });

  async function upload(objectId: string, data: Buffer): Promise<void> {
    await store.beginUpload(objectId, init);
    for (let offset = 0, seq = 0; offset < data.length; offset += 16, seq++) {
      const bytes = data.subarray(offset, offset + 16);
      await store.putChunk(objectId, { sequenceNumber: seq, offset, length: bytes.length }, bytes);
    }
    await store.completeUpload(objectId, metadata(objectId, data.length));
  }

  describe("uploads", () => {
    it("should assemble parts in sequence order whatever order they arrive in", async () => {
      const data = patternBytes(40);
      await store.beginUpload("obj-1", init);
      await store.putChunk("obj-1", { sequenceNumber: 2, offset: 32, length: 8 }, data.subarray(32));
      await store.putChunk("obj-1", { sequenceNumber: 0, offset: 0, length: 16 }, data.subarray(0, 16));
      await store.putChunk("obj-1", { sequenceNumber: 1, offset: 16, length: 16 }, data.subarray(16, 32));
      await store.completeUpload("obj-1", metadata("obj-1", 40));

      expect(gateway.objects.get("uploads/obj-1/data")?.body.equals(data)).toBe(true);
      expect(gateway.multipart.size).toBe(0);
    });

    it("should write metadata beside the data", async () => {
      await upload("obj-1", patternBytes(20));

      expect(store.location("obj-1")).toBe("s3://test-bucket/uploads/obj-1/data");
      expect(gateway.objects.get("uploads/obj-1/metadata.json")?.contentType).toBe(
        "application/json",
      );
      await expect(store.headObject("obj-1")).resolves.toEqual(metadata("obj-1", 20));
    });

    it("should store an empty object with a single put", async () => {
      await upload("empty", Buffer.alloc(0));

      expect(gateway.abortedUploads).toEqual(["upload-1"]);
      expect(gateway.objects.get("uploads/empty/data")).toEqual({
        body: Buffer.alloc(0),
        contentType: "video/mp4",
      });
    });

    it("should abort a multipart upload", async () => {
      await store.beginUpload("obj-1", init);
      await store.putChunk("obj-1", { sequenceNumber: 0, offset: 0, length: 4 }, Buffer.from("abcd"));

      await store.abortUpload("obj-1");
      await store.abortUpload("obj-1");

      expect(gateway.abortedUploads).toEqual(["upload-1"]);
      expect(gateway.objects.has("uploads/obj-1/data")).toBe(false);
    });

    it("should retry only the metadata write after the data was committed", async () => {
      const data = patternBytes(40);
      await store.beginUpload("obj-1", init);
      for (let seq = 0; seq < 3; seq++) {
        const bytes = data.subarray(seq * 16, (seq + 1) * 16);
        await store.putChunk("obj-1", { sequenceNumber: seq, offset: seq * 16, length: bytes.length }, bytes);
      }
      gateway.failNext("putObject", s3ServiceError("SlowDown", 503));

      await expect(store.completeUpload("obj-1", metadata("obj-1", 40))).rejects.toBeInstanceOf(
        DestinationUnavailableError,
      );
      expect(gateway.multipart.size).toBe(0);

      await store.completeUpload("obj-1", metadata("obj-1", 40));

      expect(gateway.objects.get("uploads/obj-1/data")?.body.equals(data)).toBe(true);
      await expect(store.headObject("obj-1")).resolves.toEqual(metadata("obj-1", 40));
    });

    it("should remove committed data when the upload is abandoned before its metadata", async () => {
      await upload("obj-1", patternBytes(20));
      await store.beginUpload("obj-1", init);
      await store.putChunk("obj-1", { sequenceNumber: 0, offset: 0, length: 4 }, Buffer.from("abcd"));
      gateway.failNext("putObject", s3ServiceError("SlowDown", 503));
      await expect(store.completeUpload("obj-1", metadata("obj-1", 4))).rejects.toBeInstanceOf(
        DestinationUnavailableError,
      );

      await store.abortUpload("obj-1");

      expect(gateway.objects.has("uploads/obj-1/data")).toBe(false);
      await expect(store.headObject("obj-1")).resolves.toBeNull();
    });

    it("should map throttling to a retryable error", async () => {
      await store.beginUpload("obj-1", init);
      gateway.failNext("uploadPart", s3ServiceError("SlowDown", 503));

      await expect(
        store.putChunk("obj-1", { sequenceNumber: 0, offset: 0, length: 4 }, Buffer.from("abcd")),
      ).rejects.toBeInstanceOf(DestinationUnavailableError);
    });

    it("should refuse chunks for an upload that was never begun", async () => {
      await expect(
        store.putChunk("obj-1", { sequenceNumber: 0, offset: 0, length: 1 }, Buffer.from("a")),
      ).rejects.toMatchObject({ code: "Upload.NotFound" });
    });
  });

  describe("reads", () => {
    it("should read an inclusive byte range", async () => {
      const data = patternBytes(100);
      await upload("obj-1", data);

      const bytes = await store.getRange("obj-1", 10, 19);

      expect(bytes.equals(data.subarray(10, 20))).toBe(true);
    });

    it("should reject a start beyond the object", async () => {
      await upload("obj-1", patternBytes(100));

      await expect(store.getRange("obj-1", 100, 120)).rejects.toMatchObject({
        code: "Range.NotSatisfiable",
        start: 100,
      });
      await expect(store.getRange("obj-1", 100, 120)).rejects.toBeInstanceOf(
        RangeNotSatisfiableError,
      );
    });

    it("should report unknown objects", async () => {
      await expect(store.getRange("missing", 0, 1)).rejects.toBeInstanceOf(ObjectNotFoundError);
      await expect(store.headObject("missing")).resolves.toBeNull();
    });

    it("should reject malformed metadata", async () => {
      await gateway.putObject("uploads/bad/metadata.json", Buffer.from("{\"size\":-1}"), "application/json");

      await expect(store.headObject("bad")).rejects.toMatchObject({ code: "Metadata.Invalid" });
    });
  });

  describe("listing and deletion", () => {
    it("should list completed objects under a prefix", async () => {
      await upload("videos-a", patternBytes(16));
      await upload("videos-b", patternBytes(32));
      await upload("docs-a", patternBytes(8));
      await store.beginUpload("videos-pending", init);
      await gateway.putObject("uploads/videos-bad/metadata.json", Buffer.from("nope"), "application/json");

      const listed = await store.listObjects("videos-");

      expect(listed.map((m) => [m.objectId, m.size])).toEqual([
        ["videos-a", 16],
        ["videos-b", 32],
      ]);
    });

    it("should delete data and metadata", async () => {
      await upload("obj-1", patternBytes(16));

      await store.deleteObject("obj-1");

      expect([...gateway.objects.keys()]).toEqual([]);
      await expect(store.headObject("obj-1")).resolves.toBeNull();
    });
  });
});
