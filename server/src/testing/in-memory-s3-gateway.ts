import { S3ServiceException } from "@aws-sdk/client-s3";
import type { ByteRange } from "../models/transfer.model";
import type { CompletedPart, S3Gateway } from "../stores/s3-gateway";

type GatewayCall = Exclude<keyof S3Gateway, "bucket">;

interface StoredBody {
  body: Buffer;
  contentType: string;
}

export function s3ServiceError(name: string, status: number): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: status >= 500 ? "server" : "client",
    $metadata: { httpStatusCode: status },
    message: name,
  });
}

/** S3 semantics the primary store relies on, kept in process. */
export class InMemoryS3Gateway implements S3Gateway {
  readonly bucket = "test-bucket";
  readonly objects = new Map<string, StoredBody>();
  readonly multipart = new Map<string, { key: string; parts: Map<number, Buffer> }>();
  readonly abortedUploads: string[] = [];
  /** Errors thrown by the next call of each kind, consumed in order. */
  readonly failures = new Map<GatewayCall, unknown[]>();
  private nextUploadId = 1;

  failNext(call: GatewayCall, error: unknown): void {
    const queue = this.failures.get(call) ?? [];
    queue.push(error);
    this.failures.set(call, queue);
  }

  async createMultipartUpload(key: string): Promise<string> {
    this.maybeFail("createMultipartUpload");
    const uploadId = `upload-${this.nextUploadId++}`;
    this.multipart.set(uploadId, { key, parts: new Map() });
    return uploadId;
  }

  async uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Buffer,
  ): Promise<string> {
    this.maybeFail("uploadPart");
    this.multipartFor(key, uploadId).parts.set(partNumber, Buffer.from(body));
    return `"etag-${partNumber}"`;
  }

  async completeMultipartUpload(
    key: string,
    uploadId: string,
    parts: CompletedPart[],
  ): Promise<void> {
    this.maybeFail("completeMultipartUpload");
    const upload = this.multipartFor(key, uploadId);
    const bodies = parts.map(({ partNumber, etag }) => {
      const part = upload.parts.get(partNumber);
      if (!part || etag !== `"etag-${partNumber}"`) {
        throw s3ServiceError("InvalidPart", 400);
      }
      return part;
    });
    this.multipart.delete(uploadId);
    this.objects.set(key, { body: Buffer.concat(bodies), contentType: "application/octet-stream" });
  }

  async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
    this.maybeFail("abortMultipartUpload");
    this.multipartFor(key, uploadId);
    this.multipart.delete(uploadId);
    this.abortedUploads.push(uploadId);
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    this.maybeFail("putObject");
    this.objects.set(key, { body: Buffer.from(body), contentType });
  }

  async getObject(key: string, range?: ByteRange): Promise<Buffer> {
    this.maybeFail("getObject");
    const stored = this.objects.get(key);
    if (!stored) {
      throw s3ServiceError("NoSuchKey", 404);
    }
    if (!range) {
      return Buffer.from(stored.body);
    }
    if (range.start >= stored.body.length) {
      throw s3ServiceError("InvalidRange", 416);
    }
    return Buffer.from(stored.body.subarray(range.start, range.end + 1));
  }

  async listKeys(prefix: string): Promise<string[]> {
    this.maybeFail("listKeys");
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async deleteObject(key: string): Promise<void> {
    this.maybeFail("deleteObject");
    this.objects.delete(key);
  }

  private multipartFor(key: string, uploadId: string) {
    const upload = this.multipart.get(uploadId);
    if (!upload || upload.key !== key) {
      throw s3ServiceError("NoSuchUpload", 404);
    }
    return upload;
  }

  private maybeFail(call: GatewayCall): void {
    const queue = this.failures.get(call);
    if (queue && queue.length > 0) {
      throw queue.shift();
    }
  }
}
