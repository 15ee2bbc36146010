import fs from "fs";
import path from "path";
import axios, { AxiosInstance } from "axios";
import type { Readable } from "stream";
import { pipeline } from "stream/promises";
import { v4 as uuidv4 } from "uuid";
import { ClientConfig, loadClientConfig } from "../config";
import type {
  ErrorResponse,
  StoredObjectMetadata,
  UploadResponse,
  UploadSummary,
} from "../models/transfer.model";
import { humanBytes } from "../utils/format";
import { HashingStream } from "../utils/hashing-stream";
import logger from "../utils/logger";
import { backoffDelay, isRetryableUploadError, sleep } from "../utils/retry";
import type { ProgressCallback, ProgressSource } from "./broker.service";

export class ChecksumMismatchError extends Error {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Checksum mismatch: expected ${expected}, got ${actual}`);
    this.name = "ChecksumMismatchError";
  }
}

export interface UploadOptions {
  /** Push progress from the server, if a source is available. */
  progress?: { source: ProgressSource; callback: ProgressCallback };
  /** Local bytes handed to the socket so far. */
  onBytesSent?: (bytes: number) => void;
  signal?: AbortSignal;
}

export interface DownloadSummary {
  objectId: string;
  destination: string;
  size: number;
  sha256: string;
  verified: boolean;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError<ErrorResponse>(error) && error.response) {
    const body = error.response.data;
    return `${error.response.status} ${body.error ?? error.message}`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Talks to the transfer server's HTTP API: streamed uploads with retry and
 * checksum verification, downloads, listing and deletes.
 */
export class TransferService {
  private readonly api: AxiosInstance;

  constructor(
    private readonly config: ClientConfig = loadClientConfig(),
    api?: AxiosInstance,
  ) {
    this.api =
      api ??
      axios.create({
        baseURL: config.serverUrl,
        headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {},
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      });
  }

  async upload(filePath: string, options: UploadOptions = {}): Promise<UploadSummary> {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      throw new Error(`Not a file: ${filePath}`);
    }

    // One object id for every attempt, so a retry replaces rather than duplicates
    const objectId = uuidv4();
    const { maxRetries, baseDelayMs, maxDelayMs } = this.config;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const sessionId = uuidv4();
      logger.debug(`Upload attempt ${attempt}/${maxRetries}`, { objectId, sessionId });

      const stopWatching = options.progress
        ? await options.progress.source.watch(sessionId, options.progress.callback)
        : undefined;
      try {
        const result = await this.uploadOnce(filePath, stats.size, objectId, sessionId, options);
        return { ...result, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (!isRetryableUploadError(error) || attempt === maxRetries) {
          break;
        }
        const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
        logger.warn(`Upload attempt ${attempt} failed: ${describeError(error)}`);
        logger.info(`Retrying in ${delay}ms...`);
        await sleep(delay);
      } finally {
        if (stopWatching) {
          await stopWatching();
        }
      }
    }

    logger.error(`Upload of ${filePath} failed: ${describeError(lastError)}`);
    throw lastError;
  }

  async download(
    objectId: string,
    destination: string,
    signal?: AbortSignal,
  ): Promise<DownloadSummary> {
    const response = await this.api.get<Readable>(`/objects/${objectId}/download`, {
      responseType: "stream",
      signal,
    });

    const hasher = new HashingStream();
    await pipeline(response.data, hasher, fs.createWriteStream(destination));

    const sha256 = hasher.sha256 ?? "";
    const expected = response.headers["x-checksum-sha256"];
    if (typeof expected === "string" && expected !== sha256) {
      throw new ChecksumMismatchError(expected, sha256);
    }

    logger.info(`Downloaded ${objectId} to ${destination} (${humanBytes(hasher.bytesSeen)})`);
    return {
      objectId,
      destination,
      size: hasher.bytesSeen,
      sha256,
      verified: typeof expected === "string",
    };
  }

  async list(prefix: string = ""): Promise<StoredObjectMetadata[]> {
    const response = await this.api.get<{ objects: StoredObjectMetadata[] }>("/objects", {
      params: prefix ? { prefix } : {},
    });
    return response.data.objects;
  }

  async remove(objectId: string): Promise<void> {
    await this.api.delete(`/objects/${objectId}`);
    logger.info(`Deleted ${objectId}`);
  }

  private async uploadOnce(
    filePath: string,
    size: number,
    objectId: string,
    sessionId: string,
    options: UploadOptions,
  ): Promise<Omit<UploadSummary, "attempts">> {
    const hasher = new HashingStream(options.onBytesSent);
    const file = fs.createReadStream(filePath);
    file.on("error", (error) => hasher.destroy(error));
    file.pipe(hasher);

    try {
      logger.debug(`Uploading ${humanBytes(size)} with streaming hash calculation...`);
      const response = await this.api.post<UploadResponse>("/uploads", hasher, {
        headers: {
          "Content-Type": "application/octet-stream",
          "Content-Length": size,
          "X-File-Name": encodeURIComponent(path.basename(filePath)),
          "X-Object-Id": objectId,
          "X-Session-Id": sessionId,
        },
        signal: options.signal,
      });

      const sha256 = hasher.sha256;
      if (sha256 === undefined) {
        throw new Error("Server answered before the upload stream finished");
      }
      const metadata = response.data.object;
      if (metadata.checksum === undefined) {
        logger.warn("Server did not return a checksum, skipping verification");
      } else if (metadata.checksum !== sha256) {
        throw new ChecksumMismatchError(sha256, metadata.checksum);
      }

      logger.debug(`Upload complete. SHA256: ${sha256}`);
      return { sessionId: response.data.sessionId, objectId, size, sha256, metadata };
    } finally {
      file.destroy();
    }
  }
}

export default new TransferService();
