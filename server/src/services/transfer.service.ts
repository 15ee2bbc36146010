import type { Readable } from "stream";
import { loadConfig } from "../config";
import { TransferEngine } from "../engine/transfer-engine";
import { toTransferEvent } from "../engine/transfer-events";
import { InvalidStateError } from "../errors/transfer.errors";
import type {
  ObjectId,
  OpenedRangeResult,
  ProgressSnapshot,
  SessionInfo,
  SessionOutcome,
  StoredObjectMetadata,
} from "../models/transfer.model";
import { humanBytes } from "../utils/format";
import logger from "../utils/logger";
import brokerService from "./broker.service";
import storageService from "./storage.service";

export interface UploadRequest {
  objectId?: ObjectId;
  sessionId?: string;
  fileName: string;
  contentType: string;
  expectedSize: number | null;
}

export interface UploadResult {
  sessionId: string;
  objectId: ObjectId;
  outcome: SessionOutcome;
}

export interface ObjectLink {
  objectId: ObjectId;
  fileName: string;
  size: number;
  contentType: string;
  presignedUrl: string;
  expiresIn: number;
}

/**
 * Owns the process-wide transfer engine and forwards its progress and
 * outcomes to the broker.
 */
class TransferService {
  readonly engine: TransferEngine;

  constructor() {
    const config = loadConfig();
    this.engine = new TransferEngine({
      primary: storageService.primary,
      backup: storageService.backup,
      backupMandatory: storageService.backupMandatory,
      config: config.transfer,
    });

    this.engine.tracker.subscribe((snapshot) => {
      brokerService.publishProgress(snapshot).catch((error) => {
        logger.warn(`Dropped progress update for ${snapshot.sessionId}:`, error);
      });
    });
    this.engine.onSettled((outcome, session) => {
      brokerService.publishEvent(toTransferEvent(outcome, session)).catch((error) => {
        logger.warn(`Dropped ${outcome.state} event for ${session.sessionId}:`, error);
      });
    });

    logger.info("TransferService initialized", {
      chunkSize: humanBytes(config.transfer.chunkSize),
      maxInFlightChunks: config.transfer.maxInFlightChunks,
      destinations: this.engine.destinations().map(({ store, mandatory }) =>
        mandatory ? store.name : `${store.name} (best effort)`,
      ),
    });
  }

  start(): void {
    this.engine.tracker.startSweeper();
  }

  get activeSessions(): number {
    return this.engine.activeSessions;
  }

  /**
   * Runs an upload to completion. Aborting `signal` (the client went away)
   * cancels the session.
   */
  async upload(source: Readable, request: UploadRequest, signal?: AbortSignal): Promise<UploadResult> {
    const objectId = request.objectId ?? this.engine.createObjectId();
    const sessionId = this.engine.upload(objectId, source, undefined, {
      sessionId: request.sessionId,
      fileName: request.fileName,
      contentType: request.contentType,
      expectedSize: request.expectedSize,
    });
    logger.info(`Upload started`, {
      sessionId,
      objectId,
      fileName: request.fileName,
      size: request.expectedSize === null ? "unknown" : humanBytes(request.expectedSize),
    });

    const onAbort = () => this.cancelQuietly(sessionId);
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const outcome = await this.engine.awaitCompletion(sessionId);
      this.logOutcome(sessionId, objectId, outcome);
      return { sessionId, objectId, outcome };
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  progress(sessionId: string): ProgressSnapshot | null {
    return this.engine.progress(sessionId);
  }

  session(sessionId: string): SessionInfo | null {
    return this.engine.session(sessionId);
  }

  cancel(sessionId: string): void {
    this.engine.cancel(sessionId);
    logger.info(`Cancellation requested for session ${sessionId}`);
  }

  async listObjects(prefix?: string): Promise<StoredObjectMetadata[]> {
    return this.engine.listObjects(prefix);
  }

  async head(objectId: ObjectId): Promise<StoredObjectMetadata> {
    return this.engine.head(objectId);
  }

  async openRange(objectId: ObjectId, start: number, end?: number): Promise<OpenedRangeResult> {
    return this.engine.openRange(objectId, start, end);
  }

  async download(objectId: ObjectId): Promise<Readable> {
    return this.engine.download(objectId);
  }

  async deleteObject(objectId: ObjectId): Promise<void> {
    try {
      await this.engine.deleteObject(objectId);
    } catch (error) {
      logger.error(`Error deleting object ${objectId}:`, error);
      throw error;
    }
  }

  async link(objectId: ObjectId): Promise<ObjectLink> {
    const metadata = await this.engine.head(objectId);
    const expiresIn = storageService.linkExpirySeconds;
    const presignedUrl = await storageService.generatePresignedGetUrl(
      objectId,
      metadata.fileName,
      expiresIn,
    );
    return {
      objectId,
      fileName: metadata.fileName,
      size: metadata.size,
      contentType: metadata.contentType,
      presignedUrl,
      expiresIn,
    };
  }

  async shutdown(): Promise<void> {
    const active = this.engine.activeSessions;
    if (active > 0) {
      logger.info(`Cancelling ${active} active session(s)`);
    }
    await this.engine.shutdown();
  }

  private cancelQuietly(sessionId: string): void {
    try {
      this.engine.cancel(sessionId);
      logger.warn(`Client disconnected, cancelled session ${sessionId}`);
    } catch (error) {
      if (!(error instanceof InvalidStateError)) {
        throw error;
      }
    }
  }

  private logOutcome(sessionId: string, objectId: ObjectId, outcome: SessionOutcome): void {
    switch (outcome.state) {
      case "completed":
        logger.info(`Upload complete`, {
          sessionId,
          objectId,
          size: humanBytes(outcome.metadata.size),
          chunks: outcome.metadata.chunkCount,
          backup: outcome.metadata.backupLocation ?? "none",
        });
        break;
      case "failed":
        logger.error(`Upload failed at offset ${outcome.confirmedOffset}:`, outcome.error);
        break;
      case "cancelled":
        logger.warn(`Upload cancelled`, {
          sessionId,
          objectId,
          confirmedOffset: outcome.confirmedOffset,
        });
        break;
    }
  }
}

export default new TransferService();
