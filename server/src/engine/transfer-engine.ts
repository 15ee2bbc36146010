import { Readable } from "stream";
import { v4 as uuidv4 } from "uuid";
import {
  InvalidStateError,
  ObjectBusyError,
  ObjectNotFoundError,
  ObjectTooLargeError,
  TransferError,
  toError,
} from "../errors/transfer.errors";
import type {
  ChunkSource,
  ObjectId,
  OpenedRangeResult,
  ProgressSnapshot,
  RangeReadResult,
  SessionInfo,
  SessionOutcome,
  StoredObjectMetadata,
  TransferConfig,
} from "../models/transfer.model";
import type { DestinationTarget, RemoteStoreAdapter } from "../stores/remote-store";
import logger from "../utils/logger";
import { ProgressTracker } from "./progress-tracker";
import { RangeServer } from "./range-server";
import { TransferSession } from "./transfer-session";

export interface TransferEngineOptions {
  primary: RemoteStoreAdapter;
  backup?: RemoteStoreAdapter;
  /** A failing backup fails the upload instead of being dropped. */
  backupMandatory?: boolean;
  config: TransferConfig;
  tracker?: ProgressTracker;
  now?: () => number;
}

export interface UploadOptions {
  fileName?: string;
  contentType?: string;
  expectedSize?: number | null;
  sessionId?: string;
}

export type SettledListener = (
  outcome: SessionOutcome,
  session: { sessionId: string; objectId: ObjectId },
) => void;

interface SessionRecord {
  session: TransferSession;
  settledAt?: number;
}

export class SessionNotFoundError extends InvalidStateError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, "Session.NotFound");
    this.name = "SessionNotFoundError";
    Object.setPrototypeOf(this, SessionNotFoundError.prototype);
  }
}

/**
 * Entry point for uploads, reads and object management over one primary
 * store and an optional backup.
 */
export class TransferEngine {
  readonly tracker: ProgressTracker;
  readonly ranges: RangeServer;
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly settledListeners = new Set<SettledListener>();
  private readonly now: () => number;

  constructor(private readonly options: TransferEngineOptions) {
    const { config } = options;
    this.now = options.now ?? Date.now;
    this.tracker =
      options.tracker ??
      new ProgressTracker({
        rateWindowMs: config.progressWindowMs,
        retentionMs: config.progressRetentionMs,
        now: options.now,
      });
    this.ranges = new RangeServer({
      primary: options.primary,
      backup: options.backup,
      retry: config.retry,
      timeoutMs: config.chunkTimeoutMs,
      defaultWindowSize: config.chunkSize,
    });
  }

  get activeSessions(): number {
    let active = 0;
    for (const record of this.sessions.values()) {
      if (record.settledAt === undefined) {
        active++;
      }
    }
    return active;
  }

  createObjectId(): ObjectId {
    return uuidv4();
  }

  /** Default fan-out: the primary (always mandatory) and the backup, if any. */
  destinations(): DestinationTarget[] {
    const targets: DestinationTarget[] = [{ store: this.options.primary, mandatory: true }];
    if (this.options.backup) {
      targets.push({ store: this.options.backup, mandatory: this.options.backupMandatory ?? false });
    }
    return targets;
  }

  /**
   * Starts an upload and returns its session id right away. The outcome is
   * available through `awaitCompletion` and `progress`.
   */
  upload(
    objectId: ObjectId,
    source: ChunkSource,
    destinations?: DestinationTarget[],
    options: UploadOptions = {},
  ): string {
    this.purgeSettled();

    const { maxObjectSize } = this.options.config;
    const expectedSize = options.expectedSize ?? null;
    if (expectedSize !== null && expectedSize > maxObjectSize) {
      throw new ObjectTooLargeError(maxObjectSize);
    }

    const writer = this.writerOf(objectId);
    if (writer) {
      throw new ObjectBusyError(objectId, writer);
    }

    const targets = (destinations ?? this.destinations()).map((target) =>
      target.store.kind === "primary" ? { ...target, mandatory: true } : target,
    );

    const session = new TransferSession({
      sessionId: options.sessionId,
      objectId,
      source,
      targets,
      config: this.options.config,
      tracker: this.tracker,
      fileName: options.fileName,
      contentType: options.contentType,
      expectedSize,
      onSettled: (outcome, settled) => this.onSessionSettled(outcome, settled),
    });
    if (this.sessions.has(session.sessionId)) {
      throw new InvalidStateError(`Session ${session.sessionId} already exists`, "Session.AlreadyStarted");
    }

    this.sessions.set(session.sessionId, { session });
    session.start();
    return session.sessionId;
  }

  cancel(sessionId: string): void {
    this.record(sessionId).session.cancel();
  }

  awaitCompletion(sessionId: string): Promise<SessionOutcome> {
    return this.record(sessionId).session.awaitCompletion();
  }

  session(sessionId: string): SessionInfo | null {
    return this.sessions.get(sessionId)?.session.info() ?? null;
  }

  /** Forgets a finished session. Returns false while it is still running. */
  release(sessionId: string): boolean {
    const record = this.sessions.get(sessionId);
    if (!record || record.settledAt === undefined) {
      return false;
    }
    this.sessions.delete(sessionId);
    this.tracker.remove(sessionId);
    return true;
  }

  progress(sessionId: string): ProgressSnapshot | null {
    return this.tracker.snapshot(sessionId) ?? null;
  }

  onSettled(listener: SettledListener): () => void {
    this.settledListeners.add(listener);
    return () => {
      this.settledListeners.delete(listener);
    };
  }

  head(objectId: ObjectId): Promise<StoredObjectMetadata> {
    return this.ranges.metadata(objectId);
  }

  streamRange(objectId: ObjectId, start: number, end?: number): Promise<RangeReadResult> {
    return this.ranges.read(objectId, start, end);
  }

  async openRange(objectId: ObjectId, start: number, end?: number): Promise<OpenedRangeResult> {
    const { range, totalSize, contentType, body } = await this.ranges.open(objectId, start, end);
    return { range, totalSize, contentType, body };
  }

  /** Whole object as a sequential stream, read one window at a time. */
  async download(objectId: ObjectId): Promise<Readable> {
    const metadata = await this.ranges.metadata(objectId);
    if (metadata.size === 0) {
      return Readable.from([]);
    }
    const opened = await this.ranges.open(objectId, 0);
    return opened.body;
  }

  async listObjects(prefix: string = ""): Promise<StoredObjectMetadata[]> {
    try {
      return await this.options.primary.listObjects(prefix);
    } catch (error) {
      const { backup } = this.options;
      if (!backup || (error instanceof TransferError && error.permanent)) {
        logger.error("Error listing objects:", error);
        throw error;
      }
      logger.warn("Primary listing failed, listing replicated objects on backup", {
        prefix,
        error: toError(error).message,
      });
      return backup.listObjects(prefix);
    }
  }

  async deleteObject(objectId: ObjectId): Promise<void> {
    const { primary, backup } = this.options;
    const metadata = await primary.headObject(objectId);
    if (!metadata) {
      throw new ObjectNotFoundError(objectId);
    }

    await primary.deleteObject(objectId);
    this.ranges.invalidate(objectId);

    if (backup) {
      try {
        await backup.deleteObject(objectId);
      } catch (error) {
        logger.warn(`Failed to delete ${objectId} from ${backup.name}:`, error);
      }
    }
    logger.info(`Object deleted`, { objectId, fileName: metadata.fileName });
  }

  /** Cancels every running session and waits for them to settle. */
  async shutdown(): Promise<void> {
    const running = [...this.sessions.values()].filter(
      (record) => record.settledAt === undefined,
    );
    for (const { session } of running) {
      session.cancel();
    }
    await Promise.all(running.map(({ session }) => session.awaitCompletion()));
    this.tracker.stopSweeper();
  }

  /** Drops settled sessions older than the retention period. */
  purgeSettled(): number {
    const cutoff = this.now() - this.options.config.sessionRetentionMs;
    let purged = 0;
    for (const [sessionId, record] of this.sessions) {
      if (record.settledAt !== undefined && record.settledAt <= cutoff) {
        this.sessions.delete(sessionId);
        purged++;
      }
    }
    return purged;
  }

  /** Session still writing `objectId`, if any. Stores keep one upload per object. */
  private writerOf(objectId: ObjectId): string | undefined {
    for (const [sessionId, record] of this.sessions) {
      if (record.settledAt === undefined && record.session.objectId === objectId) {
        return sessionId;
      }
    }
    return undefined;
  }

  private record(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    return record;
  }

  private onSessionSettled(outcome: SessionOutcome, session: TransferSession): void {
    const record = this.sessions.get(session.sessionId);
    if (record) {
      record.settledAt = this.now();
    }
    if (outcome.state === "completed") {
      this.ranges.invalidate(session.objectId);
    }

    for (const listener of this.settledListeners) {
      try {
        listener(outcome, { sessionId: session.sessionId, objectId: session.objectId });
      } catch (error) {
        logger.error("Error in settled listener:", error);
      }
    }
  }
}
