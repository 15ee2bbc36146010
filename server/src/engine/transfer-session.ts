import { v4 as uuidv4 } from "uuid";
import {
  AlreadyStartedError,
  InvalidStateError,
  toError,
} from "../errors/transfer.errors";
import type {
  ChunkSource,
  ObjectId,
  SessionInfo,
  SessionOutcome,
  SessionState,
  TransferConfig,
  TransferDirection,
} from "../models/transfer.model";
import type { DestinationTarget } from "../stores/remote-store";
import { humanBytes } from "../utils/format";
import logger from "../utils/logger";
import { ChunkStream } from "./chunk-stream";
import type { ProgressTracker } from "./progress-tracker";
import { ReplicationCoordinator } from "./replication-coordinator";

export interface TransferSessionOptions {
  sessionId?: string;
  objectId: ObjectId;
  source: ChunkSource;
  targets: DestinationTarget[];
  config: TransferConfig;
  tracker: ProgressTracker;
  fileName?: string;
  contentType?: string;
  /** Declared size (e.g. Content-Length); null for a live stream. */
  expectedSize?: number | null;
  onSettled?: (outcome: SessionOutcome, session: TransferSession) => void;
}

export function isTerminal(state: SessionState): boolean {
  return state === "completed" || state === "failed" || state === "cancelled";
}

/**
 * One upload, from the first byte read to a terminal state.
 *
 * created → active → completed | failed | cancelled
 */
export class TransferSession {
  readonly sessionId: string;
  readonly objectId: ObjectId;
  readonly direction: TransferDirection = "upload";
  readonly chunkSize: number;

  private state: SessionState = "created";
  private readonly cancellation = new AbortController();
  private readonly coordinator: ReplicationCoordinator;
  private readonly stream: ChunkStream;
  private readonly completion: Promise<SessionOutcome>;
  private readonly resolveCompletion: (outcome: SessionOutcome) => void;
  private readonly expectedSize: number | null;
  private readonly fileName: string;
  private readonly contentType: string;
  private startedAt?: Date;
  private completedAt?: Date;
  private outcome?: SessionOutcome;
  private dispatched = 0;

  constructor(private readonly options: TransferSessionOptions) {
    this.sessionId = options.sessionId ?? uuidv4();
    this.objectId = options.objectId;
    this.chunkSize = options.config.chunkSize;
    this.expectedSize = options.expectedSize ?? null;
    this.fileName = options.fileName ?? options.objectId;
    this.contentType = options.contentType ?? "application/octet-stream";

    this.stream = new ChunkStream(options.source, {
      chunkSize: options.config.chunkSize,
      expectedSize: this.expectedSize,
      maxSize: options.config.maxObjectSize,
      checksums: options.config.verifyChecksums,
    });

    this.coordinator = new ReplicationCoordinator({
      objectId: options.objectId,
      targets: options.targets,
      retry: options.config.retry,
      chunkTimeoutMs: options.config.chunkTimeoutMs,
      signal: this.cancellation.signal,
      onAck: () => {
        options.tracker.record(this.sessionId, this.coordinator.bytesTransferred());
      },
    });

    let resolve: (outcome: SessionOutcome) => void = () => undefined;
    this.completion = new Promise<SessionOutcome>((r) => {
      resolve = r;
    });
    this.resolveCompletion = resolve;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get chunksDispatched(): number {
    return this.dispatched;
  }

  get cancelRequested(): boolean {
    return this.cancellation.signal.aborted;
  }

  info(): SessionInfo {
    return {
      sessionId: this.sessionId,
      direction: this.direction,
      objectId: this.objectId,
      totalSize:
        this.outcome?.state === "completed" ? this.outcome.metadata.size : this.expectedSize,
      chunkSize: this.chunkSize,
      state: this.state,
      destinations: this.coordinator.statuses(),
      ...(this.startedAt && { startedAt: this.startedAt.toISOString() }),
      ...(this.completedAt && { completedAt: this.completedAt.toISOString() }),
    };
  }

  start(): void {
    if (this.state !== "created") {
      throw new AlreadyStartedError(this.sessionId);
    }

    this.state = "active";
    this.startedAt = new Date();
    this.options.tracker.register({
      sessionId: this.sessionId,
      objectId: this.objectId,
      direction: this.direction,
      totalSize: this.expectedSize,
    });
    logger.info(`Upload session started`, {
      sessionId: this.sessionId,
      objectId: this.objectId,
      expectedSize: this.expectedSize,
      chunkSize: humanBytes(this.chunkSize),
      destinations: this.options.targets.map((t) => t.store.name),
    });

    void this.run().then(
      (outcome) => this.settle(outcome),
      (error: unknown) =>
        this.settle({
          state: "failed",
          error: toError(error),
          confirmedOffset: this.coordinator.confirmedOffset(),
        }),
    );
  }

  /**
   * Requests cooperative cancellation. Nothing new is dispatched; chunks
   * already in flight finish or time out and their results are dropped.
   */
  cancel(): void {
    if (isTerminal(this.state)) {
      throw new InvalidStateError(`Session ${this.sessionId} is already ${this.state}`);
    }
    if (this.cancellation.signal.aborted) {
      return;
    }

    this.cancellation.abort();
    logger.info(`Cancellation requested`, {
      sessionId: this.sessionId,
      chunksDispatched: this.dispatched,
    });

    if (this.state === "created") {
      this.stream.close().catch((error: unknown) => {
        logger.warn(`Error closing source of ${this.sessionId}:`, error);
      });
      this.settle({ state: "cancelled", confirmedOffset: 0 });
    }
  }

  awaitCompletion(): Promise<SessionOutcome> {
    return this.completion;
  }

  private async run(): Promise<SessionOutcome> {
    const { signal } = this.cancellation;

    await this.coordinator.begin({
      fileName: this.fileName,
      contentType: this.contentType,
      chunkSize: this.chunkSize,
      expectedSize: this.expectedSize,
    });

    if (!signal.aborted && !this.coordinator.failure) {
      try {
        await this.pump();
      } catch (error) {
        return this.abandon({
          state: "failed",
          error: toError(error),
          confirmedOffset: this.coordinator.confirmedOffset(),
        });
      }
    }

    if (signal.aborted) {
      return this.abandon({
        state: "cancelled",
        confirmedOffset: this.coordinator.confirmedOffset(),
      });
    }

    const failure = this.coordinator.failure;
    if (failure) {
      return this.abandon({
        state: "failed",
        error: failure,
        confirmedOffset: this.coordinator.confirmedOffset(),
      });
    }

    const checksum = this.stream.checksum;
    try {
      const metadata = await this.coordinator.complete({
        objectId: this.objectId,
        fileName: this.fileName,
        size: this.stream.bytesRead,
        contentType: this.contentType,
        ...(checksum ? { checksum } : {}),
        chunkSize: this.chunkSize,
        chunkCount: this.stream.chunksEmitted,
        createdAt: new Date().toISOString(),
      });
      return { state: "completed", metadata };
    } catch (error) {
      return this.abandon({
        state: "failed",
        error: toError(error),
        confirmedOffset: this.coordinator.confirmedOffset(),
      });
    }
  }

  /**
   * Pulls chunks and dispatches them, never holding more than
   * `maxInFlightChunks` in memory. Cancellation and mandatory failures are
   * checked right before each dispatch.
   */
  private async pump(): Promise<void> {
    const { signal } = this.cancellation;
    const maxInFlight = this.options.config.maxInFlightChunks;
    const inFlight = new Set<Promise<void>>();
    const halted = () => signal.aborted || this.coordinator.failure !== undefined;

    try {
      while (!halted()) {
        while (inFlight.size >= maxInFlight) {
          await Promise.race(inFlight);
        }
        if (halted()) {
          break;
        }

        const chunk = await this.stream.next();
        if (!chunk || halted()) {
          break;
        }

        const task: Promise<void> = this.coordinator
          .dispatch(chunk)
          .settled.then(() => {
            inFlight.delete(task);
          });
        inFlight.add(task);
        this.dispatched++;
      }
    } finally {
      await Promise.all(inFlight);
    }
  }

  private async abandon(outcome: SessionOutcome): Promise<SessionOutcome> {
    await this.coordinator.abort();
    try {
      await this.stream.close();
    } catch (error) {
      logger.warn(`Error closing source of ${this.sessionId}:`, error);
    }
    return outcome;
  }

  private settle(outcome: SessionOutcome): void {
    if (this.outcome) {
      return;
    }

    this.outcome = outcome;
    this.state = outcome.state;
    this.completedAt = new Date();
    this.options.tracker.finish(
      this.sessionId,
      outcome.state,
      outcome.state === "completed" ? outcome.metadata.size : undefined,
    );

    if (outcome.state === "completed") {
      logger.info(`Upload session completed`, {
        sessionId: this.sessionId,
        objectId: this.objectId,
        size: humanBytes(outcome.metadata.size),
        chunks: outcome.metadata.chunkCount,
        backup: outcome.metadata.backupLocation !== undefined,
      });
    } else if (outcome.state === "failed") {
      logger.error(`Upload session failed at offset ${outcome.confirmedOffset}:`, outcome.error);
    } else {
      logger.info(`Upload session cancelled`, {
        sessionId: this.sessionId,
        confirmedOffset: outcome.confirmedOffset,
      });
    }

    this.resolveCompletion(outcome);
    this.options.onSettled?.(outcome, this);
  }
}
