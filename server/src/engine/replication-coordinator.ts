import {
  ChunkPutError,
  InvalidStateError,
  toError,
} from "../errors/transfer.errors";
import type {
  Chunk,
  ChunkDescriptor,
  DestinationStatus,
  ObjectId,
  RetryPolicy,
  StoredObjectMetadata,
  UploadInit,
} from "../models/transfer.model";
import type { DestinationTarget, RemoteStoreAdapter } from "../stores/remote-store";
import logger from "../utils/logger";
import { withRetry } from "./retry";

export type ChunkOutcomeKind = "acked" | "failed" | "skipped" | "discarded";

export interface ChunkOutcome {
  destination: string;
  sequenceNumber: number;
  outcome: ChunkOutcomeKind;
  error?: Error;
}

export interface ChunkDispatch {
  descriptor: ChunkDescriptor;
  /** One entry per destination; these promises never reject. */
  results: Map<string, Promise<ChunkOutcome>>;
  /** Resolves once every destination has resolved and the buffer is released. */
  settled: Promise<ChunkOutcome[]>;
}

export interface ReplicationOptions {
  objectId: ObjectId;
  targets: DestinationTarget[];
  retry: RetryPolicy;
  chunkTimeoutMs: number;
  /** Session cancellation. */
  signal: AbortSignal;
  onAck?: (status: DestinationStatus) => void;
}

export type CompletionBase = Omit<StoredObjectMetadata, "primaryLocation" | "backupLocation">;

/**
 * Per-destination state machine. Acks may arrive out of order; the
 * contiguous prefix (`lastChunkAcked`, `confirmedOffset`) only advances
 * once every lower sequence number has been acked.
 */
class DestinationLane {
  readonly store: RemoteStoreAdapter;
  readonly mandatory: boolean;
  private readonly status: DestinationStatus;
  private readonly outOfOrder = new Map<number, number>();
  private nextExpected = 0;

  constructor(target: DestinationTarget) {
    this.store = target.store;
    this.mandatory = target.mandatory;
    this.status = {
      destination: target.store.name,
      mandatory: target.mandatory,
      state: "pending",
      bytesTransferred: 0,
      lastChunkAcked: null,
      confirmedOffset: 0,
      retryCount: 0,
    };
  }

  get name(): string {
    return this.status.destination;
  }

  get state(): DestinationStatus["state"] {
    return this.status.state;
  }

  get confirmedOffset(): number {
    return this.status.confirmedOffset;
  }

  get bytesTransferred(): number {
    return this.status.bytesTransferred;
  }

  activate(): void {
    if (this.status.state === "pending") {
      this.status.state = "active";
    }
  }

  ack(descriptor: ChunkDescriptor): void {
    this.status.bytesTransferred += descriptor.length;
    this.outOfOrder.set(descriptor.sequenceNumber, descriptor.offset + descriptor.length);

    let end = this.outOfOrder.get(this.nextExpected);
    while (end !== undefined) {
      this.outOfOrder.delete(this.nextExpected);
      this.status.lastChunkAcked = this.nextExpected;
      this.status.confirmedOffset = end;
      this.nextExpected++;
      end = this.outOfOrder.get(this.nextExpected);
    }
  }

  recordRetry(): void {
    this.status.retryCount++;
  }

  complete(): void {
    this.status.state = "complete";
  }

  fail(error: Error): void {
    this.status.state = "failed";
    this.status.error = error.message;
  }

  snapshot(): DestinationStatus {
    return { ...this.status };
  }
}

/**
 * Fans each chunk out to every destination of one upload. Destinations
 * never wait on each other: a failing backup does not delay the primary.
 */
export class ReplicationCoordinator {
  private readonly lanes: DestinationLane[];
  private readonly window = new Map<number, Buffer>();
  private mandatoryFailure?: ChunkPutError;

  constructor(private readonly options: ReplicationOptions) {
    if (!options.targets.some((target) => target.mandatory)) {
      throw new InvalidStateError("At least one destination must be mandatory");
    }
    this.lanes = options.targets.map((target) => new DestinationLane(target));
  }

  /** Chunks whose bytes are still held for some destination. */
  get bufferedChunks(): number {
    return this.window.size;
  }

  get failure(): ChunkPutError | undefined {
    return this.mandatoryFailure;
  }

  statuses(): DestinationStatus[] {
    return this.lanes.map((lane) => lane.snapshot());
  }

  /** Contiguous bytes every mandatory destination has confirmed. */
  confirmedOffset(): number {
    return Math.min(
      ...this.lanes.filter((lane) => lane.mandatory).map((lane) => lane.confirmedOffset),
    );
  }

  bytesTransferred(): number {
    return Math.min(
      ...this.lanes.filter((lane) => lane.mandatory).map((lane) => lane.bytesTransferred),
    );
  }

  async begin(init: UploadInit): Promise<void> {
    await Promise.all(
      this.lanes.map(async (lane) => {
        try {
          await this.retrying(lane, () =>
            lane.store.beginUpload(this.options.objectId, init),
          );
          lane.activate();
        } catch (error) {
          if (!this.options.signal.aborted) {
            this.failLane(lane, error, undefined);
          }
        }
      }),
    );
  }

  dispatch(chunk: Chunk): ChunkDispatch {
    const { descriptor } = chunk;
    this.window.set(descriptor.sequenceNumber, chunk.bytes);

    const results = new Map<string, Promise<ChunkOutcome>>();
    for (const lane of this.lanes) {
      results.set(lane.name, this.putToLane(lane, descriptor));
    }

    const settled = Promise.all(results.values()).then((outcomes) => {
      this.window.delete(descriptor.sequenceNumber);
      return outcomes;
    });

    return { descriptor, results, settled };
  }

  /**
   * Seals every healthy destination. Secondary destinations go first so the
   * primary's metadata can name them; a secondary that fails to seal is
   * dropped from the metadata unless it is mandatory.
   */
  async complete(base: CompletionBase): Promise<StoredObjectMetadata> {
    const healthy = this.lanes.filter((lane) => lane.state === "active");
    const primaries = healthy.filter((lane) => lane.store.kind === "primary");
    const secondaries = healthy.filter((lane) => lane.store.kind !== "primary");
    const primary = primaries[0] ?? healthy.find((lane) => lane.mandatory);
    if (!primary) {
      throw new InvalidStateError("No healthy mandatory destination to complete");
    }

    const backup = secondaries.find((lane) => lane !== primary);
    const metadata: StoredObjectMetadata = {
      ...base,
      primaryLocation: primary.store.location(this.options.objectId),
      ...(backup && { backupLocation: backup.store.location(this.options.objectId) }),
    };

    for (const lane of secondaries) {
      if (lane === primary) {
        continue;
      }
      await this.completeLane(lane, metadata);
      if (lane === backup && lane.state === "failed") {
        delete metadata.backupLocation;
      }
    }

    if (this.mandatoryFailure) {
      throw this.mandatoryFailure;
    }

    for (const lane of primaries.length > 0 ? primaries : [primary]) {
      await this.completeLane(lane, metadata);
    }

    if (this.mandatoryFailure) {
      throw this.mandatoryFailure;
    }

    // partial writes left on best-effort destinations that dropped out
    await this.abortLanes(this.lanes.filter((lane) => lane.state === "failed"));
    return metadata;
  }

  /** Abandons the upload on every destination; errors are logged only. */
  async abort(): Promise<void> {
    await this.abortLanes(this.lanes);
    this.window.clear();
  }

  private async abortLanes(lanes: DestinationLane[]): Promise<void> {
    await Promise.all(
      lanes.map(async (lane) => {
        try {
          await lane.store.abortUpload(this.options.objectId);
        } catch (error) {
          logger.warn(`Failed to abort upload on ${lane.name}:`, error);
        }
      }),
    );
  }

  private async completeLane(lane: DestinationLane, metadata: StoredObjectMetadata): Promise<void> {
    try {
      await this.retrying(lane, () =>
        lane.store.completeUpload(this.options.objectId, metadata),
      );
      lane.complete();
    } catch (error) {
      this.failLane(lane, error, undefined);
    }
  }

  private async putToLane(
    lane: DestinationLane,
    descriptor: ChunkDescriptor,
  ): Promise<ChunkOutcome> {
    const outcome = (kind: ChunkOutcomeKind, error?: Error): ChunkOutcome => ({
      destination: lane.name,
      sequenceNumber: descriptor.sequenceNumber,
      outcome: kind,
      ...(error && { error }),
    });

    if (lane.state !== "active") {
      return outcome("skipped");
    }

    try {
      await this.retrying(
        lane,
        (signal) => {
          const bytes = this.window.get(descriptor.sequenceNumber);
          if (!bytes) {
            throw new InvalidStateError(
              `Chunk ${descriptor.sequenceNumber} is no longer buffered`,
            );
          }
          return lane.store.putChunk(this.options.objectId, descriptor, bytes, signal);
        },
        descriptor.sequenceNumber,
      );
    } catch (error) {
      if (this.options.signal.aborted) {
        return outcome("discarded");
      }
      const failure = this.failLane(lane, error, descriptor.sequenceNumber);
      return outcome("failed", failure);
    }

    if (this.options.signal.aborted || lane.state !== "active") {
      return outcome("discarded");
    }

    lane.ack(descriptor);
    this.options.onAck?.(lane.snapshot());
    return outcome("acked");
  }

  private async retrying<T>(
    lane: DestinationLane,
    operation: (signal: AbortSignal) => Promise<T>,
    sequenceNumber?: number,
  ): Promise<T> {
    let attempts = 0;
    try {
      return await withRetry(
        (signal, attempt) => {
          attempts = attempt;
          return operation(signal);
        },
        {
          ...this.options.retry,
          timeoutMs: this.options.chunkTimeoutMs,
          signal: this.options.signal,
          onRetry: (attempt, error, delayMs) => {
            lane.recordRetry();
            logger.warn(
              `Retrying ${sequenceNumber === undefined ? "upload call" : `chunk ${sequenceNumber}`} on ${lane.name} in ${delayMs}ms`,
              {
                objectId: this.options.objectId,
                attempt,
                error: toError(error).message,
              },
            );
          },
        },
      );
    } catch (error) {
      if (this.options.signal.aborted) {
        throw error;
      }
      throw new ChunkPutError(
        `${lane.name} failed ${sequenceNumber === undefined ? "the upload" : `chunk ${sequenceNumber}`} after ${attempts} attempt(s): ${toError(error).message}`,
        {
          destination: lane.name,
          sequenceNumber,
          attempts,
          confirmedOffset: lane.confirmedOffset,
          cause: error,
        },
      );
    }
  }

  private failLane(
    lane: DestinationLane,
    error: unknown,
    sequenceNumber: number | undefined,
  ): ChunkPutError {
    const failure =
      error instanceof ChunkPutError
        ? error
        : new ChunkPutError(toError(error).message, {
            destination: lane.name,
            sequenceNumber,
            attempts: 0,
            confirmedOffset: lane.confirmedOffset,
            cause: error,
          });

    if (lane.state === "failed") {
      return failure;
    }
    lane.fail(failure);

    if (lane.mandatory) {
      this.mandatoryFailure ??= failure;
      logger.error(`Mandatory destination ${lane.name} failed:`, failure);
    } else {
      logger.warn(`Best-effort destination ${lane.name} failed, continuing without it`, {
        objectId: this.options.objectId,
        error: failure.message,
      });
    }
    return failure;
  }
}
