import type {
  ObjectId,
  ProgressSnapshot,
  SessionState,
  TerminalState,
  TransferDirection,
} from "../models/transfer.model";
import logger from "../utils/logger";

export interface ProgressTrackerOptions {
  /** Trailing window the transfer rate is computed over. */
  rateWindowMs: number;
  /** How long a terminal entry survives if nobody reads it. */
  retentionMs: number;
  /** How long a terminal entry stays readable after its first read. */
  observedGraceMs?: number;
  now?: () => number;
}

export interface ProgressRegistration {
  sessionId: string;
  objectId: ObjectId;
  direction: TransferDirection;
  totalSize: number | null;
}

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

interface Sample {
  at: number;
  bytes: number;
}

interface ProgressEntry {
  registration: ProgressRegistration;
  state: SessionState;
  totalSize: number | null;
  bytesTransferred: number;
  samples: Sample[];
  startedAt: number;
  terminalAt?: number;
  observedAt?: number;
  published: ProgressSnapshot;
}

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

/**
 * Process-wide registry of transfer progress, keyed by session id.
 *
 * Each entry has a single writer (its session). Writers build a new frozen
 * snapshot and swap it in; readers only ever see a whole snapshot.
 */
export class ProgressTracker {
  private readonly entries = new Map<string, ProgressEntry>();
  private readonly listeners = new Set<ProgressListener>();
  private readonly rateWindowMs: number;
  private readonly retentionMs: number;
  private readonly observedGraceMs: number;
  private readonly now: () => number;
  private sweeper?: NodeJS.Timeout;

  constructor(options: ProgressTrackerOptions) {
    this.rateWindowMs = options.rateWindowMs;
    this.retentionMs = options.retentionMs;
    this.observedGraceMs = options.observedGraceMs ?? 5_000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  register(registration: ProgressRegistration): ProgressSnapshot {
    const at = this.now();
    const entry: ProgressEntry = {
      registration,
      state: "active",
      totalSize: registration.totalSize,
      bytesTransferred: 0,
      samples: [{ at, bytes: 0 }],
      startedAt: at,
      published: EMPTY_SNAPSHOT,
    };
    this.entries.set(registration.sessionId, entry);
    return this.publish(entry, at);
  }

  /**
   * Records the bytes confirmed so far. Values lower than the last recorded
   * one are ignored so polled progress never goes backwards.
   */
  record(sessionId: string, bytesTransferred: number): void {
    const entry = this.entries.get(sessionId);
    if (!entry || entry.terminalAt !== undefined) {
      return;
    }
    if (bytesTransferred <= entry.bytesTransferred) {
      return;
    }

    const at = this.now();
    entry.bytesTransferred = bytesTransferred;
    entry.samples.push({ at, bytes: bytesTransferred });
    this.trimSamples(entry, at);
    this.publish(entry, at);
  }

  finish(sessionId: string, state: TerminalState, totalSize?: number): void {
    const entry = this.entries.get(sessionId);
    if (!entry || entry.terminalAt !== undefined) {
      return;
    }

    const at = this.now();
    entry.state = state;
    entry.terminalAt = at;
    if (totalSize !== undefined) {
      entry.totalSize = totalSize;
    }
    this.publish(entry, at);
  }

  /**
   * Latest published snapshot. The first read of a terminal snapshot counts
   * as the caller observing the outcome; the entry stays readable for a
   * short grace period after that, then is dropped.
   */
  snapshot(sessionId: string): ProgressSnapshot | undefined {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return undefined;
    }
    if (TERMINAL_STATES.has(entry.published.state)) {
      const at = this.now();
      if (entry.observedAt === undefined) {
        entry.observedAt = at;
      } else if (at - entry.observedAt >= this.observedGraceMs) {
        this.entries.delete(sessionId);
        return undefined;
      }
    }
    return entry.published;
  }

  /** Reads without counting as an observation. */
  peek(sessionId: string): ProgressSnapshot | undefined {
    return this.entries.get(sessionId)?.published;
  }

  remove(sessionId: string): boolean {
    return this.entries.delete(sessionId);
  }

  /** Drops terminal entries past the retention TTL or their observed grace. */
  sweep(): number {
    const at = this.now();
    const cutoff = at - this.retentionMs;
    const observedCutoff = at - this.observedGraceMs;
    let removed = 0;
    for (const [sessionId, entry] of this.entries) {
      const expired =
        (entry.terminalAt !== undefined && entry.terminalAt <= cutoff) ||
        (entry.observedAt !== undefined && entry.observedAt <= observedCutoff);
      if (expired) {
        this.entries.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  startSweeper(intervalMs: number = 60_000): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  private trimSamples(entry: ProgressEntry, at: number): void {
    const windowStart = at - this.rateWindowMs;
    // keep one sample at or before the window start as the baseline
    while (entry.samples.length > 2 && entry.samples[1].at <= windowStart) {
      entry.samples.shift();
    }
  }

  private publish(entry: ProgressEntry, at: number): ProgressSnapshot {
    const { registration, totalSize, bytesTransferred } = entry;
    const rate = this.currentRate(entry);
    const remaining = totalSize === null ? null : Math.max(0, totalSize - bytesTransferred);

    const snapshot: ProgressSnapshot = Object.freeze({
      sessionId: registration.sessionId,
      objectId: registration.objectId,
      direction: registration.direction,
      state: entry.state,
      bytesTransferred,
      totalSize,
      percent: percentOf(bytesTransferred, totalSize),
      etaSeconds:
        remaining === null
          ? null
          : remaining === 0
            ? 0
            : rate > 0
              ? Math.ceil(remaining / rate)
              : null,
      currentRateBytesPerSec: rate,
      startedAt: new Date(entry.startedAt).toISOString(),
      updatedAt: new Date(at).toISOString(),
    });

    entry.published = snapshot;
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.warn(`Progress listener failed for ${snapshot.sessionId}:`, error);
      }
    }
    return snapshot;
  }

  private currentRate(entry: ProgressEntry): number {
    const first = entry.samples[0];
    const last = entry.samples[entry.samples.length - 1];
    const elapsedMs = last.at - first.at;
    if (elapsedMs <= 0) {
      return 0;
    }
    return Math.round(((last.bytes - first.bytes) * 1000) / elapsedMs);
  }
}

function percentOf(bytes: number, totalSize: number | null): number | null {
  if (totalSize === null) {
    return null;
  }
  if (totalSize === 0) {
    return 100;
  }
  return Math.min(100, Math.round((bytes / totalSize) * 1000) / 10);
}

const EMPTY_SNAPSHOT: ProgressSnapshot = Object.freeze({
  sessionId: "",
  objectId: "",
  direction: "upload",
  state: "created",
  bytesTransferred: 0,
  totalSize: null,
  percent: null,
  etaSeconds: null,
  currentRateBytesPerSec: 0,
  startedAt: new Date(0).toISOString(),
  updatedAt: new Date(0).toISOString(),
});
