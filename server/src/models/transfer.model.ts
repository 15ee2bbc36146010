import type { Readable } from "stream";

export type ObjectId = string;

export type TransferDirection = "upload" | "download";

export type SessionState =
  | "created"
  | "active"
  | "completed"
  | "failed"
  | "cancelled";

export type TerminalState = Extract<SessionState, "completed" | "failed" | "cancelled">;

export type DestinationState = "pending" | "active" | "complete" | "failed";

export interface ChunkDescriptor {
  sequenceNumber: number;
  offset: number;
  length: number;
  checksum?: string;
}

export interface Chunk {
  descriptor: ChunkDescriptor;
  bytes: Buffer;
}

/** Anything that yields bytes in order: a Node Readable, an async generator. */
export type ChunkSource = AsyncIterable<Uint8Array | string>;

export interface DestinationStatus {
  destination: string;
  mandatory: boolean;
  state: DestinationState;
  bytesTransferred: number;
  lastChunkAcked: number | null;
  /** End of the contiguous acknowledged prefix. */
  confirmedOffset: number;
  retryCount: number;
  error?: string;
}

export interface ProgressSnapshot {
  sessionId: string;
  objectId: ObjectId;
  direction: TransferDirection;
  state: SessionState;
  bytesTransferred: number;
  totalSize: number | null;
  percent: number | null;
  etaSeconds: number | null;
  currentRateBytesPerSec: number;
  startedAt: string;
  updatedAt: string;
}

export interface StoredObjectMetadata {
  objectId: ObjectId;
  fileName: string;
  size: number;
  contentType: string;
  checksum?: string;
  chunkSize: number;
  chunkCount: number;
  createdAt: string;
  primaryLocation: string;
  backupLocation?: string;
}

export interface UploadInit {
  fileName: string;
  contentType: string;
  chunkSize: number;
  expectedSize: number | null;
}

export type SessionOutcome =
  | { state: "completed"; metadata: StoredObjectMetadata }
  | { state: "failed"; error: Error; confirmedOffset: number }
  | { state: "cancelled"; confirmedOffset: number };

export interface SessionInfo {
  sessionId: string;
  direction: TransferDirection;
  objectId: ObjectId;
  totalSize: number | null;
  chunkSize: number;
  state: SessionState;
  destinations: DestinationStatus[];
  startedAt?: string;
  completedAt?: string;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface TransferConfig {
  chunkSize: number;
  maxInFlightChunks: number;
  retry: RetryPolicy;
  chunkTimeoutMs: number;
  verifyChecksums: boolean;
  maxObjectSize: number;
  progressWindowMs: number;
  progressRetentionMs: number;
  sessionRetentionMs: number;
}

export interface ByteRange {
  start: number;
  end: number;
}

export interface RangeReadResult {
  bytes: Buffer;
  range: ByteRange;
  totalSize: number;
  contentType: string;
  source: "primary" | "backup";
}

export interface OpenedRangeResult {
  range: ByteRange;
  totalSize: number;
  contentType: string;
  body: Readable;
}

export interface TransferEvent {
  event: "transfer_complete" | "transfer_failed" | "transfer_cancelled";
  sessionId: string;
  objectId: ObjectId;
  size?: number;
  checksum?: string;
  confirmedOffset?: number;
  reason?: string;
  timestamp: string;
}
