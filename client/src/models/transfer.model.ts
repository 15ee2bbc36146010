/** Shapes the server returns and publishes; kept in step with the server models. */

export interface ProgressSnapshot {
  sessionId: string;
  objectId: string;
  direction: "upload" | "download";
  state: "created" | "active" | "completed" | "failed" | "cancelled";
  bytesTransferred: number;
  totalSize: number | null;
  percent: number | null;
  etaSeconds: number | null;
  currentRateBytesPerSec: number;
  startedAt: string;
  updatedAt: string;
}

export interface StoredObjectMetadata {
  objectId: string;
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

export interface UploadResponse {
  sessionId: string;
  object: StoredObjectMetadata;
}

export interface ErrorResponse {
  error: string;
  code?: string;
  retryable?: boolean;
  confirmedOffset?: number;
}

export interface UploadSummary {
  sessionId: string;
  objectId: string;
  size: number;
  sha256: string;
  attempts: number;
  metadata: StoredObjectMetadata;
}
