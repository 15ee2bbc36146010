import axios, { AxiosError } from "axios";
import type { ErrorResponse } from "../models/transfer.model";

/** Exponential backoff: base, 2×base, 4×base, … capped at `maxMs`. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * Math.pow(2, attempt - 1));
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status !== 501);
}

/**
 * Network failures, transient server statuses and errors the server marks
 * `retryable` (an object still held by an earlier session) are retried.
 * Other client errors, cancellations and local failures (missing file,
 * checksum mismatch) are not.
 */
export function isRetryableUploadError(error: unknown): boolean {
  if (!axios.isAxiosError<ErrorResponse>(error)) {
    return false;
  }
  if (error.code === AxiosError.ERR_CANCELED) {
    return false;
  }
  if (!error.response) {
    return true;
  }
  if (error.response.data?.retryable === true) {
    return true;
  }
  return isRetryableStatus(error.response.status);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
