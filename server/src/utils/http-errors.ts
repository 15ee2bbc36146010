import type { Response } from "express";
import {
  ChunkPutError,
  DestinationUnavailableError,
  InvalidStateError,
  ObjectBusyError,
  ObjectNotFoundError,
  ObjectTooLargeError,
  RangeNotSatisfiableError,
  ShortReadError,
  TransferCancelledError,
  TransferError,
  toError,
} from "../errors/transfer.errors";
import logger from "./logger";
import { unsatisfiedRange } from "./range-header";

/** Non-standard, as used by nginx: the client closed the request. */
export const CLIENT_CLOSED_REQUEST = 499;

export function httpStatusFor(error: unknown): number {
  if (error instanceof RangeNotSatisfiableError) return 416;
  if (error instanceof ObjectNotFoundError) return 404;
  if (error instanceof InvalidStateError) {
    return error.code === "Session.NotFound" ? 404 : 409;
  }
  if (error instanceof ObjectBusyError) return 409;
  if (error instanceof ObjectTooLargeError) return 413;
  if (error instanceof ShortReadError) return 400;
  if (error instanceof TransferCancelledError) return CLIENT_CLOSED_REQUEST;
  if (error instanceof DestinationUnavailableError) return 503;
  if (error instanceof ChunkPutError) return 502;
  return 500;
}

export interface ErrorBody {
  error: string;
  code?: string;
  retryable?: boolean;
}

/** Response body for an error; internals of unknown errors stay in the logs. */
export function errorBody(error: unknown): ErrorBody {
  if (error instanceof TransferError) {
    return { error: error.message, code: error.code, retryable: error.retryable };
  }
  return { error: "Internal server error" };
}

/** Writes the error response, or tears the connection down mid-body. */
export function sendError(res: Response, error: unknown, context: string): void {
  const status = httpStatusFor(error);
  if (status >= 500) {
    logger.error(`${context}:`, error);
  } else {
    logger.warn(`${context}: ${toError(error).message}`);
  }

  if (res.headersSent) {
    res.destroy(toError(error));
    return;
  }
  if (error instanceof RangeNotSatisfiableError && error.totalSize !== undefined) {
    res.setHeader("Content-Range", unsatisfiedRange(error.totalSize));
  }
  res.status(status).json(errorBody(error));
}
