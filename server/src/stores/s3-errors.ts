import { S3ServiceException } from "@aws-sdk/client-s3";
import {
  DestinationUnavailableError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  TransferError,
  toError,
} from "../errors/transfer.errors";

export interface S3ErrorContext {
  destination: string;
  objectId: string;
  /** Start of the requested range, for range reads. */
  start?: number;
}

const NOT_FOUND = new Set(["NoSuchKey", "NotFound", "NoSuchUpload"]);

const TRANSIENT = new Set([
  "InternalError",
  "ServiceUnavailable",
  "SlowDown",
  "RequestTimeout",
  "RequestTimeTooSkewed",
  "ThrottlingException",
  "TooManyRequestsException",
]);

/**
 * Translates an S3 SDK failure into the transfer error taxonomy. Anything
 * that is not an S3 service response (socket resets, DNS, aborted
 * requests) is treated as the store being unreachable.
 */
export function mapS3Error(error: unknown, context: S3ErrorContext): TransferError {
  if (error instanceof TransferError) {
    return error;
  }

  if (!(error instanceof S3ServiceException)) {
    return new DestinationUnavailableError(
      `${context.destination} unreachable: ${toError(error).message}`,
      { destination: context.destination, cause: error },
    );
  }

  const status = error.$metadata.httpStatusCode ?? 0;

  if (NOT_FOUND.has(error.name) || status === 404) {
    return new ObjectNotFoundError(context.objectId);
  }
  if (error.name === "InvalidRange" || status === 416) {
    return new RangeNotSatisfiableError(context.start ?? 0);
  }
  if (
    TRANSIENT.has(error.name) ||
    error.$fault === "server" ||
    status >= 500 ||
    status === 429
  ) {
    return new DestinationUnavailableError(
      `${context.destination} returned ${error.name} (${status}): ${error.message}`,
      { destination: context.destination, cause: error },
    );
  }

  return new TransferError(
    `${context.destination} rejected the request: ${error.name}: ${error.message}`,
    `S3.${error.name}`,
    { cause: error },
  );
}
