import Joi from "joi";
import { TransferError } from "../errors/transfer.errors";
import type { StoredObjectMetadata } from "./transfer.model";

export const storedObjectMetadataSchema = Joi.object<StoredObjectMetadata>({
  objectId: Joi.string().required(),
  fileName: Joi.string().required(),
  size: Joi.number().integer().min(0).required(),
  contentType: Joi.string().required(),
  checksum: Joi.string().hex().length(64),
  chunkSize: Joi.number().integer().min(1).required(),
  chunkCount: Joi.number().integer().min(0).required(),
  createdAt: Joi.string().isoDate().required(),
  primaryLocation: Joi.string().required(),
  backupLocation: Joi.string(),
}).unknown(false);

/** Parses a stored metadata document, rejecting anything malformed. */
export function parseStoredMetadata(raw: string | Buffer, source: string): StoredObjectMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString());
  } catch (error) {
    throw new TransferError(`Metadata at ${source} is not valid JSON`, "Metadata.Invalid", {
      cause: error,
    });
  }

  const result = storedObjectMetadataSchema.validate(parsed, { convert: false });
  if (result.error) {
    throw new TransferError(
      `Metadata at ${source} is invalid: ${result.error.message}`,
      "Metadata.Invalid",
      { cause: result.error },
    );
  }
  return result.value;
}

export function serializeMetadata(metadata: StoredObjectMetadata): Buffer {
  return Buffer.from(JSON.stringify(metadata, null, 2));
}
