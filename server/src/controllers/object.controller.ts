import { Request, Response } from "express";
import Joi from "joi";
import { pipeline } from "stream/promises";
import { loadConfig } from "../config";
import transferService from "../services/transfer.service";
import { isStreamable } from "../utils/content-type";
import { sendError } from "../utils/http-errors";
import { contentRange, parseRangeHeader, toReadBounds } from "../utils/range-header";
import { contentDisposition } from "../utils/sanitizer";

// Validation schemas
const objectIdSchema = Joi.string().uuid().required();
const listQuerySchema = Joi.object<{ prefix: string }>({
  prefix: Joi.string().max(512).allow("").default(""),
});

const { publicBaseUrl } = loadConfig().server;

function validObjectId(req: Request, res: Response): string | null {
  const { objectId } = req.params;
  const { error } = objectIdSchema.validate(objectId);
  if (error) {
    res.status(400).json({ error: "Invalid objectId format", details: error.message });
    return null;
  }
  return objectId;
}

export async function listObjects(req: Request, res: Response): Promise<void> {
  const result = listQuerySchema.validate(req.query);
  if (result.error) {
    res.status(400).json({ error: "Invalid query", details: result.error.message });
    return;
  }

  try {
    const objects = await transferService.listObjects(result.value.prefix);
    res.status(200).json({ objects });
  } catch (error) {
    sendError(res, error, "Error in listObjects controller");
  }
}

export async function deleteObject(req: Request, res: Response): Promise<void> {
  const objectId = validObjectId(req, res);
  if (!objectId) return;

  try {
    await transferService.deleteObject(objectId);
    res.status(204).end();
  } catch (error) {
    sendError(res, error, "Error in deleteObject controller");
  }
}

/**
 * Serves the object to media players. A single `Range` gets a 206; no Range,
 * or one that does not parse, gets the whole body.
 */
export async function streamObject(req: Request, res: Response): Promise<void> {
  const objectId = validObjectId(req, res);
  if (!objectId) return;

  try {
    const metadata = await transferService.head(objectId);
    const requested = parseRangeHeader(req.headers.range);
    const disposition = isStreamable(metadata.contentType) ? "inline" : "attachment";

    res.setHeader("Accept-Ranges", "bytes");
    res.setHeader("Content-Disposition", contentDisposition(metadata.fileName, disposition));

    if (!requested) {
      const body = await transferService.download(objectId);
      res.status(200);
      res.setHeader("Content-Type", metadata.contentType);
      res.setHeader("Content-Length", metadata.size);
      await pipeline(body, res);
      return;
    }

    const { start, end } = toReadBounds(requested, metadata.size);
    const opened = await transferService.openRange(objectId, start, end);
    res.status(206);
    res.setHeader("Content-Type", opened.contentType);
    res.setHeader("Content-Length", opened.range.end - opened.range.start + 1);
    res.setHeader("Content-Range", contentRange(opened.range.start, opened.range.end, opened.totalSize));
    await pipeline(opened.body, res);
  } catch (error) {
    sendError(res, error, `Error streaming object ${objectId}`);
  }
}

export async function downloadObject(req: Request, res: Response): Promise<void> {
  const objectId = validObjectId(req, res);
  if (!objectId) return;

  try {
    const metadata = await transferService.head(objectId);
    const body = await transferService.download(objectId);
    res.status(200);
    res.setHeader("Content-Type", metadata.contentType);
    res.setHeader("Content-Length", metadata.size);
    res.setHeader("Content-Disposition", contentDisposition(metadata.fileName, "attachment"));
    if (metadata.checksum) {
      res.setHeader("X-Checksum-Sha256", metadata.checksum);
    }
    await pipeline(body, res);
  } catch (error) {
    sendError(res, error, `Error downloading object ${objectId}`);
  }
}

export async function getLink(req: Request, res: Response): Promise<void> {
  const objectId = validObjectId(req, res);
  if (!objectId) return;

  try {
    const link = await transferService.link(objectId);
    res.status(200).json({
      ...link,
      streamUrl: `${publicBaseUrl}/objects/${objectId}/stream`,
    });
  } catch (error) {
    sendError(res, error, `Error creating link for ${objectId}`);
  }
}
