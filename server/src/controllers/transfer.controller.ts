import { Request, Response } from "express";
import Joi from "joi";
import transferService from "../services/transfer.service";
import { contentTypeFor, DEFAULT_CONTENT_TYPE } from "../utils/content-type";
import { CLIENT_CLOSED_REQUEST, errorBody, httpStatusFor, sendError } from "../utils/http-errors";
import { sanitizeFileName } from "../utils/sanitizer";

interface UploadHeaders {
  "x-file-name": string;
  "content-type"?: string;
  "content-length"?: number;
  "x-object-id"?: string;
  "x-session-id"?: string;
}

// Validation schemas
const uploadHeadersSchema = Joi.object<UploadHeaders>({
  "x-file-name": Joi.string().max(1024).required(),
  "content-type": Joi.string().max(255),
  "content-length": Joi.number().integer().min(0),
  "x-object-id": Joi.string().uuid(),
  "x-session-id": Joi.string().uuid(),
}).unknown(true);

const sessionIdSchema = Joi.string().uuid().required();

/** Clients percent-encode names that are not plain ASCII. */
function decodeFileName(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function resolveContentType(declared: string | undefined, fileName: string): string {
  const mediaType = declared?.split(";")[0].trim().toLowerCase();
  if (!mediaType || mediaType === DEFAULT_CONTENT_TYPE) {
    return contentTypeFor(fileName);
  }
  return mediaType;
}

export async function upload(req: Request, res: Response): Promise<void> {
  const result = uploadHeadersSchema.validate(req.headers);
  if (result.error) {
    res.status(400).json({ error: "Invalid upload headers", details: result.error.message });
    return;
  }
  const headers = result.value;

  const fileName = sanitizeFileName(decodeFileName(headers["x-file-name"]));
  const disconnected = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      disconnected.abort();
    }
  });

  try {
    const { sessionId, objectId, outcome } = await transferService.upload(
      req,
      {
        objectId: headers["x-object-id"],
        sessionId: headers["x-session-id"],
        fileName,
        contentType: resolveContentType(headers["content-type"], fileName),
        expectedSize: headers["content-length"] ?? null,
      },
      disconnected.signal,
    );

    switch (outcome.state) {
      case "completed":
        res.status(201).json({ sessionId, object: outcome.metadata });
        return;
      case "cancelled":
        res.status(CLIENT_CLOSED_REQUEST).json({
          error: "Upload cancelled",
          sessionId,
          objectId,
          confirmedOffset: outcome.confirmedOffset,
        });
        return;
      case "failed":
        res.status(httpStatusFor(outcome.error)).json({
          ...errorBody(outcome.error),
          sessionId,
          objectId,
          confirmedOffset: outcome.confirmedOffset,
        });
        return;
    }
  } catch (error) {
    sendError(res, error, "Error in upload controller");
  }
}

export async function getProgress(req: Request, res: Response): Promise<void> {
  const { sessionId } = req.params;

  const { error } = sessionIdSchema.validate(sessionId);
  if (error) {
    res.status(400).json({ error: "Invalid sessionId format", details: error.message });
    return;
  }

  const snapshot = transferService.progress(sessionId);
  if (!snapshot) {
    res.status(404).json({ error: "Session not found" });
    return;
  }
  res.status(200).json(snapshot);
}

export async function cancelSession(req: Request, res: Response): Promise<void> {
  const { sessionId } = req.params;

  const { error } = sessionIdSchema.validate(sessionId);
  if (error) {
    res.status(400).json({ error: "Invalid sessionId format", details: error.message });
    return;
  }

  try {
    transferService.cancel(sessionId);
    res.status(202).json({ sessionId, state: "cancelling" });
  } catch (err) {
    sendError(res, err, "Error in cancelSession controller");
  }
}

export async function healthCheck(req: Request, res: Response): Promise<void> {
  res.status(200).json({
    status: "healthy",
    activeSessions: transferService.activeSessions,
    timestamp: new Date().toISOString(),
  });
}
