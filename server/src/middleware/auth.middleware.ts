import { Request, Response, NextFunction } from "express";
import logger from "../utils/logger";

export type AuthResult = { ok: true } | { ok: false; status: 401 | 500; error: string };

export function checkBearerToken(
  authHeader: string | undefined,
  expectedToken: string | undefined,
): AuthResult {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    logger.warn("Authentication failed: missing or invalid authorization header");
    return { ok: false, status: 401, error: "Unauthorized: missing or invalid authorization header" };
  }

  if (!expectedToken) {
    logger.error("SERVER_API_KEY not configured");
    return { ok: false, status: 500, error: "Server configuration error" };
  }

  const token = authHeader.substring(7); // Remove 'Bearer ' prefix
  if (token !== expectedToken) {
    logger.warn("Authentication failed: invalid API key");
    return { ok: false, status: 401, error: "Unauthorized: invalid API key" };
  }

  return { ok: true };
}

export function createAuthMiddleware(expectedToken: string | undefined) {
  return function authMiddleware(req: Request, res: Response, next: NextFunction): void {
    const result = checkBearerToken(req.headers.authorization, expectedToken);
    if (!result.ok) {
      res.status(result.status).json({ error: result.error });
      return;
    }
    next();
  };
}
