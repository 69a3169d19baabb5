import { timingSafeEqual } from "crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

function sameKey(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Without a configured API key the service runs open and every caller counts
 * as authenticated.
 */
export function isAuthenticated(req: Request, apiKey: string | null): boolean {
  if (!apiKey) return true;

  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) return false;

  return sameKey(authHeader.substring(7), apiKey);
}

export function createAuthMiddleware(apiKey: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (isAuthenticated(req, apiKey)) {
      next();
      return;
    }

    logger.warn("Authentication failed: missing or invalid API key", {
      path: req.path,
    });
    res.status(401).json({ error: "unauthenticated", message: "Auth required" });
  };
}
