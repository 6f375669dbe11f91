/**
 * API key check for state-changing monitoring endpoints
 *
 * Accepts `Authorization: Bearer <key>` or `x-api-key: <key>`. Without a
 * configured key, requests pass outside production and are refused in it.
 */

import { createHash, timingSafeEqual } from "crypto";
import type { NextFunction, Request, Response } from "express";

export interface AuthConfig {
  /** Expected key (default MONITOR_API_KEY) */
  apiKey?: string | undefined;
  /** Let requests through when no key is configured outside production */
  allowSkipInDev?: boolean | undefined;
  /** Defaults to NODE_ENV === "production" */
  production?: boolean | undefined;
}

export function createAuthMiddleware(config: AuthConfig = {}) {
  const apiKey = config.apiKey ?? process.env.MONITOR_API_KEY;
  const allowSkipInDev = config.allowSkipInDev ?? true;
  const production = config.production ?? process.env.NODE_ENV === "production";

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      if (!production && allowSkipInDev) {
        console.warn(`[Auth] MONITOR_API_KEY not configured - auth skipped for ${req.method} ${req.path}`);
        next();
        return;
      }
      console.error("[Auth] MONITOR_API_KEY not configured - rejecting request");
      res.status(503).json({
        error: "Service unavailable",
        message: "API authentication not configured",
      });
      return;
    }

    const provided = extractKey(req);
    if (!provided) {
      res.status(401).json({
        error: "Unauthorized",
        message: "Missing API key. Provide via Authorization: Bearer <key> or x-api-key header",
      });
      return;
    }

    if (!keysMatch(provided, apiKey)) {
      res.status(403).json({ error: "Forbidden", message: "Invalid API key" });
      return;
    }

    next();
  };
}

function extractKey(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice("Bearer ".length);
  }
  const header = req.headers["x-api-key"];
  return typeof header === "string" ? header : undefined;
}

/**
 * Constant-time comparison over fixed-length digests
 */
function keysMatch(provided: string, expected: string): boolean {
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}
