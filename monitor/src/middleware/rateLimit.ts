/**
 * Rate limiting for write endpoints, keyed by client IP
 */

import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";

export interface RateLimitConfig {
  /** Time window in ms (default RATE_LIMIT_WINDOW_MS or 60000) */
  windowMs?: number | undefined;
  /** Requests allowed per window (default RATE_LIMIT_MAX_REQUESTS or 30) */
  maxRequests?: number | undefined;
}

export function createWriteRateLimiter(config: RateLimitConfig = {}) {
  const windowMs = config.windowMs ?? parseInt(process.env.RATE_LIMIT_WINDOW_MS ?? "60000", 10);
  const maxRequests = config.maxRequests ?? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS ?? "30", 10);
  const retryAfter = Math.ceil(windowMs / 1000);

  return rateLimit({
    windowMs,
    limit: maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request): string => {
      // First hop of X-Forwarded-For when behind a reverse proxy
      const forwarded = req.headers["x-forwarded-for"];
      if (typeof forwarded === "string") {
        const firstIp = forwarded.split(",")[0];
        return firstIp ? firstIp.trim() : "unknown";
      }
      return req.ip ?? "unknown";
    },
    handler: (req: Request, res: Response) => {
      console.warn(`[RateLimit] ${req.ip ?? "unknown"} exceeded ${maxRequests} requests per ${retryAfter}s`);
      res.status(429).json({
        error: "Rate limited",
        message: "Too many requests. Please wait before trying again.",
        retryAfter,
      });
    },
  });
}
