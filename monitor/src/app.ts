/**
 * HTTP surface: status query, operational endpoints, self-metrics
 */

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import { createAuthMiddleware, type AuthConfig } from "./middleware/auth.js";
import { createWriteRateLimiter, type RateLimitConfig } from "./middleware/rateLimit.js";
import type { AlertNotifier } from "./monitoring/AlertNotifier.js";
import type { ControlPlane } from "./monitoring/ControlPlane.js";
import { metricsHandler, metricsMiddleware } from "./monitoring/metrics.js";
import type { StatusAggregator } from "./monitoring/StatusAggregator.js";
import type { ConsumerStatus } from "./pipeline/MetricsConsumer.js";
import type { ProducerStatus } from "./pipeline/MetricsProducer.js";
import type { ScrapeFeed } from "./pipeline/ScrapeFeed.js";

export interface AppDeps {
  aggregator: Pick<StatusAggregator, "toMonitorResponse" | "snapshot" | "allCriticalHealthy">;
  controlPlane?: Pick<ControlPlane, "getAllRecords" | "getRecoveryHistory"> | undefined;
  alerts?: Pick<AlertNotifier, "getHistory" | "getUnacknowledged" | "acknowledge"> | undefined;
  producer?: { getStatus(): ProducerStatus } | undefined;
  consumer?: { getStatus(): ConsumerStatus } | undefined;
  scrapeFeed?: Pick<ScrapeFeed, "render" | "getStatus"> | undefined;
  auth?: AuthConfig | undefined;
  rateLimit?: RateLimitConfig | undefined;
}

const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
};

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const authMiddleware = createAuthMiddleware(deps.auth);
  const writeRateLimiter = createWriteRateLimiter(deps.rateLimit);

  app.use(cors());
  app.use(express.json());
  app.use(metricsMiddleware);

  // ============================================================================
  // STATUS QUERY
  // ============================================================================

  // Flat target -> "ok" | "ko" | "unknown" map plus all_critical_ok; never waits on a probe
  app.get("/monitor", (req: Request, res: Response) => {
    const detailed = req.query.format === "state";
    res.json(deps.aggregator.toMonitorResponse(detailed));
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: deps.aggregator.allCriticalHealthy() ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/metrics", asyncHandler(metricsHandler));

  app.get("/scrape", (_req: Request, res: Response) => {
    if (!deps.scrapeFeed) {
      res.status(503).json({ error: "Scrape feed not enabled" });
      return;
    }
    res.set("Content-Type", "text/plain; version=0.0.4");
    res.send(deps.scrapeFeed.render());
  });

  // ============================================================================
  // MONITORING ENDPOINTS
  // ============================================================================

  app.get("/monitoring/status", (_req: Request, res: Response) => {
    res.json(deps.aggregator.snapshot());
  });

  app.get("/monitoring/escalations", (req: Request, res: Response) => {
    if (!deps.controlPlane) {
      res.status(503).json({ error: "Control plane not initialized" });
      return;
    }
    const target = queryString(req.query.target);
    res.json({
      timestamp: new Date().toISOString(),
      escalations: deps.controlPlane.getAllRecords(),
      recoveryAttempts: deps.controlPlane.getRecoveryHistory(target),
    });
  });

  app.get("/monitoring/alerts", (req: Request, res: Response) => {
    if (!deps.alerts) {
      res.status(503).json({ error: "Alert notifier not initialized" });
      return;
    }

    const limitParam = queryString(req.query.limit);
    const parsed = limitParam ? parseInt(limitParam, 10) : NaN;
    const limit = Number.isInteger(parsed) && parsed > 0 ? parsed : 50;

    const alerts = deps.alerts.getHistory(limit);
    res.json({
      timestamp: new Date().toISOString(),
      totalAlerts: alerts.length,
      unacknowledgedCount: deps.alerts.getUnacknowledged().length,
      alerts,
    });
  });

  app.post(
    "/monitoring/alerts/:id/acknowledge",
    writeRateLimiter,
    authMiddleware,
    (req: Request, res: Response) => {
      if (!deps.alerts) {
        res.status(503).json({ error: "Alert notifier not initialized" });
        return;
      }

      const alertId = req.params.id;
      if (!alertId) {
        res.status(400).json({ error: "Missing alert ID" });
        return;
      }

      if (deps.alerts.acknowledge(alertId)) {
        res.json({ status: "acknowledged", alertId, timestamp: new Date().toISOString() });
      } else {
        res.status(404).json({ error: "Alert not found", alertId });
      }
    }
  );

  app.get("/monitoring/pipeline", (_req: Request, res: Response) => {
    const producer = deps.producer?.getStatus();
    const consumer = deps.consumer?.getStatus();
    res.json({
      timestamp: new Date().toISOString(),
      pipelineDegraded: Boolean(producer?.degraded) || Boolean(consumer?.degraded),
      producer: producer ?? null,
      consumer: consumer ?? null,
      scrape: deps.scrapeFeed?.getStatus() ?? null,
    });
  });

  // ============================================================================
  // ERROR HANDLER
  // ============================================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[Server] Request failed:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err.message,
    });
  });

  return app;
}
