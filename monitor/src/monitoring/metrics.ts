/**
 * Prometheus self-metrics
 *
 * Exposes the monitor's own behaviour (probes, transitions, escalation,
 * relay pipeline) for scraping at GET /metrics.
 */

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";
import type { Request, Response } from "express";
import type { EscalationLevel, TargetState } from "./types.js";
import { ESCALATION_ORDER } from "./types.js";

// Create a custom registry
const register = new Registry();

// Collect default Node.js metrics
collectDefaultMetrics({ register });

// ============================================================================
// CUSTOM METRICS
// ============================================================================

const STATE_VALUES: Record<TargetState, number> = {
  UNKNOWN: 0,
  HEALTHY: 1,
  DEGRADED: 2,
  FAILING: 3,
};

// Probe metrics
const probesTotal = new Counter({
  name: "infrawatch_probes_total",
  help: "Probe executions by result",
  labelNames: ["target", "result"],
  registers: [register],
});

const probeDuration = new Histogram({
  name: "infrawatch_probe_duration_seconds",
  help: "Probe execution time in seconds",
  labelNames: ["target"],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

const targetState = new Gauge({
  name: "infrawatch_target_state",
  help: "Target state (0=unknown, 1=healthy, 2=degraded, 3=failing)",
  labelNames: ["target"],
  registers: [register],
});

const transitionsTotal = new Counter({
  name: "infrawatch_state_transitions_total",
  help: "Target state transitions",
  labelNames: ["target", "from", "to"],
  registers: [register],
});

// Control plane metrics
const escalationLevel = new Gauge({
  name: "infrawatch_escalation_level",
  help: "Escalation level (0=none, 1=warn, 2=retry, 3=escalate, 4=notified)",
  labelNames: ["target"],
  registers: [register],
});

const recoveryAttempts = new Counter({
  name: "infrawatch_recovery_attempts_total",
  help: "Recovery action invocations by result",
  labelNames: ["target", "action", "result"],
  registers: [register],
});

// Relay pipeline metrics
const producerBuffered = new Gauge({
  name: "infrawatch_producer_buffered_records",
  help: "Metric records waiting for broker confirmation",
  registers: [register],
});

const producerPublished = new Counter({
  name: "infrawatch_producer_published_total",
  help: "Metric records confirmed by the broker",
  registers: [register],
});

const producerDropped = new Counter({
  name: "infrawatch_producer_dropped_total",
  help: "Metric records evicted from a full buffer",
  registers: [register],
});

const brokerLost = new Counter({
  name: "infrawatch_broker_lost_total",
  help: "Pending storage messages trimmed from the stream before they were settled",
  registers: [register],
});

const consumerMessages = new Counter({
  name: "infrawatch_consumer_messages_total",
  help: "Storage queue messages by outcome",
  labelNames: ["outcome"],
  registers: [register],
});

// HTTP metrics
const httpRequestsTotal = new Counter({
  name: "infrawatch_http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "path", "status"],
  registers: [register],
});

// ============================================================================
// METRIC RECORDING FUNCTIONS
// ============================================================================

export type ConsumerOutcome = "written" | "duplicate" | "retried" | "dead_lettered" | "invalid";

export const metrics = {
  recordProbe(target: string, success: boolean, latencyMs: number | undefined) {
    probesTotal.labels(target, success ? "success" : "failure").inc();
    if (latencyMs !== undefined) {
      probeDuration.labels(target).observe(latencyMs / 1000);
    }
  },

  setTargetState(target: string, state: TargetState) {
    targetState.labels(target).set(STATE_VALUES[state]);
  },

  recordTransition(target: string, from: TargetState, to: TargetState) {
    transitionsTotal.labels(target, from, to).inc();
  },

  removeTarget(target: string) {
    targetState.remove(target);
    escalationLevel.remove(target);
  },

  setEscalationLevel(target: string, level: EscalationLevel) {
    escalationLevel.labels(target).set(ESCALATION_ORDER.indexOf(level));
  },

  recordRecoveryAttempt(target: string, action: string, success: boolean) {
    recoveryAttempts.labels(target, action, success ? "success" : "failure").inc();
  },

  setProducerBuffered(count: number) {
    producerBuffered.set(count);
  },

  recordPublished() {
    producerPublished.inc();
  },

  recordDropped() {
    producerDropped.inc();
  },

  recordBrokerLost() {
    brokerLost.inc();
  },

  recordConsumerOutcome(outcome: ConsumerOutcome) {
    consumerMessages.labels(outcome).inc();
  },

  recordRequest(method: string, path: string, status: number) {
    httpRequestsTotal.labels(method, path, String(status)).inc();
  },
};

// ============================================================================
// EXPRESS MIDDLEWARE
// ============================================================================

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: () => void) {
  res.on("finish", () => {
    const route: unknown = req.route;
    const path =
      typeof route === "object" && route !== null && "path" in route && typeof route.path === "string"
        ? route.path
        : req.path;
    metrics.recordRequest(req.method, path, res.statusCode);
  });

  next();
}

/**
 * Metrics endpoint handler
 */
export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.set("Content-Type", register.contentType);
  res.end(await register.metrics());
}

export { register };
export default metrics;
