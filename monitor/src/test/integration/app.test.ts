/**
 * HTTP surface tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../../app.js";
import { AlertNotifier } from "../../monitoring/AlertNotifier.js";
import { ControlPlane } from "../../monitoring/ControlPlane.js";
import { Scheduler } from "../../monitoring/Scheduler.js";
import { StatusAggregator } from "../../monitoring/StatusAggregator.js";
import { createMetricRecord } from "../../pipeline/MetricRecord.js";
import type { ProducerStatus } from "../../pipeline/MetricsProducer.js";
import { ScrapeFeed } from "../../pipeline/ScrapeFeed.js";
import { FakeProbe } from "../fakes/FakeProbe.js";
import { InMemoryBroker } from "../fakes/InMemoryBroker.js";
import { RecordingAction } from "../fakes/recording.js";
import { registryOf, tcpDefinition } from "../fakes/targets.js";
import { TEST_API_KEY } from "../setup.js";

describe("monitor API", () => {
  let scheduler: Scheduler;
  let aggregator: StatusAggregator;
  let controlPlane: ControlPlane;
  let alerts: AlertNotifier;
  let app: Express;

  async function poll(name: string, times: number): Promise<void> {
    const target = scheduler.getRegistry().get(name);
    if (!target) throw new Error(`missing target ${name}`);
    for (let i = 0; i < times; i++) {
      await scheduler.pollOnce(target);
    }
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    const registry = registryOf(
      tcpDefinition("vpn", { critical: true }),
      tcpDefinition("nas", { critical: true }),
      tcpDefinition("grafana")
    );
    const probe = new FakeProbe();
    probe.script("nas", false, false, false);
    scheduler = new Scheduler({ registry, probe });
    aggregator = new StatusAggregator(scheduler);
    alerts = new AlertNotifier({ channels: ["log"], cooldownMs: 300000, maxHistory: 100 });
    controlPlane = new ControlPlane({
      registry,
      status: aggregator,
      actions: new Map([["nas", new RecordingAction(false)]]),
      notifier: alerts,
      gracePeriodMs: 60000,
    });
    scheduler.onTransition(controlPlane.listener());

    await poll("vpn", 2);
    await poll("nas", 3);
    await controlPlane.idle();
    await controlPlane.stop();

    app = createApp({ aggregator, controlPlane, alerts, auth: { apiKey: TEST_API_KEY } });
  });

  describe("GET /monitor", () => {
    it("should return the flat status map", async () => {
      const response = await request(app).get("/monitor");

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ vpn: "ok", nas: "ko", grafana: "unknown", all_critical_ok: false });
    });

    it("should return state names with format=state", async () => {
      const response = await request(app).get("/monitor?format=state");

      expect(response.body).toEqual({ vpn: "HEALTHY", nas: "FAILING", grafana: "UNKNOWN", all_critical_ok: false });
    });
  });

  it("should report degraded health while a critical target is down", async () => {
    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
  });

  it("should return the detailed snapshot", async () => {
    const response = await request(app).get("/monitoring/status");

    expect(response.body.allCriticalOk).toBe(false);
    expect(response.body.targets.nas).toMatchObject({ state: "FAILING", consecutiveFailures: 3 });
  });

  it("should expose self-metrics", async () => {
    const response = await request(app).get("/metrics");

    expect(response.status).toBe(200);
    expect(response.text).toContain('infrawatch_target_state{target="nas"} 3');
  });

  describe("GET /monitoring/escalations", () => {
    it("should list escalation records and recovery attempts", async () => {
      const response = await request(app).get("/monitoring/escalations?target=nas");

      expect(response.status).toBe(200);
      expect(response.body.escalations.map((r: { target: string; level: string }) => [r.target, r.level])).toEqual([
        ["vpn", "NONE"],
        ["nas", "WARN"],
        ["grafana", "NONE"],
      ]);
      expect(response.body.recoveryAttempts).toHaveLength(1);
      expect(response.body.recoveryAttempts[0]).toMatchObject({ target: "nas", action: "recording", success: false });
    });

    it("should return 503 without a control plane", async () => {
      const bare = createApp({ aggregator });

      const response = await request(bare).get("/monitoring/escalations");

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ error: "Control plane not initialized" });
    });
  });

  describe("alerts", () => {
    async function raiseAlert(): Promise<string> {
      const nas = scheduler.getRegistry().get("nas");
      if (!nas) throw new Error("missing target nas");
      await alerts.notify(nas, { target: "nas", level: "ESCALATE", enteredAt: 0, retryCount: 3 }, []);
      return alerts.getHistory()[0]?.id ?? "";
    }

    it("should list alerts", async () => {
      await raiseAlert();

      const response = await request(app).get("/monitoring/alerts?limit=10");

      expect(response.body.totalAlerts).toBe(1);
      expect(response.body.unacknowledgedCount).toBe(1);
      expect(response.body.alerts[0].severity).toBe("critical");
    });

    it("should require an API key to acknowledge", async () => {
      const id = await raiseAlert();

      const missing = await request(app).post(`/monitoring/alerts/${id}/acknowledge`);
      expect(missing.status).toBe(401);
      expect(missing.body.error).toBe("Unauthorized");

      const wrong = await request(app).post(`/monitoring/alerts/${id}/acknowledge`).set("x-api-key", "not-the-key");
      expect(wrong.status).toBe(403);
      expect(wrong.body).toEqual({ error: "Forbidden", message: "Invalid API key" });
    });

    it("should acknowledge an alert with a valid key", async () => {
      const id = await raiseAlert();

      const response = await request(app)
        .post(`/monitoring/alerts/${id}/acknowledge`)
        .set("Authorization", `Bearer ${TEST_API_KEY}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: "acknowledged", alertId: id });
      expect(alerts.getUnacknowledged()).toEqual([]);
    });

    it("should return 404 for an unknown alert", async () => {
      const response = await request(app)
        .post("/monitoring/alerts/alert-missing/acknowledge")
        .set("x-api-key", TEST_API_KEY);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: "Alert not found", alertId: "alert-missing" });
    });
  });

  describe("pipeline endpoints", () => {
    it("should report pipeline status", async () => {
      const producerStatus: ProducerStatus = {
        running: true,
        buffered: 12,
        dropped: 0,
        published: 40,
        consecutiveFailures: 2,
        degraded: true,
        lastError: "broker unreachable",
      };
      const withPipeline = createApp({ aggregator, producer: { getStatus: () => producerStatus } });

      const response = await request(withPipeline).get("/monitoring/pipeline");

      expect(response.body).toMatchObject({
        pipelineDegraded: true,
        producer: producerStatus,
        consumer: null,
        scrape: null,
      });
    });

    it("should serve the scrape feed as text", async () => {
      const scrapeFeed = new ScrapeFeed({
        broker: new InMemoryBroker(),
        batchSize: 10,
        backoffBaseMs: 100,
        backoffMaxMs: 1000,
        now: () => 1000,
      });
      scrapeFeed.accept(createMetricRecord("target_up", 1, { target: "vpn" }, 1000));
      const withScrape = createApp({ aggregator, scrapeFeed });

      const response = await request(withScrape).get("/scrape");

      expect(response.status).toBe(200);
      expect(response.headers["content-type"]).toMatch(/^text\/plain/);
      expect(response.text).toBe('# TYPE target_up gauge\ntarget_up{target="vpn"} 1 1000\n');
    });

    it("should return 503 for /scrape when the feed is disabled", async () => {
      const response = await request(app).get("/scrape");

      expect(response.status).toBe(503);
    });
  });
});
