/**
 * Process entry point
 *
 * Loads settings, wires the control plane and relay pipeline, serves the
 * HTTP surface, reloads targets on SIGHUP and shuts down on SIGTERM/SIGINT.
 */

import type { Server } from "http";
import { createApp } from "./app.js";
import { ConfigError, defaultSettingsPath, loadSettings, type MonitorSettings } from "./config/settings.js";
import { getShutdownGrace } from "./config/timeouts.js";
import { createAlertNotifier } from "./monitoring/AlertNotifier.js";
import { ControlPlane } from "./monitoring/ControlPlane.js";
import { buildRecoveryBindings } from "./monitoring/RecoveryActions.js";
import { Scheduler } from "./monitoring/Scheduler.js";
import { StatusAggregator } from "./monitoring/StatusAggregator.js";
import { TargetRegistry } from "./monitoring/TargetRegistry.js";
import type { MetricsBroker } from "./pipeline/Broker.js";
import { IdempotencyCache } from "./pipeline/IdempotencyCache.js";
import { MetricsConsumer } from "./pipeline/MetricsConsumer.js";
import { MetricsProducer } from "./pipeline/MetricsProducer.js";
import { RedisMetricsSink, type MetricsSink } from "./pipeline/MetricsSink.js";
import { NodeExporterCollector } from "./pipeline/NodeExporterCollector.js";
import { RedisStreamBroker } from "./pipeline/RedisStreamBroker.js";
import { ScrapeFeed } from "./pipeline/ScrapeFeed.js";
import { StatusSnapshotSource, type MetricSource } from "./pipeline/sources.js";
import { compileThresholds, ThresholdAlerts } from "./pipeline/ThresholdAlerts.js";
import { ProbeDispatcher } from "./probes/index.js";
import { errorMessage } from "./utils/async.js";

interface Pipeline {
  producer?: MetricsProducer | undefined;
  consumer?: MetricsConsumer | undefined;
  scrapeFeed?: ScrapeFeed | undefined;
  brokers: MetricsBroker[];
  sink?: MetricsSink | undefined;
}

function createPipeline(settings: MonitorSettings, aggregator: StatusAggregator): Pipeline {
  const pipeline: Pipeline = { brokers: [] };

  if (settings.producer.enabled) {
    const broker = new RedisStreamBroker({ settings: settings.broker, role: "producer" });
    const sources: MetricSource[] = [
      new StatusSnapshotSource(aggregator),
      ...settings.producer.collectors.map((c) => new NodeExporterCollector({ url: c.url, labels: c.labels })),
    ];
    const thresholds = compileThresholds(settings.producer.anomalyThresholds);
    pipeline.brokers.push(broker);
    pipeline.producer = new MetricsProducer({
      broker,
      sources,
      intervalMs: settings.producer.intervalMs,
      bufferCapacity: settings.producer.bufferCapacity,
      backoffBaseMs: settings.producer.backoffBaseMs,
      backoffMaxMs: settings.producer.backoffMaxMs,
      alerts: thresholds.length > 0 ? new ThresholdAlerts(thresholds) : undefined,
    });
  }

  if (settings.consumer.enabled) {
    const broker = new RedisStreamBroker({ settings: settings.broker, role: "consumer" });
    const sink = new RedisMetricsSink({
      url: settings.sink.url ?? settings.broker.url,
      keyPrefix: settings.sink.keyPrefix,
      alertKeyPrefix: settings.sink.alertKeyPrefix,
      ttlSeconds: settings.sink.ttlSeconds,
    });
    pipeline.brokers.push(broker);
    pipeline.sink = sink;
    pipeline.consumer = new MetricsConsumer({
      broker,
      sink,
      dedup: new IdempotencyCache(settings.consumer.dedupWindowMs, settings.consumer.dedupMaxEntries),
      batchSize: settings.consumer.batchSize,
      maxRetries: settings.consumer.maxRetries,
      backoffBaseMs: settings.consumer.backoffBaseMs,
      backoffMaxMs: settings.consumer.backoffMaxMs,
    });

    const scrapeBroker = new RedisStreamBroker({ settings: settings.broker, role: "scrape" });
    pipeline.brokers.push(scrapeBroker);
    pipeline.scrapeFeed = new ScrapeFeed({
      broker: scrapeBroker,
      batchSize: settings.consumer.batchSize,
      backoffBaseMs: settings.consumer.backoffBaseMs,
      backoffMaxMs: settings.consumer.backoffMaxMs,
    });
  }

  return pipeline;
}

async function startServer(): Promise<void> {
  const settingsPath = defaultSettingsPath();
  const settings = loadSettings(settingsPath);
  const registry = TargetRegistry.fromDefinitions(settings.targets);

  const scheduler = new Scheduler({
    registry,
    probe: new ProbeDispatcher(),
    jitterRatio: settings.scheduler.jitterRatio,
  });
  const aggregator = new StatusAggregator(scheduler);

  const notifier = createAlertNotifier(settings.alerts);
  const controlPlane = new ControlPlane({
    registry,
    status: aggregator,
    actions: buildRecoveryBindings(settings.recovery, registry),
    notifier,
    gracePeriodMs: settings.controlPlane.gracePeriodMs,
    maxRetries: settings.controlPlane.maxRetries,
    actionTimeoutMs: settings.controlPlane.actionTimeoutMs,
  });
  scheduler.onTransition(controlPlane.listener());
  console.log(`[Monitoring] Loaded ${registry.size} targets from ${settingsPath}`);

  const pipeline = createPipeline(settings, aggregator);

  const app = createApp({
    aggregator,
    controlPlane,
    alerts: notifier,
    producer: pipeline.producer,
    consumer: pipeline.consumer,
    scrapeFeed: pipeline.scrapeFeed,
  });

  scheduler.start();
  pipeline.producer?.start();
  pipeline.consumer?.start();
  pipeline.scrapeFeed?.start();

  const port = settings.server.port;
  const server: Server = app.listen(port, () => {
    console.log(`[Server] infrawatch monitor running on port ${port}`);
    console.log(`Status: http://localhost:${port}/monitor`);
    console.log(`Metrics: http://localhost:${port}/metrics`);
    console.log(`Monitoring: http://localhost:${port}/monitoring/status`);
  });

  // ============================================================================
  // RELOAD
  // ============================================================================

  process.on("SIGHUP", () => {
    console.log("[Monitoring] SIGHUP received, reloading targets...");
    try {
      const next = loadSettings(settingsPath);
      const nextRegistry = TargetRegistry.fromDefinitions(next.targets);
      scheduler.replaceRegistry(nextRegistry);
      controlPlane.retain(nextRegistry, buildRecoveryBindings(next.recovery, nextRegistry));
    } catch (err) {
      // A bad file leaves the running registry untouched
      console.error("[Monitoring] Reload rejected:", errorMessage(err));
    }
  });

  // ============================================================================
  // SHUTDOWN
  // ============================================================================

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down...`);

    const grace = getShutdownGrace();
    await scheduler.stop(grace);
    await controlPlane.stop(grace);
    await Promise.all([pipeline.producer?.stop(), pipeline.consumer?.stop(), pipeline.scrapeFeed?.stop()]);
    await Promise.all(pipeline.brokers.map((b) => b.close()));
    await pipeline.sink?.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

startServer().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`[Monitoring] ${err.message}`);
  } else {
    console.error("Failed to start server:", err);
  }
  process.exit(1);
});
