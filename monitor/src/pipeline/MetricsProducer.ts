/**
 * Metrics Producer - periodic snapshot publisher
 *
 * Every interval the producer collects records from its sources and
 * publishes them in order, one confirmed publish at a time. Only records
 * whose publish failed, and those collected behind them, wait in a bounded
 * outbox (oldest dropped when full); flushing it is retried with
 * exponential backoff.
 */

import { metrics } from "../monitoring/metrics.js";
import { backoffDelay, errorMessage, sleep } from "../utils/async.js";
import { BoundedBuffer } from "../utils/BoundedBuffer.js";
import type { MetricsBroker } from "./Broker.js";
import { serializeRecord, type MetricRecord } from "./MetricRecord.js";
import type { MetricSource } from "./sources.js";
import type { ThresholdAlerts } from "./ThresholdAlerts.js";

export interface MetricsProducerConfig {
  broker: MetricsBroker;
  sources: MetricSource[];
  intervalMs: number;
  bufferCapacity: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Turns breaching samples into alert records published after them */
  alerts?: ThresholdAlerts | undefined;
  now?: (() => number) | undefined;
}

export interface ProducerStatus {
  running: boolean;
  buffered: number;
  dropped: number;
  published: number;
  consecutiveFailures: number;
  /** True while the broker is rejecting publishes */
  degraded: boolean;
  lastError?: string | undefined;
  lastPublishAt?: string | undefined;
}

export class MetricsProducer {
  private readonly broker: MetricsBroker;
  private readonly sources: MetricSource[];
  private readonly intervalMs: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly alerts: ThresholdAlerts | undefined;
  private readonly now: () => number;
  private readonly outbox: BoundedBuffer<string>;

  private published = 0;
  private consecutiveFailures = 0;
  private lastError: string | undefined;
  private lastPublishAt: number | undefined;
  private flushing: Promise<boolean> | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: MetricsProducerConfig) {
    this.broker = config.broker;
    this.sources = config.sources;
    this.intervalMs = config.intervalMs;
    this.backoffBaseMs = config.backoffBaseMs;
    this.backoffMaxMs = config.backoffMaxMs;
    this.alerts = config.alerts;
    this.now = config.now ?? Date.now;
    this.outbox = new BoundedBuffer<string>(config.bufferCapacity);
  }

  start(): void {
    if (this.loop) {
      console.warn("[MetricsProducer] Already running");
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      console.error("[MetricsProducer] Loop crashed:", err);
    });
    console.log(`[MetricsProducer] Started (${this.sources.length} sources, every ${this.intervalMs}ms)`);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    if (!this.outbox.isEmpty()) {
      console.warn(`[MetricsProducer] Stopped with ${this.outbox.size} unpublished records`);
    } else {
      console.log("[MetricsProducer] Stopped");
    }
  }

  /**
   * Collect from every source and publish each record, followed by its
   * source's threshold alerts. A failing source is logged and skipped.
   */
  async collect(signal?: AbortSignal): Promise<number> {
    let added = 0;
    for (const source of this.sources) {
      let records: MetricRecord[];
      try {
        records = await source.collect(signal);
      } catch (err) {
        console.warn(`[MetricsProducer] Source ${source.name} failed: ${errorMessage(err)}`);
        continue;
      }
      const alerts = this.alerts?.check(records) ?? [];
      if (alerts.length > 0) {
        console.warn(`[MetricsProducer] ${alerts.length} threshold breaches in ${source.name}`);
      }
      for (const record of [...records, ...alerts]) {
        await this.offer(serializeRecord(record));
        added++;
      }
    }
    return added;
  }

  /**
   * Publish buffered records oldest first. Resolves true once the outbox is
   * empty, false at the first failed publish (the record stays buffered).
   */
  flush(): Promise<boolean> {
    if (!this.flushing) {
      this.flushing = this.drainOutbox().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  getStatus(): ProducerStatus {
    return {
      running: this.loop !== null,
      buffered: this.outbox.size,
      dropped: this.outbox.droppedCount,
      published: this.published,
      consecutiveFailures: this.consecutiveFailures,
      degraded: this.consecutiveFailures > 0,
      ...(this.lastError !== undefined && { lastError: this.lastError }),
      ...(this.lastPublishAt !== undefined && { lastPublishAt: new Date(this.lastPublishAt).toISOString() }),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Publish straight through while nothing is backlogged; otherwise, or
   * when the publish fails, the record queues behind the backlog
   */
  private async offer(payload: string): Promise<void> {
    if (this.outbox.isEmpty() && !this.flushing) {
      try {
        await this.broker.publish(payload);
        this.confirmed();
        return;
      } catch (err) {
        this.publishFailed(err);
      }
    }
    this.enqueue(payload);
  }

  private enqueue(payload: string): void {
    const evicted = this.outbox.push(payload);
    if (evicted !== undefined) {
      metrics.recordDropped();
      console.warn(`[MetricsProducer] Buffer full (${this.outbox.size}), dropped oldest record`);
    }
    metrics.setProducerBuffered(this.outbox.size);
  }

  private async drainOutbox(): Promise<boolean> {
    for (let payload = this.outbox.peek(); payload !== undefined; payload = this.outbox.peek()) {
      try {
        await this.broker.publish(payload);
      } catch (err) {
        this.publishFailed(err);
        return false;
      }

      // Only the record just confirmed leaves the outbox
      if (this.outbox.peek() === payload) {
        this.outbox.shift();
      }
      this.confirmed();
    }
    return true;
  }

  private confirmed(): void {
    this.published++;
    this.lastPublishAt = this.now();
    metrics.recordPublished();
    metrics.setProducerBuffered(this.outbox.size);

    if (this.consecutiveFailures > 0) {
      console.log(`[MetricsProducer] Broker reachable again after ${this.consecutiveFailures} failed attempts`);
      this.consecutiveFailures = 0;
      this.lastError = undefined;
    }
  }

  private publishFailed(err: unknown): void {
    this.consecutiveFailures++;
    this.lastError = errorMessage(err);
    console.warn(
      `[MetricsProducer] Publish failed (attempt ${this.consecutiveFailures}, ${this.outbox.size} buffered): ${this.lastError}`
    );
  }

  private async run(signal: AbortSignal): Promise<void> {
    let nextCollectAt = this.now();

    while (!signal.aborted) {
      if (this.now() >= nextCollectAt) {
        await this.collect(signal);
        nextCollectAt = this.now() + this.intervalMs;
      }

      const drained = await this.flush();
      const untilCollect = Math.max(0, nextCollectAt - this.now());
      const wait = drained
        ? untilCollect
        : Math.min(untilCollect, backoffDelay(this.consecutiveFailures, this.backoffBaseMs, this.backoffMaxMs));

      if (!(await sleep(wait, signal))) return;
    }
  }
}
