/**
 * Metrics Consumer - storage queue to sink
 *
 * Processing of one message:
 * 1. Decode; an undecodable payload goes straight to the dead-letter path
 * 2. Skip (and ack) if its idempotency key was seen recently
 * 3. Write to the sink, remember the key, then ack
 * 4. On sink failure nack for redelivery, or dead-letter once the message
 *    has been redelivered maxRetries times
 */

import { metrics, type ConsumerOutcome } from "../monitoring/metrics.js";
import { backoffDelay, errorMessage, sleep } from "../utils/async.js";
import type { MetricsBroker, QueueMessage } from "./Broker.js";
import type { IdempotencyCache } from "./IdempotencyCache.js";
import { deserializeRecord, idempotencyKey, InvalidRecordError, type MetricRecord } from "./MetricRecord.js";
import type { MetricsSink } from "./MetricsSink.js";

export interface MetricsConsumerConfig {
  broker: MetricsBroker;
  sink: MetricsSink;
  dedup: IdempotencyCache;
  batchSize: number;
  /** Redeliveries allowed before a message is dead-lettered */
  maxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface ConsumerStatus {
  running: boolean;
  counts: Record<ConsumerOutcome, number>;
  /** Consecutive broker errors (fetch, ack, dead-letter) */
  brokerFailures: number;
  /** Consecutive sink write errors */
  sinkFailures: number;
  /** Messages the broker discarded before they were settled */
  lost: number;
  degraded: boolean;
  lastError?: string | undefined;
}

export class MetricsConsumer {
  private readonly config: MetricsConsumerConfig;
  private readonly counts: Record<ConsumerOutcome, number> = {
    written: 0,
    duplicate: 0,
    retried: 0,
    dead_lettered: 0,
    invalid: 0,
  };
  private brokerFailures = 0;
  private sinkFailures = 0;
  private lastError: string | undefined;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: MetricsConsumerConfig) {
    this.config = config;
  }

  start(): void {
    if (this.loop) {
      console.warn("[MetricsConsumer] Already running");
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      console.error("[MetricsConsumer] Loop crashed:", err);
    });
    console.log("[MetricsConsumer] Started");
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    console.log("[MetricsConsumer] Stopped");
  }

  /**
   * Fetch and process one batch. Broker errors propagate to the caller.
   */
  async pollOnce(signal?: AbortSignal): Promise<ConsumerOutcome[]> {
    const messages = await this.config.broker.fetch("storage", this.config.batchSize, signal);
    const outcomes: ConsumerOutcome[] = [];
    for (const message of messages) {
      outcomes.push(await this.handle(message));
    }
    return outcomes;
  }

  /**
   * Process a single delivery and settle it with the broker
   */
  async handle(message: QueueMessage): Promise<ConsumerOutcome> {
    const outcome = await this.process(message);
    this.counts[outcome]++;
    metrics.recordConsumerOutcome(outcome);
    return outcome;
  }

  getStatus(): ConsumerStatus {
    return {
      running: this.loop !== null,
      counts: { ...this.counts },
      brokerFailures: this.brokerFailures,
      sinkFailures: this.sinkFailures,
      lost: this.config.broker.lostCount(),
      degraded: this.brokerFailures > 0 || this.sinkFailures > 0,
      ...(this.lastError !== undefined && { lastError: this.lastError }),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async process(message: QueueMessage): Promise<ConsumerOutcome> {
    const { broker, sink, dedup } = this.config;

    let record: MetricRecord;
    try {
      record = deserializeRecord(message.payload);
    } catch (err) {
      if (!(err instanceof InvalidRecordError)) throw err;
      console.error(`[MetricsConsumer] Dead-lettering undecodable message ${message.deliveryTag}: ${err.message}`);
      await broker.deadLetter(message, err.message);
      return "invalid";
    }

    const key = idempotencyKey(record);
    if (dedup.has(key)) {
      await broker.ack(message.deliveryTag);
      return "duplicate";
    }

    let inserted: boolean;
    try {
      inserted = await sink.write(key, record);
    } catch (err) {
      this.sinkFailures++;
      this.lastError = `sink write failed: ${errorMessage(err)}`;

      const redeliveries = message.deliveryCount - 1;
      if (redeliveries >= this.config.maxRetries) {
        const reason = `${this.lastError} (after ${message.deliveryCount} deliveries)`;
        console.error(`[MetricsConsumer] Dead-lettering ${record.name} ${message.deliveryTag}: ${reason}`);
        await broker.deadLetter(message, reason);
        return "dead_lettered";
      }

      console.warn(
        `[MetricsConsumer] ${this.lastError}, message ${message.deliveryTag} will be redelivered (delivery ${message.deliveryCount})`
      );
      await broker.nack(message.deliveryTag);
      return "retried";
    }

    this.sinkFailures = 0;
    // Remember the key only once the record is durable
    dedup.add(key);
    await broker.ack(message.deliveryTag);
    return inserted ? "written" : "duplicate";
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
        if (this.brokerFailures > 0) {
          console.log(`[MetricsConsumer] Broker reachable again after ${this.brokerFailures} failures`);
        }
        this.brokerFailures = 0;
      } catch (err) {
        if (signal.aborted) return;
        this.brokerFailures++;
        this.lastError = `broker error: ${errorMessage(err)}`;
        const delay = backoffDelay(this.brokerFailures, this.config.backoffBaseMs, this.config.backoffMaxMs);
        console.warn(`[MetricsConsumer] ${this.lastError}, retrying in ${delay}ms`);
        if (!(await sleep(delay, signal))) return;
      }
    }
  }
}
