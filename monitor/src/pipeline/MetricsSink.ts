/**
 * Metrics Sink - terminal document store for relayed records
 *
 * Each record is stored once under its idempotency key with a retention
 * TTL; threshold alerts go under their own key prefix. A write for a key that already exists is accepted without
 * overwriting, so the sink is idempotent on its own as well.
 */

import { Redis } from "ioredis";
import { getSinkWriteTimeout } from "../config/timeouts.js";
import { withTimeout } from "../utils/async.js";
import { isAlertRecord, type MetricRecord } from "./MetricRecord.js";

export interface StoredMetric extends MetricRecord {
  idempotencyKey: string;
  /** Epoch ms the sink accepted the record */
  storedAt: number;
}

export interface MetricsSink {
  /**
   * Persist a record. Resolves `true` when written, `false` when the key
   * was already present; rejects when the store is unavailable.
   */
  write(key: string, record: MetricRecord): Promise<boolean>;
  close(): Promise<void>;
}

export interface RedisMetricsSinkOptions {
  url: string;
  keyPrefix: string;
  alertKeyPrefix: string;
  ttlSeconds: number;
  writeTimeoutMs?: number | undefined;
}

export class RedisMetricsSink implements MetricsSink {
  private readonly redis: Redis;
  private readonly keyPrefix: string;
  private readonly alertKeyPrefix: string;
  private readonly ttlSeconds: number;
  private readonly writeTimeoutMs: number;

  constructor(options: RedisMetricsSinkOptions) {
    this.keyPrefix = options.keyPrefix;
    this.alertKeyPrefix = options.alertKeyPrefix;
    this.ttlSeconds = options.ttlSeconds;
    this.writeTimeoutMs = options.writeTimeoutMs ?? getSinkWriteTimeout();
    this.redis = new Redis(options.url, {
      maxRetriesPerRequest: 1,
      retryStrategy: (times) => Math.min(times * 200, 5000),
    });
    this.redis.on("error", (err: Error) => {
      console.warn("[RedisMetricsSink] Redis error:", err.message);
    });
  }

  async write(key: string, record: MetricRecord): Promise<boolean> {
    const document: StoredMetric = { ...record, idempotencyKey: key, storedAt: Date.now() };
    const prefix = isAlertRecord(record) ? this.alertKeyPrefix : this.keyPrefix;
    const reply = await withTimeout(
      this.redis.set(prefix + key, JSON.stringify(document), "EX", this.ttlSeconds, "NX"),
      this.writeTimeoutMs,
      "sink write"
    );
    return reply === "OK";
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch {
      this.redis.disconnect();
    }
  }
}
