/**
 * Scrape Feed - latest value per series from the best-effort scrape queue
 *
 * Messages on the scrape queue are never acknowledged; a lost message only
 * means a series shows its previous value until the next snapshot.
 */

import { backoffDelay, errorMessage, sleep } from "../utils/async.js";
import type { MetricsBroker } from "./Broker.js";
import { deserializeRecord, seriesKey, type MetricRecord } from "./MetricRecord.js";

export interface ScrapeFeedConfig {
  broker: MetricsBroker;
  batchSize: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Series not updated for this long are dropped (default 15 minutes) */
  staleAfterMs?: number | undefined;
  now?: (() => number) | undefined;
}

export class ScrapeFeed {
  private readonly series = new Map<string, MetricRecord>();
  private readonly broker: MetricsBroker;
  private readonly batchSize: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly staleAfterMs: number;
  private readonly now: () => number;
  private failures = 0;
  private received = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: ScrapeFeedConfig) {
    this.broker = config.broker;
    this.batchSize = config.batchSize;
    this.backoffBaseMs = config.backoffBaseMs;
    this.backoffMaxMs = config.backoffMaxMs;
    this.staleAfterMs = config.staleAfterMs ?? 15 * 60 * 1000;
    this.now = config.now ?? Date.now;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      console.error("[ScrapeFeed] Loop crashed:", err);
    });
    console.log("[ScrapeFeed] Started");
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
  }

  /**
   * Keep a record if it is at least as new as the stored value of its series
   */
  accept(record: MetricRecord): void {
    const key = seriesKey(record);
    const current = this.series.get(key);
    if (!current || current.timestamp <= record.timestamp) {
      this.series.set(key, record);
    }
  }

  async pollOnce(signal?: AbortSignal): Promise<number> {
    const messages = await this.broker.fetch("scrape", this.batchSize, signal);
    let accepted = 0;
    for (const message of messages) {
      try {
        this.accept(deserializeRecord(message.payload));
        accepted++;
      } catch (err) {
        console.debug(`[ScrapeFeed] Skipping message ${message.deliveryTag}: ${errorMessage(err)}`);
      }
    }
    this.received += accepted;
    this.evictStale();
    return accepted;
  }

  /**
   * Prometheus text exposition of the latest value of every live series
   */
  render(): string {
    this.evictStale();

    const byName = new Map<string, MetricRecord[]>();
    for (const record of this.series.values()) {
      const group = byName.get(record.name) ?? [];
      group.push(record);
      byName.set(record.name, group);
    }

    const lines: string[] = [];
    for (const name of [...byName.keys()].sort()) {
      lines.push(`# TYPE ${name} gauge`);
      const group = byName.get(name) ?? [];
      group.sort((a, b) => seriesKey(a).localeCompare(seriesKey(b)));
      for (const record of group) {
        lines.push(`${name}${formatLabels(record.labels)} ${record.value} ${record.timestamp}`);
      }
    }
    return lines.length > 0 ? `${lines.join("\n")}\n` : "";
  }

  getStatus(): { running: boolean; series: number; received: number; failures: number } {
    return {
      running: this.loop !== null,
      series: this.series.size,
      received: this.received,
      failures: this.failures,
    };
  }

  private evictStale(): void {
    const cutoff = this.now() - this.staleAfterMs;
    for (const [key, record] of this.series) {
      if (record.timestamp < cutoff) {
        this.series.delete(key);
      }
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
        this.failures = 0;
      } catch (err) {
        if (signal.aborted) return;
        this.failures++;
        const delay = backoffDelay(this.failures, this.backoffBaseMs, this.backoffMaxMs);
        console.warn(`[ScrapeFeed] Broker error: ${errorMessage(err)}, retrying in ${delay}ms`);
        if (!(await sleep(delay, signal))) return;
      }
    }
  }
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function formatLabels(labels: Readonly<Record<string, string>>): string {
  const keys = Object.keys(labels).sort();
  if (keys.length === 0) return "";
  return `{${keys.map((key) => `${key}="${escapeLabelValue(labels[key] ?? "")}"`).join(",")}}`;
}
