/**
 * In-process broker with the fan-out and redelivery behaviour of the real one
 */

import { BrokerUnavailableError, type MetricsBroker, type QueueMessage, type QueueRole } from "../../pipeline/Broker.js";
import { sleep } from "../../utils/async.js";

interface StoredEntry {
  id: string;
  payload: string;
  deliveries: number;
}

export interface DeadLetter {
  payload: string;
  reason: string;
  deliveryCount: number;
}

export class InMemoryBroker implements MetricsBroker {
  /** Every confirmed publish, in order */
  readonly published: string[] = [];
  readonly acked: string[] = [];
  readonly deadLetters: DeadLetter[] = [];
  connectCalls = 0;
  /** Reported by lostCount() */
  lost = 0;
  /** How long an empty fetch waits before returning */
  blockMs = 50;

  private available = true;
  private sequence = 0;
  private readonly ready: StoredEntry[] = [];
  private readonly pending = new Map<string, StoredEntry>();
  private readonly scrape: StoredEntry[] = [];

  setAvailable(available: boolean): void {
    this.available = available;
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    this.ensureAvailable();
  }

  async publish(payload: string): Promise<string> {
    this.ensureAvailable();
    this.sequence++;
    const id = `${this.sequence}-0`;
    this.published.push(payload);
    this.ready.push({ id, payload, deliveries: 0 });
    this.scrape.push({ id, payload, deliveries: 0 });
    return id;
  }

  async fetch(role: QueueRole, max: number, signal?: AbortSignal): Promise<QueueMessage[]> {
    this.ensureAvailable();
    const source = role === "storage" ? this.ready : this.scrape;
    const batch = source.splice(0, max);
    if (batch.length === 0) {
      // Stands in for the blocking read of the real broker
      await sleep(this.blockMs, signal);
      return [];
    }

    return batch.map((entry) => {
      entry.deliveries++;
      if (role === "storage") {
        this.pending.set(entry.id, entry);
      }
      return {
        payload: entry.payload,
        deliveryTag: entry.id,
        redelivered: entry.deliveries > 1,
        deliveryCount: entry.deliveries,
      };
    });
  }

  async ack(deliveryTag: string): Promise<void> {
    this.ensureAvailable();
    this.pending.delete(deliveryTag);
    this.acked.push(deliveryTag);
  }

  async nack(deliveryTag: string): Promise<void> {
    this.ensureAvailable();
    const entry = this.pending.get(deliveryTag);
    if (entry) {
      this.pending.delete(deliveryTag);
      this.ready.unshift(entry);
    }
  }

  async deadLetter(message: QueueMessage, reason: string): Promise<void> {
    this.ensureAvailable();
    this.deadLetters.push({ payload: message.payload, reason, deliveryCount: message.deliveryCount });
    this.pending.delete(message.deliveryTag);
  }

  /**
   * Put every unacknowledged storage delivery back in the queue, as after a
   * consumer connection loss
   */
  redeliverPending(): void {
    this.ready.unshift(...this.pending.values());
    this.pending.clear();
  }

  /** Storage messages not yet acknowledged or dead-lettered */
  get outstanding(): number {
    return this.ready.length + this.pending.size;
  }

  lostCount(): number {
    return this.lost;
  }

  async close(): Promise<void> {
    this.available = false;
  }

  private ensureAvailable(): void {
    if (!this.available) {
      throw new BrokerUnavailableError("broker unreachable");
    }
  }
}
