/**
 * Redis Streams broker
 *
 * The exchange is a stream; each queue is a consumer group on it, so a
 * single XADD reaches both. The storage group is read with acknowledgment
 * and its pending entries list provides redelivery; the scrape group is
 * read with NOACK.
 *
 * Redelivery backoff comes from entry idle time: a nacked entry stays
 * pending and is reclaimed once idle for base * 2^(deliveries-1) ms.
 *
 * XADD trims the stream to about `maxLength` entries whatever the groups
 * have read. A pending entry trimmed away is released and counted as lost;
 * an unread one is gone without a trace, so `maxLength` must cover the
 * longest consumer outage to be ridden out.
 */

import { hostname } from "os";
import { Redis } from "ioredis";
import type { BrokerSettings } from "../config/settings.js";
import { getPublishConfirmTimeout } from "../config/timeouts.js";
import { metrics } from "../monitoring/metrics.js";
import { backoffDelay, errorMessage, withTimeout } from "../utils/async.js";
import { BrokerUnavailableError, type MetricsBroker, type QueueMessage, type QueueRole } from "./Broker.js";

export interface RedisStreamBrokerOptions {
  settings: BrokerSettings;
  /** Connection owner, used in logs and the consumer name */
  role: string;
  confirmTimeoutMs?: number | undefined;
}

interface StreamEntry {
  id: string;
  fields: Map<string, string>;
}

interface PendingEntry {
  id: string;
  idleMs: number;
  deliveries: number;
}

export class RedisStreamBroker implements MetricsBroker {
  private readonly settings: BrokerSettings;
  private readonly role: string;
  private readonly consumerName: string;
  private readonly confirmTimeoutMs: number;
  private client: Redis | null = null;
  private connecting: Promise<Redis> | null = null;
  private closed = false;
  private lost = 0;

  constructor(options: RedisStreamBrokerOptions) {
    this.settings = options.settings;
    this.role = options.role;
    this.consumerName = `${hostname()}-${process.pid}-${options.role}`;
    this.confirmTimeoutMs = options.confirmTimeoutMs ?? getPublishConfirmTimeout();
  }

  async connect(): Promise<void> {
    await this.getClient();
  }

  async publish(payload: string): Promise<string> {
    const client = await this.getClient();
    const id = await this.command(
      client,
      "publish confirm",
      "XADD",
      this.settings.exchange,
      "MAXLEN",
      "~",
      String(this.settings.maxLength),
      "*",
      "payload",
      payload
    );
    if (typeof id !== "string") {
      throw new BrokerUnavailableError("broker did not confirm publish");
    }
    return id;
  }

  async fetch(role: QueueRole, max: number, signal?: AbortSignal): Promise<QueueMessage[]> {
    if (signal?.aborted) return [];
    const client = await this.getClient();

    if (role === "storage") {
      const reclaimed = await this.reclaim(client, max);
      if (reclaimed.length > 0) {
        return reclaimed;
      }
    }

    const group = this.groupFor(role);
    const args: (string | number)[] = [
      "GROUP",
      group,
      this.consumerName,
      "COUNT",
      max,
      "BLOCK",
      this.settings.blockMs,
    ];
    if (role === "scrape") {
      args.push("NOACK");
    }
    args.push("STREAMS", this.settings.exchange, ">");

    const read = this.blockingRead(client, args);
    const reply = signal ? await raceAbort(read, signal) : await read;
    if (reply === undefined) return [];

    return parseReadReply(reply).map((entry) => ({
      payload: entry.fields.get("payload") ?? "",
      deliveryTag: entry.id,
      redelivered: false,
      deliveryCount: 1,
    }));
  }

  async ack(deliveryTag: string): Promise<void> {
    const client = await this.getClient();
    await this.command(client, "ack", "XACK", this.settings.exchange, this.settings.storageQueue, deliveryTag);
  }

  async nack(_deliveryTag: string): Promise<void> {
    // The entry stays in the pending list; reclaim() redelivers it after its backoff
  }

  async deadLetter(message: QueueMessage, reason: string): Promise<void> {
    const client = await this.getClient();
    await this.command(
      client,
      "dead-letter",
      "XADD",
      this.settings.deadLetter,
      "MAXLEN",
      "~",
      String(this.settings.maxLength),
      "*",
      "payload",
      message.payload,
      "reason",
      reason,
      "deliveries",
      String(message.deliveryCount),
      "source",
      message.deliveryTag
    );
    await this.command(
      client,
      "ack",
      "XACK",
      this.settings.exchange,
      this.settings.storageQueue,
      message.deliveryTag
    );
  }

  lostCount(): number {
    return this.lost;
  }

  async close(): Promise<void> {
    this.closed = true;
    const client = this.client;
    this.client = null;
    if (!client) return;

    try {
      await client.quit();
    } catch (err) {
      console.debug(`[RedisStreamBroker] ${this.role}: quit failed, disconnecting:`, errorMessage(err));
      client.disconnect();
    }
    console.log(`[RedisStreamBroker] ${this.role}: connection closed`);
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  private getClient(): Promise<Redis> {
    if (this.closed) {
      return Promise.reject(new BrokerUnavailableError("broker connection closed"));
    }
    if (this.client && this.client.status === "ready") {
      return Promise.resolve(this.client);
    }
    // One connection attempt at a time per role
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<Redis> {
    this.client?.disconnect();
    this.client = null;

    const client = new Redis(this.settings.url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
    });
    client.on("error", (err: Error) => {
      console.warn(`[RedisStreamBroker] ${this.role}: ${err.message}`);
    });

    try {
      await withTimeout(client.connect(), this.confirmTimeoutMs, "broker connect");
      for (const group of [this.settings.storageQueue, this.settings.scrapeQueue]) {
        await this.ensureGroup(client, group);
      }
    } catch (err) {
      client.disconnect();
      throw new BrokerUnavailableError(`cannot connect to broker: ${errorMessage(err)}`, { cause: err });
    }

    this.client = client;
    console.log(`[RedisStreamBroker] ${this.role}: connected to ${this.settings.exchange}`);
    return client;
  }

  private async ensureGroup(client: Redis, group: string): Promise<void> {
    try {
      await client.call("XGROUP", "CREATE", this.settings.exchange, group, "$", "MKSTREAM");
    } catch (err) {
      if (!errorMessage(err).includes("BUSYGROUP")) {
        throw err;
      }
    }
  }

  /**
   * Run a command under the confirm timeout; a failure drops the connection
   */
  private async command(client: Redis, operation: string, ...args: [string, ...(string | number)[]]): Promise<unknown> {
    const [name, ...rest] = args;
    try {
      return await withTimeout(client.call(name, ...rest), this.confirmTimeoutMs, operation);
    } catch (err) {
      this.dropClient(client);
      throw new BrokerUnavailableError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async blockingRead(client: Redis, args: (string | number)[]): Promise<unknown> {
    try {
      return await client.call("XREADGROUP", ...args);
    } catch (err) {
      this.dropClient(client);
      throw new BrokerUnavailableError(`read failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private dropClient(client: Redis): void {
    if (this.client === client) {
      this.client = null;
      client.disconnect();
    }
  }

  // ==========================================================================
  // Redelivery
  // ==========================================================================

  private async reclaim(client: Redis, max: number): Promise<QueueMessage[]> {
    const pendingReply = await this.command(
      client,
      "pending scan",
      "XPENDING",
      this.settings.exchange,
      this.settings.storageQueue,
      "IDLE",
      this.settings.redeliveryBaseMs,
      "-",
      "+",
      max
    );

    const messages: QueueMessage[] = [];
    for (const pending of parsePendingReply(pendingReply)) {
      const minIdle = backoffDelay(pending.deliveries, this.settings.redeliveryBaseMs, this.settings.redeliveryMaxMs);
      if (pending.idleMs < minIdle) continue;

      // XCLAIM rechecks idle time so a concurrent claimer cannot double-deliver
      const claimed = parseEntries(
        await this.command(
          client,
          "reclaim",
          "XCLAIM",
          this.settings.exchange,
          this.settings.storageQueue,
          this.consumerName,
          minIdle,
          pending.id
        )
      );
      if (claimed.length === 0) {
        await this.releaseIfTrimmed(client, pending);
        continue;
      }
      for (const entry of claimed) {
        messages.push({
          payload: entry.fields.get("payload") ?? "",
          deliveryTag: entry.id,
          redelivered: true,
          deliveryCount: pending.deliveries + 1,
        });
      }
    }
    return messages;
  }

  /**
   * XCLAIM returns nothing both for an entry another consumer just claimed
   * and for one trimmed from the stream; only the latter is released
   */
  private async releaseIfTrimmed(client: Redis, pending: PendingEntry): Promise<void> {
    const stored = parseEntries(
      await this.command(client, "pending lookup", "XRANGE", this.settings.exchange, pending.id, pending.id)
    );
    if (stored.length > 0) return;

    await this.command(client, "ack", "XACK", this.settings.exchange, this.settings.storageQueue, pending.id);
    this.lost++;
    metrics.recordBrokerLost();
    console.error(
      `[RedisStreamBroker] ${this.role}: ${pending.id} was trimmed from ${this.settings.exchange} after ${pending.deliveries} deliveries, record lost`
    );
  }

  private groupFor(role: QueueRole): string {
    return role === "storage" ? this.settings.storageQueue : this.settings.scrapeQueue;
  }
}

// ============================================================================
// Reply parsing
// ============================================================================

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      resolve(undefined);
      return;
    }
    const onAbort = (): void => resolve(undefined);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function toFieldMap(raw: unknown): Map<string, string> {
  const fields = new Map<string, string>();
  if (!isList(raw)) return fields;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const key = raw[i];
    const value = raw[i + 1];
    if (typeof key === "string" && typeof value === "string") {
      fields.set(key, value);
    }
  }
  return fields;
}

/**
 * `[[id, [field, value, ...]], ...]`; deleted entries come back as nil
 */
export function parseEntries(raw: unknown): StreamEntry[] {
  if (!isList(raw)) return [];
  const entries: StreamEntry[] = [];
  for (const item of raw) {
    if (!isList(item)) continue;
    const id = item[0];
    if (typeof id !== "string") continue;
    entries.push({ id, fields: toFieldMap(item[1]) });
  }
  return entries;
}

/**
 * XREADGROUP reply: nil on timeout, else `[[stream, entries], ...]`
 */
export function parseReadReply(raw: unknown): StreamEntry[] {
  if (!isList(raw)) return [];
  return raw.flatMap((stream) => (isList(stream) ? parseEntries(stream[1]) : []));
}

/**
 * Extended XPENDING reply: `[[id, consumer, idleMs, deliveries], ...]`
 */
export function parsePendingReply(raw: unknown): PendingEntry[] {
  if (!isList(raw)) return [];
  const pending: PendingEntry[] = [];
  for (const item of raw) {
    if (!isList(item)) continue;
    const [id, , idle, deliveries] = item;
    if (typeof id !== "string" || typeof idle !== "number" || typeof deliveries !== "number") continue;
    pending.push({ id, idleMs: idle, deliveries });
  }
  return pending;
}
