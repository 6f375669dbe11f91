/**
 * Broker contract for the metrics relay
 *
 * One publish fans out to two queues: `storage` (acknowledged, at-least-once)
 * and `scrape` (best-effort). Producer, consumer and scrape feed each hold
 * their own broker instance.
 */

/**
 * Consumer queue bound to the metrics exchange
 */
export type QueueRole = "storage" | "scrape";

export interface QueueMessage {
  /** Serialized MetricRecord */
  payload: string;
  /** Broker handle used to ack, nack or dead-letter this delivery */
  deliveryTag: string;
  /** True when this message was delivered before */
  redelivered: boolean;
  /** Deliveries so far, including this one */
  deliveryCount: number;
}

/**
 * Raised when the broker cannot be reached or rejects an operation
 */
export class BrokerUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BrokerUnavailableError";
  }
}

export interface MetricsBroker {
  /** Connect (single-flight; concurrent callers share one attempt) */
  connect(): Promise<void>;

  /**
   * Publish one payload to the exchange. Resolves only once the broker has
   * confirmed it; rejects on connection loss or confirm timeout.
   */
  publish(payload: string): Promise<string>;

  /**
   * Fetch up to `max` messages from a queue, including redeliveries that
   * are due. Waits at most the broker's block interval, or until aborted.
   */
  fetch(role: QueueRole, max: number, signal?: AbortSignal): Promise<QueueMessage[]>;

  /** Release a storage message after it was processed */
  ack(deliveryTag: string): Promise<void>;

  /** Leave a storage message for redelivery with backoff */
  nack(deliveryTag: string): Promise<void>;

  /** Route a storage message to the dead-letter path and release it */
  deadLetter(message: QueueMessage, reason: string): Promise<void>;

  /** Storage messages the broker discarded before they were settled */
  lostCount(): number;

  close(): Promise<void>;
}
