/**
 * MetricRecord - the unit relayed through the pipeline, and its wire format
 *
 * Wire format is JSON `{ v, name, value, labels, timestamp }`. Decoding
 * keeps unknown fields so newer producers can add them without breaking
 * older consumers.
 */

import { createHash } from "crypto";
import { z } from "zod";

export const WIRE_VERSION = 1;

/** Label that marks a threshold alert: `kind="alert"` */
export const ALERT_KIND_LABEL = "kind";
export const ALERT_KIND = "alert";

export interface MetricRecord {
  readonly name: string;
  readonly value: number;
  readonly labels: Readonly<Record<string, string>>;
  /** Collection time, epoch ms */
  readonly timestamp: number;
}

const metricRecordSchema = z
  .object({
    v: z.number().int().positive().optional(),
    name: z.string().min(1),
    value: z.number(),
    labels: z.record(z.string()).default({}),
    timestamp: z.number().int().nonnegative(),
  })
  .passthrough();

/**
 * Raised for payloads that cannot be decoded into a MetricRecord
 */
export class InvalidRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRecordError";
  }
}

export function createMetricRecord(
  name: string,
  value: number,
  labels: Record<string, string> = {},
  timestamp: number = Date.now()
): MetricRecord {
  return Object.freeze({ name, value, labels: Object.freeze({ ...labels }), timestamp });
}

export function serializeRecord(record: MetricRecord): string {
  return JSON.stringify({
    v: WIRE_VERSION,
    name: record.name,
    value: record.value,
    labels: record.labels,
    timestamp: record.timestamp,
  });
}

export function deserializeRecord(payload: string): MetricRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    throw new InvalidRecordError("payload is not valid JSON");
  }

  const result = metricRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidRecordError(`invalid metric record: ${where}${issue?.message ?? "unknown issue"}`);
  }

  const { name, value, labels, timestamp } = result.data;
  return createMetricRecord(name, value, labels, timestamp);
}

/**
 * Deterministic key over (name, sorted labels, timestamp); the value is
 * excluded so a retried publish of the same sample maps to the same key
 */
export function idempotencyKey(record: MetricRecord): string {
  const labels = Object.keys(record.labels)
    .sort()
    .map((key) => [key, record.labels[key] ?? ""]);
  return createHash("sha256")
    .update(JSON.stringify([record.name, labels, record.timestamp]))
    .digest("hex");
}

/**
 * Series identity: name plus sorted labels, without the timestamp
 */
export function seriesKey(record: Pick<MetricRecord, "name" | "labels">): string {
  const labels = Object.keys(record.labels)
    .sort()
    .map((key) => `${key}=${JSON.stringify(record.labels[key] ?? "")}`)
    .join(",");
  return `${record.name}{${labels}}`;
}

export function isAlertRecord(record: Pick<MetricRecord, "labels">): boolean {
  return record.labels[ALERT_KIND_LABEL] === ALERT_KIND;
}
