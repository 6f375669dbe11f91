/**
 * Node exporter collector - Prometheus text exposition into MetricRecords
 */

import { getProbeTimeout } from "../config/timeouts.js";
import { withTimeout } from "../utils/async.js";
import { createMetricRecord, type MetricRecord } from "./MetricRecord.js";
import type { MetricSource } from "./sources.js";

export interface ParsedSample {
  name: string;
  labels: Record<string, string>;
  value: number;
}

const SAMPLE_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*/;

/**
 * Parse one exposition line (`name{labels} value [timestamp]`).
 * Returns undefined for comments, blanks and malformed lines.
 */
export function parseSampleLine(line: string): ParsedSample | undefined {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#")) return undefined;

  const nameMatch = SAMPLE_NAME.exec(trimmed);
  if (!nameMatch) return undefined;
  const name = nameMatch[0];
  let rest = trimmed.slice(name.length);

  let labels: Record<string, string> = {};
  if (rest.startsWith("{")) {
    const parsed = parseLabelBlock(rest);
    if (!parsed) return undefined;
    labels = parsed.labels;
    rest = rest.slice(parsed.length);
  }

  const [valueText] = rest.trim().split(/\s+/);
  if (!valueText) return undefined;
  const value = Number(valueText);
  // JSON has no NaN or Inf, so such samples are not relayed
  if (!Number.isFinite(value)) return undefined;

  return { name, labels, value };
}

/**
 * Parse `{k="v",...}` from the start of `text`. Quoted values may contain
 * commas, equals signs, braces and the escapes \\ \" \n.
 */
function parseLabelBlock(text: string): { labels: Record<string, string>; length: number } | undefined {
  const labels: Record<string, string> = {};
  let i = 1;

  while (i < text.length) {
    while (text[i] === " " || text[i] === ",") i++;
    if (text[i] === "}") {
      return { labels, length: i + 1 };
    }

    const keyStart = i;
    while (i < text.length && text[i] !== "=" && text[i] !== "}" && text[i] !== ",") i++;
    const key = text.slice(keyStart, i).trim();
    if (key === "" || text[i] !== "=") return undefined;
    i++;
    while (text[i] === " ") i++;
    if (text[i] !== '"') return undefined;
    i++;

    let value = "";
    let closed = false;
    while (i < text.length) {
      const ch = text[i];
      if (ch === "\\") {
        const next = text[i + 1];
        value += next === "n" ? "\n" : (next ?? "");
        i += 2;
        continue;
      }
      i++;
      if (ch === '"') {
        closed = true;
        break;
      }
      value += ch ?? "";
    }
    if (!closed) return undefined;
    labels[key] = value;
  }

  return undefined;
}

/**
 * Parse a series selector: `name` or `name{k="v",...}`
 */
export function parseSelector(text: string): { name: string; labels: Record<string, string> } | undefined {
  const trimmed = text.trim();
  const nameMatch = SAMPLE_NAME.exec(trimmed);
  if (!nameMatch) return undefined;
  const name = nameMatch[0];
  const rest = trimmed.slice(name.length);
  if (rest === "") return { name, labels: {} };

  const parsed = rest.startsWith("{") ? parseLabelBlock(rest) : undefined;
  if (!parsed || parsed.length !== rest.length) return undefined;
  return { name, labels: parsed.labels };
}

/**
 * Parse a whole exposition document
 */
export function parseExposition(text: string): ParsedSample[] {
  const samples: ParsedSample[] = [];
  for (const line of text.split("\n")) {
    const sample = parseSampleLine(line);
    if (sample) samples.push(sample);
  }
  return samples;
}

export interface NodeExporterCollectorOptions {
  url: string;
  /** Added to every sample; sample labels win on conflict */
  labels?: Record<string, string> | undefined;
  timeoutMs?: number | undefined;
  fetch?: typeof fetch | undefined;
  now?: (() => number) | undefined;
}

export class NodeExporterCollector implements MetricSource {
  readonly name: string;
  private readonly url: string;
  private readonly labels: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: NodeExporterCollectorOptions) {
    this.name = `node_exporter(${options.url})`;
    this.url = options.url;
    this.labels = options.labels ?? {};
    this.timeoutMs = options.timeoutMs ?? getProbeTimeout();
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async collect(signal?: AbortSignal): Promise<MetricRecord[]> {
    const response = await withTimeout(
      this.fetchImpl(this.url, signal ? { signal } : {}),
      this.timeoutMs,
      `scrape ${this.url}`
    );
    if (!response.ok) {
      await response.body?.cancel();
      throw new Error(`node exporter returned ${response.status}`);
    }

    const text = await response.text();
    const timestamp = this.now();
    return parseExposition(text).map((sample) =>
      createMetricRecord(sample.name, sample.value, { ...this.labels, ...sample.labels }, timestamp)
    );
  }
}
