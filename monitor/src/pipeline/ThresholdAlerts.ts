/**
 * Threshold alerts - samples outside their configured bounds become alert
 * records published next to the samples
 *
 * A rule is keyed by a series selector (`name` or `name{k="v"}`); selector
 * labels must all be present on a sample, extra sample labels are allowed.
 * A plain number is an upper bound, except for the names in LOW_IS_BAD,
 * where it is a lower bound, and for availability gauges (`up`, `*_up`),
 * which breach when equal to it: `"target_up": 0` alerts on every down
 * target.
 */

import { ConfigError, type ThresholdSetting } from "../config/settings.js";
import { ALERT_KIND, ALERT_KIND_LABEL, createMetricRecord, type MetricRecord } from "./MetricRecord.js";
import { parseSelector } from "./NodeExporterCollector.js";

const LOW_IS_BAD = ["disk_free_percent", "entropy_available_bits", "filefd_maximum"];

export interface ThresholdBounds {
  above?: number | undefined;
  below?: number | undefined;
  equals?: number | undefined;
}

export interface ThresholdRule {
  selector: string;
  name: string;
  labels: Readonly<Record<string, string>>;
  bounds: ThresholdBounds;
}

function isAvailabilityGauge(name: string): boolean {
  return name === "up" || name.endsWith("_up");
}

function shorthandBounds(name: string, threshold: number): ThresholdBounds {
  if (isAvailabilityGauge(name)) return { equals: threshold };
  if (LOW_IS_BAD.some((low) => name.includes(low))) return { below: threshold };
  return { above: threshold };
}

/**
 * Build rules from the `producer.anomalyThresholds` setting
 */
export function compileThresholds(settings: Readonly<Record<string, ThresholdSetting>>): ThresholdRule[] {
  const rules: ThresholdRule[] = [];
  const invalid: string[] = [];

  for (const [selector, setting] of Object.entries(settings)) {
    const parsed = parseSelector(selector);
    if (!parsed) {
      invalid.push(`producer.anomalyThresholds: invalid selector '${selector}'`);
      continue;
    }
    rules.push({
      selector,
      name: parsed.name,
      labels: parsed.labels,
      bounds: typeof setting === "number" ? shorthandBounds(parsed.name, setting) : setting,
    });
  }

  if (invalid.length > 0) {
    throw new ConfigError("Invalid anomaly thresholds", invalid);
  }
  return rules;
}

/**
 * Describe the bound `value` violates, if any
 */
export function breach(bounds: ThresholdBounds, value: number): string | undefined {
  if (bounds.above !== undefined && value > bounds.above) return `above ${bounds.above}`;
  if (bounds.below !== undefined && value < bounds.below) return `below ${bounds.below}`;
  if (bounds.equals !== undefined && value === bounds.equals) return `equals ${bounds.equals}`;
  return undefined;
}

function matches(rule: ThresholdRule, record: MetricRecord): boolean {
  if (rule.name !== record.name) return false;
  return Object.entries(rule.labels).every(([key, value]) => record.labels[key] === value);
}

export class ThresholdAlerts {
  constructor(private readonly rules: readonly ThresholdRule[]) {}

  /**
   * One alert record per breaching sample; the first matching rule that
   * breaches wins
   */
  check(records: readonly MetricRecord[]): MetricRecord[] {
    const alerts: MetricRecord[] = [];
    for (const record of records) {
      for (const rule of this.rules) {
        if (!matches(rule, record)) continue;
        const condition = breach(rule.bounds, record.value);
        if (condition === undefined) continue;

        alerts.push(
          createMetricRecord(
            record.name,
            record.value,
            { ...record.labels, [ALERT_KIND_LABEL]: ALERT_KIND, breach: condition },
            record.timestamp
          )
        );
        break;
      }
    }
    return alerts;
  }
}
