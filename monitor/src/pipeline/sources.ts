/**
 * Metric sources polled by the producer
 */

import type { StatusAggregator } from "../monitoring/StatusAggregator.js";
import type { TargetState } from "../monitoring/types.js";
import { createMetricRecord, type MetricRecord } from "./MetricRecord.js";

export interface MetricSource {
  readonly name: string;
  collect(signal?: AbortSignal): Promise<MetricRecord[]>;
}

const STATE_CODES: Record<TargetState, number> = {
  UNKNOWN: 0,
  HEALTHY: 1,
  DEGRADED: 2,
  FAILING: 3,
};

/**
 * Snapshot of the aggregated target status:
 * `target_up`, `target_state`, `probe_latency_ms` per target and `all_critical_ok`
 */
export class StatusSnapshotSource implements MetricSource {
  readonly name = "status";

  constructor(
    private readonly aggregator: Pick<StatusAggregator, "getAll" | "allCriticalHealthy">,
    private readonly now: () => number = Date.now
  ) {}

  async collect(): Promise<MetricRecord[]> {
    const timestamp = this.now();
    const records: MetricRecord[] = [];

    for (const status of this.aggregator.getAll()) {
      const labels = { target: status.target };
      records.push(createMetricRecord("target_up", status.state === "HEALTHY" ? 1 : 0, labels, timestamp));
      records.push(createMetricRecord("target_state", STATE_CODES[status.state], labels, timestamp));

      const latency = status.lastResult?.latencyMs;
      if (latency !== undefined) {
        records.push(createMetricRecord("probe_latency_ms", latency, labels, timestamp));
      }
    }

    records.push(createMetricRecord("all_critical_ok", this.aggregator.allCriticalHealthy() ? 1 : 0, {}, timestamp));
    return records;
  }
}
