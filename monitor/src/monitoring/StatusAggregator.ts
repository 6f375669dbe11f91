/**
 * Status Aggregator - read-only consolidated view of target health
 *
 * Reads the scheduler's cells at call time; it holds no copy of its own, so
 * every answer reflects the latest completed poll and never waits on a
 * probe in flight.
 */

import type { Scheduler } from "./Scheduler.js";
import type { StatusReader, TargetState, TargetStatus } from "./types.js";

/**
 * Short status label used by GET /monitor
 */
export type StatusLabel = "ok" | "ko" | "unknown";

export interface MonitorView {
  targets: Record<string, TargetStatus>;
  allCriticalOk: boolean;
  timestamp: string;
}

type StatusSource = Pick<Scheduler, "getAllStatuses" | "getStatus" | "getRegistry">;

export function toStatusLabel(state: TargetState): StatusLabel {
  switch (state) {
    case "HEALTHY":
      return "ok";
    case "UNKNOWN":
      return "unknown";
    case "DEGRADED":
    case "FAILING":
      return "ko";
  }
}

export class StatusAggregator implements StatusReader {
  constructor(private readonly source: StatusSource) {}

  getStatus(target: string): TargetStatus | undefined {
    return this.source.getStatus(target);
  }

  /**
   * Every configured target, including ones still UNKNOWN
   */
  getAll(): TargetStatus[] {
    return this.source.getAllStatuses();
  }

  /**
   * True when every critical target is HEALTHY (vacuously true with none)
   */
  allCriticalHealthy(): boolean {
    return this.source
      .getRegistry()
      .criticalTargets()
      .every((name) => this.source.getStatus(name)?.state === "HEALTHY");
  }

  /**
   * Flat `{ <target>: "ok" | "ko" | "unknown", all_critical_ok }` map,
   * or state names when `detailed` is set
   */
  toMonitorResponse(detailed = false): Record<string, string | boolean> {
    const response: Record<string, string | boolean> = {};
    for (const status of this.getAll()) {
      response[status.target] = detailed ? status.state : toStatusLabel(status.state);
    }
    response.all_critical_ok = this.allCriticalHealthy();
    return response;
  }

  snapshot(): MonitorView {
    const targets: Record<string, TargetStatus> = {};
    for (const status of this.getAll()) {
      targets[status.target] = status;
    }
    return {
      targets,
      allCriticalOk: this.allCriticalHealthy(),
      timestamp: new Date().toISOString(),
    };
  }
}
