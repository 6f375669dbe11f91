import type { MetricRecord } from "../../pipeline/MetricRecord.js";
import type { MetricsSink } from "../../pipeline/MetricsSink.js";

/**
 * Sink stand-in; `failNext` makes the next N writes reject
 */
export class InMemorySink implements MetricsSink {
  readonly documents = new Map<string, MetricRecord>();
  writeAttempts = 0;
  failNext = 0;
  failAlways = false;

  async write(key: string, record: MetricRecord): Promise<boolean> {
    this.writeAttempts++;
    if (this.failAlways || this.failNext > 0) {
      this.failNext = Math.max(0, this.failNext - 1);
      throw new Error("sink unavailable");
    }
    if (this.documents.has(key)) {
      return false;
    }
    this.documents.set(key, record);
    return true;
  }

  async close(): Promise<void> {}
}
