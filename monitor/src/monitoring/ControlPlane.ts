/**
 * Control Plane - per-target escalation state machine
 *
 *   NONE -> WARN -> RETRY -> ESCALATE -> NOTIFIED
 *
 * - NONE -> WARN:         first FAILING transition; the bound recovery action runs once
 * - WARN -> RETRY:        target still FAILING after the grace period
 * - RETRY -> RETRY:       another recovery attempt each grace period; failures count
 * - RETRY -> ESCALATE:    retry counter reaches maxRetries
 * - ESCALATE -> NOTIFIED: notifier succeeded (retried every grace period until it does)
 * - any -> NONE:          HEALTHY transition for the target
 *
 * Events and timer ticks for one target run through a per-target serial
 * queue, so escalation decisions are made in probe order.
 */

import { getRecoveryActionTimeout, getShutdownGrace } from "../config/timeouts.js";
import { errorMessage, sleep, withTimeout } from "../utils/async.js";
import { KeyedSerialQueue } from "../utils/KeyedSerialQueue.js";
import { metrics } from "./metrics.js";
import type { RecoveryAction } from "./RecoveryActions.js";
import type { TargetRegistry } from "./TargetRegistry.js";
import type {
  ActionOutcome,
  EscalationLevel,
  EscalationRecord,
  StatusReader,
  Target,
  TransitionEvent,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Escalation/notification capability (paging, chat alert, ...)
 */
export interface EscalationNotifier {
  notify(
    target: Target,
    record: EscalationRecord,
    history: readonly RecoveryAttempt[]
  ): Promise<ActionOutcome>;
  /** Called when an escalated target becomes HEALTHY again */
  resolved?(target: Target, record: EscalationRecord): Promise<void>;
}

/**
 * One recovery or notification invocation
 */
export interface RecoveryAttempt {
  target: string;
  action: string;
  level: EscalationLevel;
  success: boolean;
  detail: string;
  timestamp: string;
}

export interface ControlPlaneConfig {
  registry: TargetRegistry;
  status: StatusReader;
  actions: ReadonlyMap<string, RecoveryAction>;
  notifier: EscalationNotifier;
  /** Wait between recovery attempts, in ms (default 60000) */
  gracePeriodMs?: number | undefined;
  /** Failed RETRY attempts before escalating (default 3) */
  maxRetries?: number | undefined;
  actionTimeoutMs?: number | undefined;
  /** Attempts kept per target (default 50) */
  maxHistory?: number | undefined;
  now?: (() => number) | undefined;
}

// ============================================================================
// Control Plane
// ============================================================================

export class ControlPlane {
  private registry: TargetRegistry;
  private actions: ReadonlyMap<string, RecoveryAction>;
  private readonly status: StatusReader;
  private readonly notifier: EscalationNotifier;
  private readonly gracePeriodMs: number;
  private readonly maxRetries: number;
  private readonly actionTimeoutMs: number;
  private readonly maxHistory: number;
  private readonly now: () => number;

  private readonly records = new Map<string, EscalationRecord>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  /** Whether the latest RETRY attempt was already counted as failed */
  private readonly attemptCounted = new Map<string, boolean>();
  private readonly history = new Map<string, RecoveryAttempt[]>();
  private readonly queue = new KeyedSerialQueue();
  private stopped = false;

  constructor(config: ControlPlaneConfig) {
    this.registry = config.registry;
    this.actions = config.actions;
    this.status = config.status;
    this.notifier = config.notifier;
    this.gracePeriodMs = config.gracePeriodMs ?? 60000;
    this.maxRetries = config.maxRetries ?? 3;
    this.actionTimeoutMs = config.actionTimeoutMs ?? getRecoveryActionTimeout();
    this.maxHistory = config.maxHistory ?? 50;
    this.now = config.now ?? Date.now;
  }

  /**
   * Queue a transition for processing after earlier events of the same target
   */
  handleTransition(event: TransitionEvent): Promise<void> {
    return this.queue.run(event.target, () => this.processTransition(event));
  }

  /**
   * Listener suitable for Scheduler.onTransition
   */
  listener(): (event: TransitionEvent) => void {
    return (event) => {
      this.handleTransition(event).catch((err: unknown) => {
        console.error(`[ControlPlane] Failed to process ${event.target} transition:`, err);
      });
    };
  }

  getRecord(target: string): EscalationRecord {
    return this.records.get(target) ?? this.noneRecord(target);
  }

  /**
   * Records of every registered target, in registry order
   */
  getAllRecords(): EscalationRecord[] {
    return this.registry.list().map((t) => this.getRecord(t.name));
  }

  /**
   * Recovery history, newest first
   */
  getRecoveryHistory(target?: string): RecoveryAttempt[] {
    const attempts = target
      ? [...(this.history.get(target) ?? [])]
      : [...this.history.values()].flat();
    return attempts.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  /**
   * Adopt a reloaded registry: forget removed targets, rebind actions
   */
  retain(registry: TargetRegistry, actions: ReadonlyMap<string, RecoveryAction>): void {
    this.registry = registry;
    this.actions = actions;
    for (const name of [...this.records.keys()]) {
      if (!registry.has(name)) {
        this.cancelTimer(name);
        this.records.delete(name);
        this.attemptCounted.delete(name);
        this.history.delete(name);
      }
    }
  }

  /**
   * Resolve once all queued work has settled
   */
  idle(): Promise<void> {
    return this.queue.drain();
  }

  /**
   * Cancel pending grace timers and wait (up to the grace period) for
   * queued actions. Actions still running afterwards are abandoned.
   */
  async stop(graceMs: number = getShutdownGrace()): Promise<void> {
    this.stopped = true;
    for (const name of [...this.timers.keys()]) {
      this.cancelTimer(name);
    }

    const graceTimer = new AbortController();
    const settled = await Promise.race([
      this.queue.drain().then(() => true),
      sleep(graceMs, graceTimer.signal).then(() => false),
    ]);
    graceTimer.abort();
    if (!settled) {
      console.warn(`[ControlPlane] ${this.queue.pendingKeys} targets still busy after ${graceMs}ms grace, abandoning`);
    }
    console.log("[ControlPlane] Stopped");
  }

  // ==========================================================================
  // State machine
  // ==========================================================================

  private async processTransition(event: TransitionEvent): Promise<void> {
    const current = this.getRecord(event.target);

    if (event.to === "HEALTHY") {
      this.cancelTimer(event.target);
      if (current.level === "NONE") return;

      const reset = this.setLevel(event.target, "NONE", { retryCount: 0 });
      this.attemptCounted.delete(event.target);
      console.log(`[ControlPlane] ${event.target} recovered, escalation reset (was ${current.level})`);

      const target = this.registry.get(event.target);
      if (target && (current.level === "ESCALATE" || current.level === "NOTIFIED") && this.notifier.resolved) {
        try {
          await withTimeout(this.notifier.resolved(target, reset), this.actionTimeoutMs, "resolved notification");
        } catch (err) {
          console.error(`[ControlPlane] Recovery notification for ${event.target} failed:`, errorMessage(err));
        }
      }
      return;
    }

    if (event.to === "FAILING" && current.level === "NONE") {
      const record = this.setLevel(event.target, "WARN", { retryCount: 0 });
      await this.runRecovery(event.target, record);
      this.scheduleGrace(event.target);
    }
  }

  private async advance(name: string): Promise<void> {
    const record = this.records.get(name);
    if (!record || record.level === "NONE" || record.level === "NOTIFIED") return;

    // Only a target that is still FAILING moves up; a recovering one gets more time
    if (this.status.getStatus(name)?.state !== "FAILING") {
      this.scheduleGrace(name);
      return;
    }

    switch (record.level) {
      case "WARN": {
        const retrying = this.setLevel(name, "RETRY", { retryCount: 0 });
        await this.retry(name, retrying);
        return;
      }

      case "RETRY": {
        let retryCount = record.retryCount;
        if (!this.attemptCounted.get(name)) {
          // The action reported success but the target is still failing
          retryCount++;
        }
        if (retryCount >= this.maxRetries) {
          await this.escalate(name, retryCount);
        } else {
          const updated = this.update(name, { retryCount });
          await this.retry(name, updated);
        }
        return;
      }

      case "ESCALATE":
        await this.escalate(name, record.retryCount);
        return;
    }
  }

  private async retry(name: string, record: EscalationRecord): Promise<void> {
    const outcome = await this.runRecovery(name, record);
    if (outcome && !outcome.success) {
      this.update(name, { retryCount: record.retryCount + 1 });
      this.attemptCounted.set(name, true);
    } else {
      this.attemptCounted.set(name, false);
    }
    this.scheduleGrace(name);
  }

  private async escalate(name: string, retryCount: number): Promise<void> {
    const target = this.registry.get(name);
    if (!target) return;

    const record =
      this.getRecord(name).level === "ESCALATE"
        ? this.update(name, { retryCount })
        : this.setLevel(name, "ESCALATE", { retryCount });

    const outcome = await this.invoke("notify", () =>
      this.notifier.notify(target, record, this.history.get(name) ?? [])
    );
    this.recordAttempt(name, "notify", record.level, outcome);

    if (outcome.success) {
      this.setLevel(name, "NOTIFIED", {});
    } else {
      console.error(`[ControlPlane] Escalation notification for ${name} failed: ${outcome.detail}`);
      this.scheduleGrace(name);
    }
  }

  private async runRecovery(name: string, record: EscalationRecord): Promise<ActionOutcome | undefined> {
    const target = this.registry.get(name);
    const action = this.actions.get(name);
    if (!target || !action) {
      console.warn(`[ControlPlane] No recovery action bound for ${name}`);
      return undefined;
    }

    const outcome = await this.invoke(action.name, () => action.attempt(target, record));
    this.recordAttempt(name, action.name, record.level, outcome);
    metrics.recordRecoveryAttempt(name, action.name, outcome.success);

    const line = `[ControlPlane] ${action.name} for ${name} (${record.level}): ${outcome.success ? "SUCCESS" : "FAILED"} - ${outcome.detail}`;
    if (outcome.success) {
      console.log(line);
    } else {
      console.error(line);
    }
    return outcome;
  }

  /**
   * Run an external action under the timeout; throws become failures
   */
  private async invoke(label: string, fn: () => Promise<ActionOutcome>): Promise<ActionOutcome> {
    try {
      return await withTimeout(fn(), this.actionTimeoutMs, label);
    } catch (err) {
      return { success: false, detail: errorMessage(err) };
    }
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  private setLevel(
    name: string,
    level: EscalationLevel,
    patch: Partial<Pick<EscalationRecord, "retryCount">>
  ): EscalationRecord {
    const previous = this.getRecord(name);
    const record: EscalationRecord = {
      target: name,
      level,
      enteredAt: this.now(),
      retryCount: patch.retryCount ?? previous.retryCount,
    };
    this.records.set(name, record);
    metrics.setEscalationLevel(name, level);

    if (level !== "NONE") {
      const line = `[ControlPlane] ${name}: ${previous.level} -> ${level} (retries ${record.retryCount})`;
      if (level === "ESCALATE" || level === "NOTIFIED") {
        console.error(line);
      } else {
        console.warn(line);
      }
    }
    return record;
  }

  private update(name: string, patch: Pick<EscalationRecord, "retryCount">): EscalationRecord {
    const record: EscalationRecord = { ...this.getRecord(name), ...patch };
    this.records.set(name, record);
    return record;
  }

  private recordAttempt(name: string, action: string, level: EscalationLevel, outcome: ActionOutcome): void {
    const attempts = this.history.get(name) ?? [];
    attempts.push({
      target: name,
      action,
      level,
      success: outcome.success,
      detail: outcome.detail,
      timestamp: new Date(this.now()).toISOString(),
    });
    if (attempts.length > this.maxHistory) {
      attempts.shift();
    }
    this.history.set(name, attempts);
  }

  private scheduleGrace(name: string): void {
    if (this.stopped) return;
    this.cancelTimer(name);

    const timer = setTimeout(() => {
      this.timers.delete(name);
      this.queue.run(name, () => this.advance(name)).catch((err: unknown) => {
        console.error(`[ControlPlane] Escalation step for ${name} failed:`, err);
      });
    }, this.gracePeriodMs);
    this.timers.set(name, timer);
  }

  private cancelTimer(name: string): void {
    const timer = this.timers.get(name);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(name);
    }
  }

  private noneRecord(target: string): EscalationRecord {
    return { target, level: "NONE", enteredAt: 0, retryCount: 0 };
  }
}
