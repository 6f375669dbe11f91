/**
 * Scheduler - Independent per-target polling loops
 *
 * Each target runs its own cancellable loop at its configured interval (plus
 * jitter). A loop probes, folds the result into the target's status cell and
 * emits one TransitionEvent when the state changes.
 *
 * Status cells are immutable objects swapped in a single synchronous step, so
 * readers never observe a half-updated status and a slow probe on one target
 * never holds up another.
 */

import { getShutdownGrace } from "../config/timeouts.js";
import { classifyFailure, type Probe } from "../probes/index.js";
import { jitter, sleep } from "../utils/async.js";
import { metrics } from "./metrics.js";
import { sameTarget, type TargetRegistry } from "./TargetRegistry.js";
import type {
  ProbeResult,
  StatusReader,
  Target,
  TargetState,
  TargetStatus,
  TransitionEvent,
} from "./types.js";

// ============================================================================
// State policy
// ============================================================================

/**
 * State implied by the consecutive counters once at least one result exists
 */
export function deriveState(
  consecutiveFailures: number,
  consecutiveSuccesses: number,
  target: Pick<Target, "failureThreshold" | "successThreshold">
): TargetState {
  if (consecutiveFailures >= target.failureThreshold) {
    return "FAILING";
  }
  if (consecutiveSuccesses >= target.successThreshold) {
    return "HEALTHY";
  }
  return "DEGRADED";
}

/**
 * Fold one probe result into a status. Returns a new object.
 */
export function applyProbeResult(
  previous: TargetStatus,
  result: ProbeResult,
  target: Pick<Target, "failureThreshold" | "successThreshold">
): TargetStatus {
  const consecutiveFailures = result.success ? 0 : previous.consecutiveFailures + 1;
  const consecutiveSuccesses = result.success ? previous.consecutiveSuccesses + 1 : 0;
  const state = deriveState(consecutiveFailures, consecutiveSuccesses, target);

  return {
    target: previous.target,
    state,
    consecutiveFailures,
    consecutiveSuccesses,
    // Transition timestamps never go backwards for a target
    lastTransitionAt:
      state === previous.state
        ? previous.lastTransitionAt
        : Math.max(result.timestamp, previous.lastTransitionAt),
    lastResult: result,
  };
}

export function initialStatus(target: string, now: number): TargetStatus {
  return {
    target,
    state: "UNKNOWN",
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    lastTransitionAt: now,
  };
}

// ============================================================================
// Scheduler
// ============================================================================

export type TransitionListener = (event: TransitionEvent) => void;

export interface SchedulerConfig {
  registry: TargetRegistry;
  probe: Probe;
  /** Fraction of the interval used as random jitter (default 0.1) */
  jitterRatio?: number | undefined;
  random?: (() => number) | undefined;
  now?: (() => number) | undefined;
}

interface PollingLoop {
  controller: AbortController;
  done: Promise<void>;
}

export class Scheduler implements StatusReader {
  private registry: TargetRegistry;
  private readonly probe: Probe;
  private readonly jitterRatio: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly cells = new Map<string, TargetStatus>();
  private readonly loops = new Map<string, PollingLoop>();
  private readonly retiring = new Set<Promise<void>>();
  private readonly listeners = new Set<TransitionListener>();
  private running = false;

  constructor(config: SchedulerConfig) {
    this.registry = config.registry;
    this.probe = config.probe;
    this.jitterRatio = config.jitterRatio ?? 0.1;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;

    for (const target of this.registry.list()) {
      this.cells.set(target.name, initialStatus(target.name, this.now()));
      metrics.setTargetState(target.name, "UNKNOWN");
    }
  }

  /**
   * Subscribe to transition events. Returns an unsubscribe function.
   */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Start one polling loop per target
   */
  start(): void {
    if (this.running) {
      console.warn("[Scheduler] Already running");
      return;
    }
    this.running = true;

    for (const target of this.registry.list()) {
      this.startLoop(target);
    }
    console.log(`[Scheduler] Started ${this.registry.size} polling loops`);
  }

  /**
   * Cancel every loop and wait (up to the grace period) for in-flight
   * iterations to settle. Results arriving after cancellation are discarded.
   */
  async stop(graceMs: number = getShutdownGrace()): Promise<void> {
    if (!this.running) return;
    this.running = false;

    for (const loop of this.loops.values()) {
      loop.controller.abort();
    }
    const pending = [...[...this.loops.values()].map((l) => l.done), ...this.retiring];
    this.loops.clear();

    const graceTimer = new AbortController();
    const settled = await Promise.race([
      Promise.allSettled(pending).then(() => true),
      sleep(graceMs, graceTimer.signal).then(() => false),
    ]);
    graceTimer.abort();
    if (!settled) {
      console.warn(`[Scheduler] ${pending.length} loops still busy after ${graceMs}ms grace, abandoning`);
    }
    console.log("[Scheduler] Stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one probe for a target and apply its result
   */
  async pollOnce(target: Target, signal?: AbortSignal): Promise<TransitionEvent | undefined> {
    let result: ProbeResult;
    try {
      result = await this.probe.check(target, signal);
    } catch (error) {
      // Probes report failures as results; this covers a misbehaving variant
      result = {
        target: target.name,
        timestamp: this.now(),
        success: false,
        reason: classifyFailure(error, signal),
      };
    }

    if (signal?.aborted) {
      return undefined;
    }
    return this.applyResult(target, result);
  }

  /**
   * Fold a result into the target's cell in one synchronous step
   */
  applyResult(target: Target, result: ProbeResult): TransitionEvent | undefined {
    // Results for targets dropped by a reload are ignored
    if (this.registry.get(target.name) !== target) {
      return undefined;
    }

    const previous = this.cells.get(target.name) ?? initialStatus(target.name, this.now());
    const next = applyProbeResult(previous, result, target);
    this.cells.set(target.name, next);

    metrics.recordProbe(target.name, result.success, result.latencyMs);

    if (next.state === previous.state) {
      return undefined;
    }

    const event: TransitionEvent = {
      target: target.name,
      from: previous.state,
      to: next.state,
      timestamp: next.lastTransitionAt,
    };

    metrics.setTargetState(target.name, next.state);
    metrics.recordTransition(target.name, event.from, event.to);
    const detail = result.reason ? ` (${result.reason})` : "";
    const line = `[Scheduler] ${target.name}: ${event.from} -> ${event.to}${detail}`;
    if (event.to === "FAILING") {
      console.warn(line);
    } else {
      console.log(line);
    }

    this.emit(event);
    return event;
  }

  getStatus(target: string): TargetStatus | undefined {
    return this.cells.get(target);
  }

  /**
   * Current status of every target, in registry order
   */
  getAllStatuses(): TargetStatus[] {
    return this.registry
      .list()
      .map((t) => this.cells.get(t.name) ?? initialStatus(t.name, this.now()));
  }

  getRegistry(): TargetRegistry {
    return this.registry;
  }

  /**
   * Swap in a new registry. Removed targets stop, added targets start, and
   * targets whose definition changed restart from UNKNOWN.
   */
  replaceRegistry(next: TargetRegistry): void {
    const previous = this.registry;
    this.registry = next;

    for (const old of previous.list()) {
      const replacement = next.get(old.name);
      if (replacement && sameTarget(old, replacement)) {
        continue;
      }
      this.retireLoop(old.name);
      this.cells.delete(old.name);
      metrics.removeTarget(old.name);
    }

    for (const target of next.list()) {
      const old = previous.get(target.name);
      if (old && sameTarget(old, target)) {
        continue;
      }
      this.cells.set(target.name, initialStatus(target.name, this.now()));
      metrics.setTargetState(target.name, "UNKNOWN");
      if (this.running) {
        this.startLoop(target);
      }
    }

    console.log(`[Scheduler] Registry replaced (${next.size} targets)`);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private startLoop(target: Target): void {
    const controller = new AbortController();
    const done = this.runLoop(target, controller.signal).catch((err: unknown) => {
      console.error(`[Scheduler] Loop for ${target.name} crashed:`, err);
    });
    this.loops.set(target.name, { controller, done });
  }

  private retireLoop(name: string): void {
    const loop = this.loops.get(name);
    if (!loop) return;

    loop.controller.abort();
    this.loops.delete(name);
    this.retiring.add(loop.done);
    void loop.done.finally(() => this.retiring.delete(loop.done));
  }

  private async runLoop(target: Target, signal: AbortSignal): Promise<void> {
    // Stagger first checks so targets sharing an interval do not fire together
    if (!(await sleep(this.jitterFor(target), signal))) return;

    while (!signal.aborted) {
      await this.pollOnce(target, signal);
      if (!(await sleep(target.intervalMs + this.jitterFor(target), signal))) return;
    }
  }

  private jitterFor(target: Target): number {
    return jitter(target.intervalMs * this.jitterRatio, this.random);
  }

  private emit(event: TransitionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[Scheduler] Transition listener failed for ${event.target}:`, err);
      }
    }
  }
}
