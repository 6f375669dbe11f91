/**
 * Recovery Actions - pluggable self-healing steps
 *
 * The control plane only sequences actions; what an action does (restart a
 * container, call a hook, ask an operator) lives here. Actions report
 * success or failure and never throw.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import type { RecoveryBinding } from "../config/settings.js";
import { getRecoveryActionTimeout } from "../config/timeouts.js";
import { errorMessage } from "../utils/async.js";
import type { TargetRegistry } from "./TargetRegistry.js";
import type { ActionOutcome, EscalationRecord, Target } from "./types.js";

const execFileAsync = promisify(execFile);

// ============================================================================
// Types
// ============================================================================

/**
 * A recovery step for one failing target
 */
export interface RecoveryAction {
  /** Short identifier used in logs and metrics */
  readonly name: string;
  attempt(target: Target, record: EscalationRecord): Promise<ActionOutcome>;
}

/**
 * Runs an external command; resolves with stdout, rejects on non-zero exit
 */
export type CommandRunner = (
  file: string,
  args: string[],
  timeoutMs: number
) => Promise<{ stdout: string }>;

const defaultRunner: CommandRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs });
  return { stdout };
};

// ============================================================================
// Actions
// ============================================================================

/**
 * Restart a Docker container by name
 */
export class DockerRestartAction implements RecoveryAction {
  readonly name = "docker_restart";

  constructor(
    private readonly container: string,
    private readonly runner: CommandRunner = defaultRunner,
    private readonly timeoutMs: number = getRecoveryActionTimeout()
  ) {}

  async attempt(target: Target): Promise<ActionOutcome> {
    console.log(`[RecoveryActions] Restarting container ${this.container} for ${target.name}`);
    try {
      const { stdout } = await this.runner("docker", ["restart", this.container], this.timeoutMs);
      return { success: true, detail: `container ${this.container} restarted: ${stdout.trim()}` };
    } catch (err) {
      return { success: false, detail: `container ${this.container} restart failed: ${errorMessage(err)}` };
    }
  }
}

/**
 * POST the escalation record to an external recovery hook
 */
export class WebhookRecoveryAction implements RecoveryAction {
  readonly name = "webhook";

  constructor(
    private readonly url: string,
    private readonly headers: Record<string, string> = {}
  ) {}

  async attempt(target: Target, record: EscalationRecord): Promise<ActionOutcome> {
    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({ target: target.name, kind: target.kind, escalation: record }),
      });
      await response.body?.cancel();
      return response.ok
        ? { success: true, detail: `recovery hook accepted (${response.status})` }
        : { success: false, detail: `recovery hook returned ${response.status}` };
    } catch (err) {
      return { success: false, detail: `recovery hook unreachable: ${errorMessage(err)}` };
    }
  }
}

/**
 * For resources that cannot be recovered automatically (tunnels, personal
 * hardware, hosts only reachable by hand). Always fails so escalation proceeds.
 */
export class ManualRecoveryAction implements RecoveryAction {
  readonly name = "manual";

  constructor(private readonly message?: string) {}

  async attempt(target: Target): Promise<ActionOutcome> {
    return {
      success: false,
      detail: this.message ?? `no automatic recovery for ${target.name}: manual intervention required`,
    };
  }
}

export class NoopRecoveryAction implements RecoveryAction {
  readonly name = "noop";

  async attempt(): Promise<ActionOutcome> {
    return { success: true, detail: "no action taken" };
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createRecoveryAction(binding: RecoveryBinding, runner?: CommandRunner): RecoveryAction {
  switch (binding.action) {
    case "docker_restart":
      return new DockerRestartAction(binding.container, runner);
    case "webhook":
      return new WebhookRecoveryAction(binding.url, binding.headers);
    case "manual":
      return new ManualRecoveryAction(binding.message);
    case "noop":
      return new NoopRecoveryAction();
  }
}

/**
 * Resolve the action for every target; unbound targets get `manual`
 */
export function buildRecoveryBindings(
  bindings: Record<string, RecoveryBinding>,
  registry: TargetRegistry,
  runner?: CommandRunner
): Map<string, RecoveryAction> {
  const actions = new Map<string, RecoveryAction>();
  for (const target of registry.list()) {
    const binding = bindings[target.name];
    actions.set(target.name, binding ? createRecoveryAction(binding, runner) : new ManualRecoveryAction());
  }
  return actions;
}
