/**
 * Monitoring domain types shared by probes, scheduler, aggregator and control plane
 */

// ============================================================================
// Targets
// ============================================================================

/**
 * Probe protocol of a target
 */
export type ProbeKind = "TCP" | "HTTP" | "NATIVE_DRIVER";

/**
 * Client libraries available to NATIVE_DRIVER probes
 */
export type NativeDriver = "redis" | "neo4j" | "qdrant";

export interface Credentials {
  username: string;
  password: string;
}

interface TargetBase {
  /** Unique target identity */
  name: string;
  /** Polling interval in ms */
  intervalMs: number;
  /** Probe timeout in ms */
  timeoutMs: number;
  /** Consecutive failures before FAILING */
  failureThreshold: number;
  /** Consecutive successes before HEALTHY */
  successThreshold: number;
  /** Whether this target counts toward `all_critical_ok` */
  critical: boolean;
}

export interface TcpTarget extends TargetBase {
  kind: "TCP";
  host: string;
  port: number;
}

export interface HttpTarget extends TargetBase {
  kind: "HTTP";
  url: string;
  credentials?: Credentials | undefined;
  /** Accepted status codes; any 2xx when absent */
  expectedStatus?: readonly number[] | undefined;
}

export interface NativeDriverTarget extends TargetBase {
  kind: "NATIVE_DRIVER";
  driver: NativeDriver;
  url: string;
  credentials?: Credentials | undefined;
}

export type Target = TcpTarget | HttpTarget | NativeDriverTarget;

// ============================================================================
// Probe results and status
// ============================================================================

/**
 * Outcome of one probe execution
 */
export interface ProbeResult {
  target: string;
  /** Epoch ms at probe completion */
  timestamp: number;
  success: boolean;
  latencyMs?: number | undefined;
  /** `TIMEOUT`, `CONNECTION_REFUSED`, `HTTP_<status>` or a driver message */
  reason?: string | undefined;
}

export type TargetState = "UNKNOWN" | "HEALTHY" | "DEGRADED" | "FAILING";

/**
 * Live status of one target. Replaced as a whole on every update.
 */
export interface TargetStatus {
  target: string;
  state: TargetState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** Epoch ms of the last state change (load time while UNKNOWN) */
  lastTransitionAt: number;
  lastResult?: ProbeResult | undefined;
}

/**
 * Emitted once per actual state change of a target
 */
export interface TransitionEvent {
  target: string;
  from: TargetState;
  to: TargetState;
  timestamp: number;
}

// ============================================================================
// Escalation
// ============================================================================

export type EscalationLevel = "NONE" | "WARN" | "RETRY" | "ESCALATE" | "NOTIFIED";

export const ESCALATION_ORDER: readonly EscalationLevel[] = [
  "NONE",
  "WARN",
  "RETRY",
  "ESCALATE",
  "NOTIFIED",
];

export interface EscalationRecord {
  target: string;
  level: EscalationLevel;
  /** Epoch ms the current level was entered */
  enteredAt: number;
  /** Failed recovery attempts while in RETRY */
  retryCount: number;
}

/**
 * Result of a recovery or notification action
 */
export interface ActionOutcome {
  success: boolean;
  detail: string;
}

/**
 * Read access to live target status
 */
export interface StatusReader {
  getStatus(target: string): TargetStatus | undefined;
}
