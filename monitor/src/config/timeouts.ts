/**
 * Centralized timeout configuration
 *
 * Every suspension point in the monitor is bounded by one of these values:
 * - Probes (TCP connect, HTTP request, driver ping)
 * - Recovery and notification actions
 * - Broker publish confirmation
 * - Sink writes
 * - Shutdown grace period
 *
 * All timeouts are configurable via environment variables.
 */

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Default timeout values (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /**
   * Single probe execution
   * Default: 3000ms, the connect/request budget of one health check
   */
  probe: envInt("PROBE_TIMEOUT", 3000),

  /**
   * Recovery or notification action
   * Default: 120000ms (container restarts can be slow)
   */
  recoveryAction: envInt("RECOVERY_ACTION_TIMEOUT", 120000),

  /**
   * Broker acknowledgment of a publish
   * Default: 5000ms
   */
  publishConfirm: envInt("PUBLISH_CONFIRM_TIMEOUT", 5000),

  /**
   * Sink write of one record
   * Default: 5000ms
   */
  sinkWrite: envInt("SINK_WRITE_TIMEOUT", 5000),

  /**
   * Time allowed for loops to finish in-flight work on shutdown
   * Default: 10000ms
   */
  shutdownGrace: envInt("SHUTDOWN_GRACE_MS", 10000),
} as const;

export function getProbeTimeout(): number {
  return DEFAULT_TIMEOUTS.probe;
}

export function getRecoveryActionTimeout(): number {
  return DEFAULT_TIMEOUTS.recoveryAction;
}

export function getPublishConfirmTimeout(): number {
  return DEFAULT_TIMEOUTS.publishConfirm;
}

export function getSinkWriteTimeout(): number {
  return DEFAULT_TIMEOUTS.sinkWrite;
}

export function getShutdownGrace(): number {
  return DEFAULT_TIMEOUTS.shutdownGrace;
}
