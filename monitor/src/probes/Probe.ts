/**
 * Probe contract and the timing/timeout harness shared by every variant
 */

import type { ProbeResult, Target } from "../monitoring/types.js";
import { TimeoutError, errorMessage, withTimeout } from "../utils/async.js";

/**
 * One bounded health check against a target
 */
export interface Probe<T extends Target = Target> {
  check(target: T, signal?: AbortSignal): Promise<ProbeResult>;
}

/**
 * A check that failed with a protocol-level reason (e.g. `HTTP_503`)
 */
export class ProbeFailure extends Error {
  constructor(public readonly reason: string) {
    super(reason);
    this.name = "ProbeFailure";
  }
}

/**
 * Run `attempt` under the target's timeout and convert the outcome into a
 * ProbeResult. Never rejects.
 */
export async function timedCheck(
  target: Target,
  signal: AbortSignal | undefined,
  attempt: (signal: AbortSignal) => Promise<void>
): Promise<ProbeResult> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });
  if (signal?.aborted) {
    controller.abort();
  }

  const startTime = Date.now();

  try {
    await withTimeout(attempt(controller.signal), target.timeoutMs, `probe ${target.name}`);
    return {
      target: target.name,
      timestamp: Date.now(),
      success: true,
      latencyMs: Date.now() - startTime,
    };
  } catch (error) {
    return {
      target: target.name,
      timestamp: Date.now(),
      success: false,
      latencyMs: Date.now() - startTime,
      reason: classifyFailure(error, signal),
    };
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
    // Releases sockets/requests still bound to the signal after a timeout
    controller.abort();
  }
}

/**
 * Map a thrown value to a failure reason
 */
export function classifyFailure(error: unknown, signal?: AbortSignal): string {
  if (error instanceof TimeoutError) {
    return "TIMEOUT";
  }
  if (error instanceof ProbeFailure) {
    return error.reason;
  }
  if (signal?.aborted) {
    return "ABORTED";
  }

  const code = errorCode(error);
  if (code === "ECONNREFUSED") return "CONNECTION_REFUSED";
  if (code === "ETIMEDOUT" || code === "UND_ERR_CONNECT_TIMEOUT") return "TIMEOUT";
  if (code === "ENOTFOUND" || code === "EAI_AGAIN") return "DNS_LOOKUP_FAILED";
  if (code === "ECONNRESET") return "CONNECTION_RESET";

  return errorMessage(error);
}

/**
 * Node error code of an error or its `cause` (fetch wraps socket errors)
 */
function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}
