/**
 * HTTP status probe
 *
 * GETs the target URL (optionally with basic auth). Healthy when the status
 * is in `expectedStatus`, or any 2xx when none is configured.
 */

import type { HttpTarget, ProbeResult } from "../monitoring/types.js";
import { timedCheck, ProbeFailure, type Probe } from "./Probe.js";

export class HttpProbe implements Probe<HttpTarget> {
  check(target: HttpTarget, signal?: AbortSignal): Promise<ProbeResult> {
    return timedCheck(target, signal, async (innerSignal) => {
      const headers: Record<string, string> = {};
      if (target.credentials) {
        const token = Buffer.from(
          `${target.credentials.username}:${target.credentials.password}`
        ).toString("base64");
        headers.Authorization = `Basic ${token}`;
      }

      const response = await fetch(target.url, {
        method: "GET",
        headers,
        signal: innerSignal,
      });

      // Body is not needed; release the connection
      await response.body?.cancel();

      if (!isExpectedStatus(response.status, target.expectedStatus)) {
        throw new ProbeFailure(`HTTP_${response.status}`);
      }
    });
  }
}

export function isExpectedStatus(status: number, expected?: readonly number[]): boolean {
  if (expected && expected.length > 0) {
    return expected.includes(status);
  }
  return status >= 200 && status < 300;
}
