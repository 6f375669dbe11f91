/**
 * TCP reachability probe - succeeds once a socket connects
 */

import * as net from "net";
import type { TcpTarget, ProbeResult } from "../monitoring/types.js";
import { AbortedError } from "../utils/async.js";
import { timedCheck, type Probe } from "./Probe.js";

export class TcpProbe implements Probe<TcpTarget> {
  check(target: TcpTarget, signal?: AbortSignal): Promise<ProbeResult> {
    return timedCheck(target, signal, (innerSignal) => connect(target.host, target.port, innerSignal));
  }
}

function connect(host: string, port: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });

    const cleanup = (): void => {
      signal.removeEventListener("abort", onAbort);
      socket.removeAllListeners();
      socket.destroy();
    };

    const onAbort = (): void => {
      cleanup();
      reject(new AbortedError(`TCP connect to ${host}:${port} aborted`));
    };

    socket.once("connect", () => {
      cleanup();
      resolve();
    });
    socket.once("error", (err) => {
      cleanup();
      reject(err);
    });

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
