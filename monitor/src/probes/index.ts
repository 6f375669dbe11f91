/**
 * Probe variants and the dispatcher that picks one by target kind
 */

import type { ProbeResult, Target, TcpTarget, HttpTarget, NativeDriverTarget } from "../monitoring/types.js";
import { HttpProbe } from "./HttpProbe.js";
import { NativeDriverProbe } from "./NativeDriverProbe.js";
import type { Probe } from "./Probe.js";
import { TcpProbe } from "./TcpProbe.js";

export interface ProbeVariants {
  TCP: Probe<TcpTarget>;
  HTTP: Probe<HttpTarget>;
  NATIVE_DRIVER: Probe<NativeDriverTarget>;
}

/**
 * Routes each target to the variant for its kind. This is the only place
 * that branches on the probe kind.
 */
export class ProbeDispatcher implements Probe {
  private readonly variants: ProbeVariants;

  constructor(variants: Partial<ProbeVariants> = {}) {
    this.variants = {
      TCP: variants.TCP ?? new TcpProbe(),
      HTTP: variants.HTTP ?? new HttpProbe(),
      NATIVE_DRIVER: variants.NATIVE_DRIVER ?? new NativeDriverProbe(),
    };
  }

  check(target: Target, signal?: AbortSignal): Promise<ProbeResult> {
    switch (target.kind) {
      case "TCP":
        return this.variants.TCP.check(target, signal);
      case "HTTP":
        return this.variants.HTTP.check(target, signal);
      case "NATIVE_DRIVER":
        return this.variants.NATIVE_DRIVER.check(target, signal);
    }
  }
}

export { TcpProbe } from "./TcpProbe.js";
export { HttpProbe, isExpectedStatus } from "./HttpProbe.js";
export { NativeDriverProbe, pingRedis, pingNeo4j, pingQdrant, type DriverPing } from "./NativeDriverProbe.js";
export { timedCheck, classifyFailure, ProbeFailure, type Probe } from "./Probe.js";
