/**
 * Target Registry - immutable set of monitored targets
 *
 * Built once from validated settings. Reload builds a new registry and the
 * scheduler swaps it in; an existing registry is never mutated.
 */

import { ConfigError, type TargetDefinition } from "../config/settings.js";
import { getProbeTimeout } from "../config/timeouts.js";
import type { Credentials, Target } from "./types.js";

type Env = Record<string, string | undefined>;

type CredentialsDefinition = NonNullable<Extract<TargetDefinition, { kind: "HTTP" }>["credentials"]>;

export class TargetRegistry {
  private readonly ordered: readonly Target[];
  private readonly byName: ReadonlyMap<string, Target>;

  private constructor(targets: Target[]) {
    this.ordered = Object.freeze(targets.map((t) => Object.freeze(t)));
    this.byName = new Map(this.ordered.map((t) => [t.name, t]));
  }

  /**
   * Build a registry from target definitions.
   * Throws ConfigError on duplicate names or unresolvable credentials.
   */
  static fromDefinitions(
    definitions: readonly TargetDefinition[],
    env: Env = process.env,
    defaultTimeoutMs: number = getProbeTimeout()
  ): TargetRegistry {
    const issues: string[] = [];
    const seen = new Set<string>();
    const targets: Target[] = [];

    for (const def of definitions) {
      if (seen.has(def.name)) {
        issues.push(`duplicate target name '${def.name}'`);
        continue;
      }
      seen.add(def.name);

      const base = {
        name: def.name,
        intervalMs: def.intervalMs,
        timeoutMs: def.timeoutMs ?? defaultTimeoutMs,
        failureThreshold: def.failureThreshold,
        successThreshold: def.successThreshold,
        critical: def.critical,
      };

      switch (def.kind) {
        case "TCP":
          targets.push({ ...base, kind: "TCP", host: def.host, port: def.port });
          break;

        case "HTTP": {
          const credentials = resolveCredentials(def.name, def.credentials, env, issues);
          targets.push({
            ...base,
            kind: "HTTP",
            url: def.url,
            ...(credentials && { credentials }),
            ...(def.expectedStatus && { expectedStatus: Object.freeze([...def.expectedStatus]) }),
          });
          break;
        }

        case "NATIVE_DRIVER": {
          const credentials = resolveCredentials(def.name, def.credentials, env, issues);
          targets.push({
            ...base,
            kind: "NATIVE_DRIVER",
            driver: def.driver,
            url: def.url,
            ...(credentials && { credentials }),
          });
          break;
        }
      }
    }

    if (issues.length > 0) {
      throw new ConfigError("Invalid target definitions", issues);
    }

    return new TargetRegistry(targets);
  }

  /**
   * Targets in configuration order
   */
  list(): readonly Target[] {
    return this.ordered;
  }

  get(name: string): Target | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * Names of targets flagged as critical
   */
  criticalTargets(): string[] {
    return this.ordered.filter((t) => t.critical).map((t) => t.name);
  }
}

function resolveCredentials(
  target: string,
  def: CredentialsDefinition | undefined,
  env: Env,
  issues: string[]
): Credentials | undefined {
  if (!def) return undefined;

  if (def.password !== undefined) {
    return { username: def.username, password: def.password };
  }

  const variable = def.passwordEnv ?? "";
  const password = env[variable];
  if (password === undefined || password === "") {
    issues.push(`target '${target}': environment variable ${variable} is not set`);
    return undefined;
  }
  return { username: def.username, password };
}

/**
 * Whether two target definitions would probe identically
 */
export function sameTarget(a: Target, b: Target): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
