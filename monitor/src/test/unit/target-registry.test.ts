/**
 * Tests for TargetRegistry
 */

import { describe, it, expect } from "vitest";
import { ConfigError, type TargetDefinition } from "../../config/settings.js";
import { TargetRegistry, sameTarget } from "../../monitoring/TargetRegistry.js";
import { tcpDefinition } from "../fakes/targets.js";

const nasDefinition: TargetDefinition = {
  name: "nas",
  kind: "HTTP",
  url: "http://nas.local:5000/",
  intervalMs: 60000,
  failureThreshold: 3,
  successThreshold: 2,
  critical: true,
  credentials: { username: "admin", passwordEnv: "NAS_PASSWORD" },
};

describe("TargetRegistry", () => {
  it("should keep configuration order and resolve targets by name", () => {
    const registry = TargetRegistry.fromDefinitions([tcpDefinition("vpn"), tcpDefinition("rabbitmq")], {}, 3000);

    expect(registry.list().map((t) => t.name)).toEqual(["vpn", "rabbitmq"]);
    expect(registry.size).toBe(2);
    expect(registry.has("vpn")).toBe(true);
    expect(registry.get("missing")).toBeUndefined();
  });

  it("should reject duplicate target names", () => {
    try {
      TargetRegistry.fromDefinitions([tcpDefinition("vpn"), tcpDefinition("vpn")], {}, 3000);
      expect.fail("expected ConfigError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.issues).toEqual(["duplicate target name 'vpn'"]);
    }
  });

  it("should resolve passwords from the environment", () => {
    const registry = TargetRegistry.fromDefinitions([nasDefinition], { NAS_PASSWORD: "test-secret" }, 3000);
    const nas = registry.get("nas");

    expect(nas?.kind).toBe("HTTP");
    expect(nas?.kind === "HTTP" && nas.credentials).toEqual({ username: "admin", password: "test-secret" });
  });

  it("should fail at load time when a password variable is unset", () => {
    try {
      TargetRegistry.fromDefinitions([nasDefinition], {}, 3000);
      expect.fail("expected ConfigError");
    } catch (err) {
      expect(err instanceof ConfigError && err.issues).toEqual([
        "target 'nas': environment variable NAS_PASSWORD is not set",
      ]);
    }
  });

  it("should apply the default timeout only where none is configured", () => {
    const registry = TargetRegistry.fromDefinitions(
      [tcpDefinition("a", { timeoutMs: undefined }), tcpDefinition("b", { timeoutMs: 750 })],
      {},
      3000
    );

    expect(registry.get("a")?.timeoutMs).toBe(3000);
    expect(registry.get("b")?.timeoutMs).toBe(750);
  });

  it("should list critical targets", () => {
    const registry = TargetRegistry.fromDefinitions(
      [tcpDefinition("vpn", { critical: true }), tcpDefinition("grafana"), tcpDefinition("redis", { critical: true })],
      {},
      3000
    );

    expect(registry.criticalTargets()).toEqual(["vpn", "redis"]);
  });

  it("should freeze targets", () => {
    const registry = TargetRegistry.fromDefinitions([tcpDefinition("vpn")], {}, 3000);

    expect(Object.isFrozen(registry.get("vpn"))).toBe(true);
    expect(Object.isFrozen(registry.list())).toBe(true);
  });

  it("should compare targets by their probe parameters", () => {
    const first = TargetRegistry.fromDefinitions([tcpDefinition("vpn")], {}, 3000).get("vpn");
    const same = TargetRegistry.fromDefinitions([tcpDefinition("vpn")], {}, 3000).get("vpn");
    const moved = TargetRegistry.fromDefinitions([tcpDefinition("vpn", { port: 1195 })], {}, 3000).get("vpn");

    expect(first && same && sameTarget(first, same)).toBe(true);
    expect(first && moved && sameTarget(first, moved)).toBe(false);
  });
});
