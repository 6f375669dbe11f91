/**
 * Tests for the recovery action implementations and bindings
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DockerRestartAction,
  ManualRecoveryAction,
  NoopRecoveryAction,
  WebhookRecoveryAction,
  buildRecoveryBindings,
  type CommandRunner,
} from "../../monitoring/RecoveryActions.js";
import type { EscalationRecord, Target } from "../../monitoring/types.js";
import { registryOf, tcpDefinition } from "../fakes/targets.js";

const registry = registryOf(tcpDefinition("rabbitmq", { port: 5672 }), tcpDefinition("vpn"));

function target(name: string): Target {
  const found = registry.get(name);
  if (!found) throw new Error(`missing target ${name}`);
  return found;
}

const record: EscalationRecord = { target: "rabbitmq", level: "RETRY", enteredAt: 1000, retryCount: 1 };

describe("DockerRestartAction", () => {
  it("should restart the bound container", async () => {
    const calls: string[][] = [];
    const runner: CommandRunner = async (file, args) => {
      calls.push([file, ...args]);
      return { stdout: "rabbitmq\n" };
    };

    const outcome = await new DockerRestartAction("rabbitmq", runner, 1000).attempt(target("rabbitmq"));

    expect(calls).toEqual([["docker", "restart", "rabbitmq"]]);
    expect(outcome).toEqual({ success: true, detail: "container rabbitmq restarted: rabbitmq" });
  });

  it("should report a failing command without throwing", async () => {
    const runner: CommandRunner = async () => {
      throw new Error("No such container: rabbitmq");
    };

    const outcome = await new DockerRestartAction("rabbitmq", runner, 1000).attempt(target("rabbitmq"));

    expect(outcome).toEqual({
      success: false,
      detail: "container rabbitmq restart failed: No such container: rabbitmq",
    });
  });
});

describe("WebhookRecoveryAction", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post the escalation record", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 202 }));
    vi.stubGlobal("fetch", fetchMock);

    const action = new WebhookRecoveryAction("http://hooks.local/recover", { "x-hook-token": "test-secret" });
    const outcome = await action.attempt(target("rabbitmq"), record);

    expect(outcome).toEqual({ success: true, detail: "recovery hook accepted (202)" });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://hooks.local/recover");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "x-hook-token": "test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({ target: "rabbitmq", kind: "TCP", escalation: record });
  });

  it("should fail on a non-2xx response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(null, { status: 500 })));

    const outcome = await new WebhookRecoveryAction("http://hooks.local/recover").attempt(target("rabbitmq"), record);

    expect(outcome).toEqual({ success: false, detail: "recovery hook returned 500" });
  });

  it("should fail when the hook is unreachable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const outcome = await new WebhookRecoveryAction("http://hooks.local/recover").attempt(target("rabbitmq"), record);

    expect(outcome).toEqual({ success: false, detail: "recovery hook unreachable: fetch failed" });
  });
});

describe("ManualRecoveryAction and NoopRecoveryAction", () => {
  it("should always fail a manual action so escalation proceeds", async () => {
    expect(await new ManualRecoveryAction().attempt(target("vpn"))).toEqual({
      success: false,
      detail: "no automatic recovery for vpn: manual intervention required",
    });
    expect(await new ManualRecoveryAction("reconnect the tunnel on the router").attempt(target("vpn"))).toEqual({
      success: false,
      detail: "reconnect the tunnel on the router",
    });
  });

  it("should always succeed a noop action", async () => {
    expect(await new NoopRecoveryAction().attempt()).toEqual({ success: true, detail: "no action taken" });
  });
});

describe("buildRecoveryBindings", () => {
  it("should bind configured actions and default the rest to manual", () => {
    const actions = buildRecoveryBindings({ rabbitmq: { action: "docker_restart", container: "rabbitmq" } }, registry);

    expect(actions.get("rabbitmq")?.name).toBe("docker_restart");
    expect(actions.get("vpn")?.name).toBe("manual");
    expect([...actions.keys()]).toEqual(["rabbitmq", "vpn"]);
  });

  it("should create every configured action type", () => {
    const actions = buildRecoveryBindings(
      {
        rabbitmq: { action: "webhook", url: "http://hooks.local/recover" },
        vpn: { action: "noop" },
      },
      registry
    );

    expect(actions.get("rabbitmq")).toBeInstanceOf(WebhookRecoveryAction);
    expect(actions.get("vpn")).toBeInstanceOf(NoopRecoveryAction);
  });
});
