/**
 * Tests for the Redis Streams broker and its reply parsers
 */

import { hostname } from "os";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { BrokerSettings } from "../../config/settings.js";
import { BrokerUnavailableError } from "../../pipeline/Broker.js";
import {
  RedisStreamBroker,
  parseEntries,
  parsePendingReply,
  parseReadReply,
} from "../../pipeline/RedisStreamBroker.js";

type Responder = (command: string, args: (string | number)[]) => unknown;

const redis = vi.hoisted(() => {
  class FakeRedis {
    static instances: FakeRedis[] = [];
    static respond: (command: string, args: (string | number)[]) => unknown = () => null;

    status = "wait";
    readonly calls: (string | number)[][] = [];

    constructor(readonly url: string) {
      FakeRedis.instances.push(this);
    }

    async connect(): Promise<void> {
      this.status = "ready";
    }

    on(_event: string, _listener: (err: Error) => void): this {
      return this;
    }

    async call(command: string, ...args: (string | number)[]): Promise<unknown> {
      this.calls.push([command, ...args]);
      return FakeRedis.respond(command, args);
    }

    async quit(): Promise<string> {
      this.status = "end";
      return "OK";
    }

    disconnect(): void {
      this.status = "end";
    }
  }
  return { FakeRedis };
});

vi.mock("ioredis", () => ({ Redis: redis.FakeRedis }));

const settings: BrokerSettings = {
  url: "redis://localhost:6379",
  exchange: "metrics",
  storageQueue: "metrics.storage",
  scrapeQueue: "metrics.scrape",
  deadLetter: "metrics.dead",
  maxLength: 1000,
  blockMs: 50,
  redeliveryBaseMs: 1000,
  redeliveryMaxMs: 60000,
};

function consumerName(role: string): string {
  return `${hostname()}-${process.pid}-${role}`;
}

/**
 * Commands sent after the group setup of the first connection
 */
function commands(): (string | number)[][] {
  return redis.FakeRedis.instances.flatMap((client) => client.calls).filter((call) => call[0] !== "XGROUP");
}

function respondWith(responder: Responder): void {
  redis.FakeRedis.respond = (command, args) => (command === "XGROUP" ? "OK" : responder(command, args));
}

describe("RedisStreamBroker", () => {
  beforeEach(() => {
    redis.FakeRedis.instances = [];
    respondWith(() => null);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createBroker(role = "consumer"): RedisStreamBroker {
    return new RedisStreamBroker({ settings, role, confirmTimeoutMs: 1000 });
  }

  describe("connection", () => {
    it("should share one connection attempt between concurrent callers", async () => {
      const broker = createBroker();

      await Promise.all([broker.connect(), broker.connect()]);

      expect(redis.FakeRedis.instances).toHaveLength(1);
      expect(redis.FakeRedis.instances[0]?.calls).toEqual([
        ["XGROUP", "CREATE", "metrics", "metrics.storage", "$", "MKSTREAM"],
        ["XGROUP", "CREATE", "metrics", "metrics.scrape", "$", "MKSTREAM"],
      ]);
    });

    it("should accept consumer groups that already exist", async () => {
      redis.FakeRedis.respond = (command) => {
        if (command === "XGROUP") throw new Error("BUSYGROUP Consumer Group name already exists");
        return null;
      };

      await expect(createBroker().connect()).resolves.toBeUndefined();
    });

    it("should reconnect after a failed command", async () => {
      const broker = createBroker("producer");
      respondWith(() => {
        throw new Error("Connection is closed.");
      });

      await expect(broker.publish("p1")).rejects.toBeInstanceOf(BrokerUnavailableError);
      expect(redis.FakeRedis.instances[0]?.status).toBe("end");

      respondWith(() => "2-0");
      expect(await broker.publish("p2")).toBe("2-0");
      expect(redis.FakeRedis.instances).toHaveLength(2);
    });

    it("should refuse work once closed", async () => {
      const broker = createBroker();
      await broker.connect();
      await broker.close();

      await expect(broker.publish("p1")).rejects.toThrow("broker connection closed");
      expect(redis.FakeRedis.instances[0]?.status).toBe("end");
    });
  });

  describe("publish", () => {
    it("should append to the exchange with approximate trimming", async () => {
      respondWith(() => "1714557600000-0");

      expect(await createBroker("producer").publish('{"name":"up"}')).toBe("1714557600000-0");
      expect(commands()).toEqual([["XADD", "metrics", "MAXLEN", "~", "1000", "*", "payload", '{"name":"up"}']]);
    });

    it("should reject a publish the broker did not confirm", async () => {
      await expect(createBroker("producer").publish("p1")).rejects.toThrow("broker did not confirm publish");
    });
  });

  describe("fetch", () => {
    it("should read the scrape group without acknowledgment", async () => {
      respondWith(() => [["metrics", [["5-0", ["payload", "p5"]]]]]);

      const messages = await createBroker("scrape").fetch("scrape", 10);

      expect(messages).toEqual([{ payload: "p5", deliveryTag: "5-0", redelivered: false, deliveryCount: 1 }]);
      expect(commands()).toEqual([
        ["XREADGROUP", "GROUP", "metrics.scrape", consumerName("scrape"), "COUNT", 10, "BLOCK", 50, "NOACK", "STREAMS", "metrics", ">"],
      ]);
    });

    it("should read new storage entries when nothing is due for redelivery", async () => {
      respondWith((command) => (command === "XPENDING" ? [] : [["metrics", [["6-0", ["payload", "p6"]]]]]));

      const messages = await createBroker().fetch("storage", 10);

      expect(messages).toEqual([{ payload: "p6", deliveryTag: "6-0", redelivered: false, deliveryCount: 1 }]);
      expect(commands()).toEqual([
        ["XPENDING", "metrics", "metrics.storage", "IDLE", 1000, "-", "+", 10],
        ["XREADGROUP", "GROUP", "metrics.storage", consumerName("consumer"), "COUNT", 10, "BLOCK", 50, "STREAMS", "metrics", ">"],
      ]);
    });

    it("should reclaim only pending entries whose backoff has elapsed", async () => {
      respondWith((command, args) => {
        if (command === "XPENDING") {
          return [
            ["1-0", "other", 1500, 1],
            ["2-0", "other", 1500, 2],
            ["3-0", "other", 5000, 3],
          ];
        }
        if (command === "XCLAIM") {
          const id = String(args[4]);
          return [[id, ["payload", `p-${id}`]]];
        }
        return null;
      });

      const messages = await createBroker().fetch("storage", 10);

      // Backoff is 1000ms after one delivery, 2000ms after two, 4000ms after three
      expect(messages).toEqual([
        { payload: "p-1-0", deliveryTag: "1-0", redelivered: true, deliveryCount: 2 },
        { payload: "p-3-0", deliveryTag: "3-0", redelivered: true, deliveryCount: 4 },
      ]);
      expect(commands().filter((call) => call[0] === "XCLAIM")).toEqual([
        ["XCLAIM", "metrics", "metrics.storage", consumerName("consumer"), 1000, "1-0"],
        ["XCLAIM", "metrics", "metrics.storage", consumerName("consumer"), 4000, "3-0"],
      ]);
      expect(commands().some((call) => call[0] === "XREADGROUP")).toBe(false);
    });

    it("should release and count a pending entry trimmed from the stream", async () => {
      respondWith((command) => {
        if (command === "XPENDING") return [["4-0", "other", 3000, 2]];
        if (command === "XCLAIM") return [null];
        if (command === "XRANGE") return [];
        if (command === "XACK") return 1;
        return null;
      });
      const broker = createBroker();

      expect(await broker.fetch("storage", 10)).toEqual([]);

      expect(commands()).toEqual([
        ["XPENDING", "metrics", "metrics.storage", "IDLE", 1000, "-", "+", 10],
        ["XCLAIM", "metrics", "metrics.storage", consumerName("consumer"), 2000, "4-0"],
        ["XRANGE", "metrics", "4-0", "4-0"],
        ["XACK", "metrics", "metrics.storage", "4-0"],
        ["XREADGROUP", "GROUP", "metrics.storage", consumerName("consumer"), "COUNT", 10, "BLOCK", 50, "STREAMS", "metrics", ">"],
      ]);
      expect(broker.lostCount()).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        "[RedisStreamBroker] consumer: 4-0 was trimmed from metrics after 2 deliveries, record lost"
      );
    });

    it("should leave an entry claimed by another consumer alone", async () => {
      respondWith((command) => {
        if (command === "XPENDING") return [["4-0", "other", 3000, 2]];
        if (command === "XCLAIM") return [];
        if (command === "XRANGE") return [["4-0", ["payload", "p4"]]];
        return null;
      });
      const broker = createBroker();

      expect(await broker.fetch("storage", 10)).toEqual([]);

      expect(commands().some((call) => call[0] === "XACK")).toBe(false);
      expect(broker.lostCount()).toBe(0);
    });

    it("should return nothing once aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      expect(await createBroker().fetch("storage", 10, controller.signal)).toEqual([]);
      expect(redis.FakeRedis.instances).toHaveLength(0);
    });
  });

  describe("settlement", () => {
    it("should acknowledge a storage delivery", async () => {
      respondWith(() => 1);

      await createBroker().ack("7-0");

      expect(commands()).toEqual([["XACK", "metrics", "metrics.storage", "7-0"]]);
    });

    it("should copy a dead-lettered message to the dead-letter stream before releasing it", async () => {
      respondWith((command) => (command === "XADD" ? "9-0" : 1));

      await createBroker().deadLetter(
        { payload: "p7", deliveryTag: "7-0", redelivered: true, deliveryCount: 5 },
        "sink unavailable"
      );

      expect(commands()).toEqual([
        [
          "XADD",
          "metrics.dead",
          "MAXLEN",
          "~",
          "1000",
          "*",
          "payload",
          "p7",
          "reason",
          "sink unavailable",
          "deliveries",
          "5",
          "source",
          "7-0",
        ],
        ["XACK", "metrics", "metrics.storage", "7-0"],
      ]);
    });

    it("should leave a nacked delivery pending", async () => {
      await createBroker().nack("7-0");

      expect(redis.FakeRedis.instances).toHaveLength(0);
    });
  });
});

describe("stream reply parsing", () => {
  it("should parse entries with their field maps", () => {
    const [entry] = parseEntries([["1714557600000-0", ["payload", '{"name":"up"}', "source", "producer"]]]);

    expect(entry?.id).toBe("1714557600000-0");
    expect(entry?.fields.get("payload")).toBe('{"name":"up"}');
    expect(entry?.fields.get("source")).toBe("producer");
  });

  it("should skip deleted entries and ignore dangling fields", () => {
    const entries = parseEntries([null, ["2-0", ["payload"]]]);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.fields.size).toBe(0);
  });

  it("should flatten an XREADGROUP reply across streams", () => {
    const entries = parseReadReply([
      ["metrics", [["1-0", ["payload", "a"]], ["2-0", ["payload", "b"]]]],
    ]);

    expect(entries.map((e) => e.id)).toEqual(["1-0", "2-0"]);
  });

  it("should return nothing for a timed-out read", () => {
    expect(parseReadReply(null)).toEqual([]);
  });

  it("should parse an extended XPENDING reply", () => {
    expect(parsePendingReply([["1-0", "nas-1-consumer", 5000, 2], ["broken"]])).toEqual([
      { id: "1-0", idleMs: 5000, deliveries: 2 },
    ]);
  });
});
