/**
 * Native driver probe - checks a datastore through its own client library
 *
 * - redis:  PING through ioredis
 * - neo4j:  connectivity verification through neo4j-driver
 * - qdrant: collection listing through the Qdrant REST client
 *
 * A fresh client is opened per check and always closed, so a stalled
 * datastore never leaves pooled connections behind.
 */

import { Redis } from "ioredis";
import neo4j from "neo4j-driver";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { NativeDriver, NativeDriverTarget, ProbeResult } from "../monitoring/types.js";
import { timedCheck, ProbeFailure, type Probe } from "./Probe.js";

/**
 * Opens a client, proves the datastore answers, closes the client
 */
export type DriverPing = (target: NativeDriverTarget, signal: AbortSignal) => Promise<void>;

export const pingRedis: DriverPing = async (target, signal) => {
  const redis = new Redis(target.url, {
    lazyConnect: true,
    connectTimeout: target.timeoutMs,
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
    retryStrategy: () => null, // single attempt per probe
    ...(target.credentials && {
      username: target.credentials.username,
      password: target.credentials.password,
    }),
  });
  // Errors surface through the awaited commands below
  redis.on("error", (err: Error) => {
    console.debug(`[NativeDriverProbe] redis ${target.name}: ${err.message}`);
  });
  const onAbort = (): void => redis.disconnect();
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    await redis.connect();
    const reply: string = await redis.ping();
    if (reply !== "PONG") {
      throw new ProbeFailure(`UNEXPECTED_REPLY_${reply}`);
    }
  } finally {
    signal.removeEventListener("abort", onAbort);
    redis.disconnect();
  }
};

export const pingNeo4j: DriverPing = async (target, signal) => {
  const auth = target.credentials
    ? neo4j.auth.basic(target.credentials.username, target.credentials.password)
    : undefined;
  const driver = neo4j.driver(target.url, auth, {
    connectionTimeout: target.timeoutMs,
    connectionAcquisitionTimeout: target.timeoutMs,
    maxConnectionPoolSize: 1,
  });
  const onAbort = (): void => {
    driver.close().catch((err: unknown) => {
      console.debug(`[NativeDriverProbe] neo4j ${target.name} close failed:`, err);
    });
  };
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    await driver.verifyConnectivity();
  } finally {
    signal.removeEventListener("abort", onAbort);
    await driver.close();
  }
};

export const pingQdrant: DriverPing = async (target) => {
  const clientConfig: {
    url: string;
    apiKey?: string;
    timeout: number;
    checkCompatibility: boolean;
  } = {
    url: target.url,
    timeout: target.timeoutMs,
    checkCompatibility: false,
  };

  // Qdrant authenticates with an API key; it is carried as the password
  if (target.credentials) {
    clientConfig.apiKey = target.credentials.password;
  }

  const client = new QdrantClient(clientConfig);
  await client.getCollections();
};

const DEFAULT_DRIVERS: Record<NativeDriver, DriverPing> = {
  redis: pingRedis,
  neo4j: pingNeo4j,
  qdrant: pingQdrant,
};

export class NativeDriverProbe implements Probe<NativeDriverTarget> {
  private readonly drivers: Record<NativeDriver, DriverPing>;

  constructor(drivers: Partial<Record<NativeDriver, DriverPing>> = {}) {
    this.drivers = { ...DEFAULT_DRIVERS, ...drivers };
  }

  check(target: NativeDriverTarget, signal?: AbortSignal): Promise<ProbeResult> {
    const ping = this.drivers[target.driver];
    return timedCheck(target, signal, (innerSignal) => ping(target, innerSignal));
  }
}
