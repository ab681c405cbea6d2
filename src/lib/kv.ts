/**
 * Store Client
 *
 * Read-only access to a Redis-compatible store whose keys are the literal
 * datamodel paths (see keys.ts). Connection is a lazily created singleton.
 */

import { createClient } from "redis";
import { cfg } from "./env.js";
import { errorLog } from "./logger.js";
import { PING_INTERVAL_MS } from "./constants.js";

let redis: ReturnType<typeof createClient> | null = null;
let connecting: Promise<void> | null = null;
let lastPingTime = 0;

/**
 * Get or create Redis client (singleton pattern for serverless)
 */
async function getClient() {
  // Trust isOpen on the fast path, ping only if not verified recently
  if (redis?.isOpen) {
    const now = Date.now();
    if (now - lastPingTime <= PING_INTERVAL_MS) {
      return redis;
    }
    try {
      await redis.ping();
      lastPingTime = now;
      return redis;
    } catch (err) {
      errorLog("Redis ping failed, reconnecting", err);
      await redis.quit().catch((quitErr: unknown) => {
        errorLog("Failed to close stale Redis connection", quitErr);
      });
      redis = null;
      connecting = null;
      lastPingTime = 0;
    }
  }

  if (connecting) {
    await connecting;
    if (!redis) {
      throw new Error("Redis connection failed");
    }
    return redis;
  }

  const client = createClient({ url: cfg.redisUrl });
  redis = client;
  client.on("error", (err: unknown) => errorLog("Redis Client Error", err));
  client.on("end", () => {
    redis = null;
    connecting = null;
  });

  connecting = client.connect().then(() => {
    connecting = null;
    lastPingTime = Date.now();
  }).catch((err: unknown) => {
    connecting = null;
    redis = null;
    lastPingTime = 0;
    throw err;
  });

  await connecting;
  if (!redis) {
    throw new Error("Redis connection failed");
  }
  return redis;
}

/**
 * Read-only connectivity check
 */
export async function ping(): Promise<string> {
  const client = await getClient();
  return client.ping();
}

/**
 * Raw string value at key, or null when absent
 */
export async function getValue(key: string): Promise<string | null> {
  const client = await getClient();
  return client.get(key);
}

export type StoredJSON =
  | { state: "absent" }
  | { state: "invalid"; raw: string }
  | { state: "ok"; value: unknown };

/**
 * JSON value at key; absent keys and unparseable values are told apart
 */
export async function readJSON(key: string): Promise<StoredJSON> {
  const raw = await getValue(key);
  if (raw === null) return { state: "absent" };
  try {
    return { state: "ok", value: JSON.parse(raw) };
  } catch (err) {
    errorLog(`Failed to parse JSON for key ${key}`, err);
    return { state: "invalid", raw };
  }
}
