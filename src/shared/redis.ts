/**
 * Redis Client
 * ============
 * Optional shared cache backend. Without `REDIS_URL` the app keeps its caches
 * in process.
 */

import { createClient, type RedisClientType } from "redis";

import type { RedisCacheClient } from "./cache.js";
import { logger } from "./logger.js";

let client: RedisClientType | null = null;
let connectPromise: Promise<void> | null = null;

async function ensureConnected(c: RedisClientType): Promise<void> {
  if (c.isOpen) {return;}
  if (!connectPromise) {
    connectPromise = c
      .connect()
      .then(() => undefined)
      .catch((err: unknown) => {
        // Reset so the next call retries
        connectPromise = null;
        throw err;
      });
  }
  await connectPromise;
}

/**
 * Get the shared Redis client, connecting on first use.
 */
export async function getRedisClient(url: string): Promise<RedisClientType> {
  if (!client) {
    client = createClient({ url });
    client.on("error", (err: unknown) => {
      logger.error("Redis client error", { error: err instanceof Error ? err.message : String(err) });
    });
    client.on("reconnecting", () => {
      logger.warn("Redis reconnecting...");
    });
  }

  await ensureConnected(client);
  return client;
}

export function toRedisCacheClient(c: RedisClientType): RedisCacheClient {
  return {
    get: (key) => c.get(key),
    set: (key, value, options) => c.set(key, value, options),
    expire: (key, seconds) => c.expire(key, seconds),
    del: (key) => c.del(key),
    incr: (key) => c.incr(key),
  };
}

export async function disconnectRedis(): Promise<void> {
  if (!client) {return;}
  try {
    if (client.isOpen) {
      await client.quit();
    }
  } catch (err) {
    logger.warn("Redis quit failed", { error: err instanceof Error ? err.message : String(err) });
  } finally {
    client = null;
    connectPromise = null;
  }
}
