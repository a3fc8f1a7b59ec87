/**
 * Cache Stores
 * ============
 * Narrow key/value cache with sliding expiration.
 *
 * - `MemoryCacheStore`: in-process Map, the default.
 * - `RedisCacheStore`: shared store when `REDIS_URL` is configured; the sliding
 *   window is refreshed with `EXPIRE` on every hit.
 *
 * `remove` is idempotent on both. Neither store coordinates concurrent misses:
 * two readers may both rebuild the same entry.
 *
 * `GenerationCounter` keeps a per-key write counter next to the store. Readers
 * tag what they cache with the generation they saw before loading, so a fill
 * that raced with a write can be told apart from a current one.
 */

import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { logger } from "./logger.js";

export type CacheEntryOptions = {
  /** Entry expires this many ms after its last read or write. */
  slidingMs: number;
};

export interface CacheStore<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, options: CacheEntryOptions): Promise<void>;
  remove(key: string): Promise<void>;
}

type MemoryEntry<T> = {
  value: T;
  slidingMs: number;
  expiresAt: number;
};

export class MemoryCacheStore<T> implements CacheStore<T> {
  private readonly entries = new Map<string, MemoryEntry<T>>();
  private lastPruneAt: number;

  constructor(
    private readonly clock: Clock = systemClock,
    /** Minimum time between sweeps of expired entries on `set`. */
    private readonly pruneIntervalMs = 60_000
  ) {
    this.lastPruneAt = clock.now().getTime();
  }

  async get(key: string): Promise<T | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {return undefined;}

    const now = this.clock.now().getTime();
    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      return undefined;
    }

    entry.expiresAt = now + entry.slidingMs;
    return entry.value;
  }

  async set(key: string, value: T, options: CacheEntryOptions): Promise<void> {
    const now = this.clock.now().getTime();
    if (now - this.lastPruneAt >= this.pruneIntervalMs) {
      this.prune(now);
    }
    this.entries.set(key, {
      value,
      slidingMs: options.slidingMs,
      expiresAt: now + options.slidingMs,
    });
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  private prune(now: number): void {
    this.lastPruneAt = now;
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        pruned++;
      }
    }
    if (pruned > 0) {
      logger.debug("Pruned expired cache entries", { count: pruned, remaining: this.entries.size });
    }
  }
}

export interface GenerationCounter {
  current(key: string): Promise<number>;
  /** Returns the new generation. */
  bump(key: string): Promise<number>;
}

export class MemoryGenerationCounter implements GenerationCounter {
  private readonly generations = new Map<string, number>();

  async current(key: string): Promise<number> {
    return this.generations.get(key) ?? 0;
  }

  async bump(key: string): Promise<number> {
    const next = (this.generations.get(key) ?? 0) + 1;
    this.generations.set(key, next);
    return next;
  }
}

/**
 * The subset of the node-redis client the store needs.
 */
export type RedisCacheClient = {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options: { EX: number }): Promise<unknown>;
  expire(key: string, seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  incr(key: string): Promise<number>;
};

export type CacheCodec<T> = {
  encode: (value: T) => string;
  decode: (raw: string) => T | undefined;
};

export class RedisCacheStore<T> implements CacheStore<T> {
  constructor(
    private readonly client: RedisCacheClient,
    private readonly codec: CacheCodec<T>,
    private readonly namespace = "cache"
  ) {}

  private k(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async get(key: string): Promise<T | undefined> {
    const raw = await this.client.get(this.k(key));
    if (raw === null) {return undefined;}

    const envelope = parseEnvelope(raw);
    if (!envelope) {
      logger.warn("Dropping unreadable cache entry", { key });
      await this.client.del(this.k(key));
      return undefined;
    }

    // The envelope carries the window length. EXPIRE on a key removed since the
    // GET is a no-op, so a concurrent invalidation is never undone here.
    await this.client.expire(this.k(key), envelope.ttlSeconds);

    const value = this.codec.decode(envelope.payload);
    if (value === undefined) {
      logger.warn("Dropping undecodable cache entry", { key });
      await this.client.del(this.k(key));
    }
    return value;
  }

  async set(key: string, value: T, options: CacheEntryOptions): Promise<void> {
    const ttlSeconds = toTtlSeconds(options.slidingMs);
    const raw = JSON.stringify({ ttlSeconds, payload: this.codec.encode(value) });
    await this.client.set(this.k(key), raw, { EX: ttlSeconds });
  }

  async remove(key: string): Promise<void> {
    await this.client.del(this.k(key));
  }
}

/**
 * Counters live as plain integer keys without a TTL; INCR is atomic across
 * every process sharing the server.
 */
export class RedisGenerationCounter implements GenerationCounter {
  constructor(
    private readonly client: RedisCacheClient,
    private readonly namespace = "cache"
  ) {}

  async current(key: string): Promise<number> {
    const raw = await this.client.get(`${this.namespace}:${key}`);
    if (raw === null) {return 0;}
    const value = Number.parseInt(raw, 10);
    return Number.isNaN(value) ? 0 : value;
  }

  bump(key: string): Promise<number> {
    return this.client.incr(`${this.namespace}:${key}`);
  }
}

function toTtlSeconds(ms: number): number {
  return Math.max(1, Math.ceil(ms / 1000));
}

function parseEnvelope(raw: string): { ttlSeconds: number; payload: string } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) {return null;}
  const ttlSeconds = "ttlSeconds" in parsed ? parsed.ttlSeconds : undefined;
  const payload = "payload" in parsed ? parsed.payload : undefined;
  if (typeof ttlSeconds !== "number" || typeof payload !== "string") {return null;}
  return { ttlSeconds, payload };
}
