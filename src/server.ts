/**
 * Server Entry Point
 * ==================
 * Starts the Express server
 */

import "dotenv/config";

import { createApp } from "./app.js";
import { createServices } from "./container.js";
import { type CachedPostList, cachedPostListCodec } from "./modules/posts/index.js";
import { createTokenIssuer } from "./shared/auth.js";
import {
  type CacheStore,
  type GenerationCounter,
  MemoryCacheStore,
  MemoryGenerationCounter,
  RedisCacheStore,
  RedisGenerationCounter,
} from "./shared/cache.js";
import { systemClock } from "./shared/clock.js";
import { getAppConfig, getAuthConfig } from "./shared/config.js";
import { openDatabase } from "./shared/database.js";
import { logger } from "./shared/logger.js";
import { passwordHasher } from "./shared/password.js";
import { disconnectRedis, getRedisClient, toRedisCacheClient } from "./shared/redis.js";

type PostsCacheBackend = {
  store: CacheStore<CachedPostList>;
  generations: GenerationCounter;
};

async function createPostsCacheBackend(redisUrl: string | null): Promise<PostsCacheBackend> {
  if (!redisUrl) {
    return { store: new MemoryCacheStore<CachedPostList>(systemClock), generations: new MemoryGenerationCounter() };
  }
  const client = toRedisCacheClient(await getRedisClient(redisUrl));
  logger.info("Posts cache backed by Redis");
  return {
    store: new RedisCacheStore(client, cachedPostListCodec, "posts"),
    generations: new RedisGenerationCounter(client, "posts"),
  };
}

async function main(): Promise<void> {
  const config = getAppConfig();
  const tokens = createTokenIssuer(getAuthConfig(), systemClock);
  const database = openDatabase(config.databaseUrl);
  const postsCache = await createPostsCacheBackend(config.redisUrl);

  const services = createServices({
    db: database.db,
    tokens,
    hasher: passwordHasher,
    postsCacheStore: postsCache.store,
    postsCacheGenerations: postsCache.generations,
    postsCacheSlidingMs: config.postsCacheSlidingSeconds * 1000,
    clock: systemClock,
  });

  const app = createApp({ services, tokens, corsOrigins: config.corsOrigins });

  const server = app.listen(config.port, () => {
    logger.info("GraphQL API listening", {
      url: `http://localhost:${config.port}/graphql`,
      health: `http://localhost:${config.port}/health`,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, closing server...`);
    server.close(() => {
      disconnectRedis()
        .catch((err: unknown) => {
          logger.warn("Redis disconnect failed", { error: err instanceof Error ? err.message : String(err) });
        })
        .finally(() => {
          database.close();
          process.exit(0);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Server failed to start", err instanceof Error ? err : { error: String(err) });
  process.exit(1);
});
