/**
 * Per-User Post Cache
 * ===================
 * One entry per owner: `posts_user_<userId>` -> the owner's posts, newest first.
 *
 * Each owner also has a generation (`posts_gen_<userId>`) that every
 * invalidation bumps. Entries carry the generation read before the storage
 * load, and only an entry whose generation is still current counts as a hit.
 * A load that overlapped a write therefore never serves the pre-write list
 * to later readers.
 */

import { z } from "zod";

import type { CacheCodec, CacheStore, GenerationCounter } from "../../shared/cache.js";
import { logger } from "../../shared/logger.js";
import type { PostRecord } from "./posts.schemas.js";

export function postsCacheKey(userId: string): string {
  return `posts_user_${userId}`;
}

export function postsGenerationKey(userId: string): string {
  return `posts_gen_${userId}`;
}

export type CachedPostList = {
  generation: number;
  posts: PostRecord[];
};

export type PostsCacheLookup =
  | { hit: true; posts: PostRecord[] }
  | { hit: false; generation: number };

export interface UserPostsCache {
  lookup(userId: string): Promise<PostsCacheLookup>;
  /** Stores `posts` unless the owner was invalidated since `generation` was read. */
  fill(userId: string, generation: number, posts: PostRecord[]): Promise<void>;
  invalidate(userId: string): Promise<void>;
}

export function createUserPostsCache(
  store: CacheStore<CachedPostList>,
  generations: GenerationCounter,
  slidingMs: number
): UserPostsCache {
  return {
    async lookup(userId) {
      const generation = await generations.current(postsGenerationKey(userId));
      const entry = await store.get(postsCacheKey(userId));
      if (entry && entry.generation === generation) {
        return { hit: true, posts: entry.posts };
      }
      return { hit: false, generation };
    },

    async fill(userId, generation, list) {
      if ((await generations.current(postsGenerationKey(userId))) !== generation) {
        logger.debug("Skipped stale posts cache fill", { userId, generation });
        return;
      }
      await store.set(postsCacheKey(userId), { generation, posts: list }, { slidingMs });
    },

    // Bump first: an entry written after the remove still carries the old generation.
    async invalidate(userId) {
      await generations.bump(postsGenerationKey(userId));
      await store.remove(postsCacheKey(userId));
    },
  };
}

const cachedPostSchema = z.object({
  id: z.string(),
  content: z.string(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date().nullable(),
  userId: z.string(),
});

const cachedPostListSchema = z.object({
  generation: z.number().int(),
  posts: z.array(cachedPostSchema),
});

/**
 * JSON codec for stores that keep strings (Redis). Dates travel as ISO strings.
 */
export const cachedPostListCodec: CacheCodec<CachedPostList> = {
  encode: (entry) => JSON.stringify(entry),
  decode: (raw) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return undefined;
    }
    const result = cachedPostListSchema.safeParse(parsed);
    return result.success ? result.data : undefined;
  },
};
