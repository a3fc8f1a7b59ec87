/**
 * Posts Module
 * ============
 * Post CRUD, the per-user post cache and post/comment list queries.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { postsResolvers } from "./posts.resolvers.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createPostsService, type PostsService, type PostWriteError } from "./posts.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// DATA LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createPostsRepository, type PostsRepository } from "./posts.repository.js";
export {
  type CachedPostList,
  cachedPostListCodec,
  createUserPostsCache,
  postsCacheKey,
  postsGenerationKey,
  type UserPostsCache,
} from "./posts.cache.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./posts.schemas.js";
