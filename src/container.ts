/**
 * Service Container
 * =================
 * Builds the service graph from its collaborators. Tests pass in-memory
 * collaborators; `server.ts` passes the configured ones.
 */

import { createAuthService, type AuthService } from "./modules/auth/index.js";
import {
  createPostsRepository,
  createPostsService,
  type CachedPostList,
  createUserPostsCache,
  type PostsService,
} from "./modules/posts/index.js";
import { createUsersRepository, createUsersService, type UsersService } from "./modules/users/index.js";
import type { TokenIssuer } from "./shared/auth.js";
import type { CacheStore, GenerationCounter } from "./shared/cache.js";
import type { Clock } from "./shared/clock.js";
import type { Db } from "./shared/database.js";
import type { PasswordHasher } from "./shared/password.js";

export type AppServices = {
  auth: AuthService;
  users: UsersService;
  posts: PostsService;
};

export type ServiceDeps = {
  db: Db;
  tokens: TokenIssuer;
  hasher: PasswordHasher;
  postsCacheStore: CacheStore<CachedPostList>;
  postsCacheGenerations: GenerationCounter;
  postsCacheSlidingMs: number;
  clock: Clock;
};

export function createServices(deps: ServiceDeps): AppServices {
  const users = createUsersRepository(deps.db);
  const posts = createPostsRepository(deps.db);
  const cache = createUserPostsCache(deps.postsCacheStore, deps.postsCacheGenerations, deps.postsCacheSlidingMs);

  return {
    auth: createAuthService({ users, tokens: deps.tokens, hasher: deps.hasher, clock: deps.clock }),
    users: createUsersService({ users }),
    posts: createPostsService({ posts, users, cache, clock: deps.clock }),
  };
}
