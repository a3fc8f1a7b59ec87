/**
 * Posts Service
 * =============
 * Post writes and reads. Every successful write removes the owner's cache
 * entry before returning; failed writes leave the cache untouched.
 */

import { randomUUID } from "node:crypto";

import { err, ok, type Result } from "neverthrow";

import { isAdmin, type UserAuthContext } from "../../shared/auth-context.js";
import type { Clock } from "../../shared/clock.js";
import type { CommentRow } from "../../shared/db-schema.js";
import { AuthorizationError, NotFoundError, type ValidationError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import { type Connection, connectionFromArray, type PagingArgs, resolvePageWindow, toConnection } from "../../shared/paging.js";
import { compareBy, matchesString, toSortTerms } from "../../shared/query-filters.js";
import { parseInput } from "../../shared/validation.js";
import type { UsersRepository } from "../users/users.repository.js";
import type { UserPostsCache } from "./posts.cache.js";
import type { PostsRepository } from "./posts.repository.js";
import {
  createPostInputSchema,
  deletePostArgsSchema,
  type PostFilter,
  type PostRecord,
  POST_SORT_FIELDS,
  type PostsQueryArgs,
  type PostSortField,
  updatePostInputSchema,
} from "./posts.schemas.js";

export type PostWriteError = ValidationError | NotFoundError | AuthorizationError;

export type PostsServiceDeps = {
  posts: PostsRepository;
  users: UsersRepository;
  cache: UserPostsCache;
  clock: Clock;
};

function canModify(caller: UserAuthContext, post: PostRecord): boolean {
  return post.userId === caller.userId || isAdmin(caller);
}

function matchesFilter(post: PostRecord, filter: PostFilter | null | undefined): boolean {
  if (!filter) {return true;}
  const userId = filter.userId?.eq;
  if (userId !== null && userId !== undefined && post.userId !== userId) {return false;}
  return matchesString(post.content, filter.content);
}

function readSortField(post: PostRecord, field: PostSortField): string | number | null {
  switch (field) {
    case "createdAt":
      return post.createdAt.getTime();
    case "updatedAt":
      return post.updatedAt ? post.updatedAt.getTime() : null;
    case "content":
      return post.content;
  }
}

export function createPostsService(deps: PostsServiceDeps) {
  const { posts, users, cache, clock } = deps;

  async function invalidateOwner(userId: string): Promise<void> {
    await cache.invalidate(userId);
    logger.debug("Posts cache invalidated", { userId });
  }

  /**
   * Read-through: a hit never touches storage. Unknown users get an empty list.
   */
  async function getUserPosts(userId: string): Promise<PostRecord[]> {
    const cached = await cache.lookup(userId);
    if (cached.hit) {return cached.posts;}

    const list = await posts.listByUser(userId);
    await cache.fill(userId, cached.generation, list);
    return list;
  }

  return {
    async createPost(caller: UserAuthContext, input: unknown): Promise<Result<PostRecord, PostWriteError>> {
      const parsed = parseInput(createPostInputSchema, input);
      if (parsed.isErr()) {return err(parsed.error);}

      const ownerId = parsed.value.userId ?? caller.userId;
      if (ownerId !== caller.userId && !isAdmin(caller)) {
        return err(new AuthorizationError("Cannot create posts for another user"));
      }

      const owner = await users.findById(ownerId);
      if (!owner) {return err(new NotFoundError("User", ownerId));}

      const post = await posts.insert({
        id: randomUUID(),
        content: parsed.value.content,
        createdAt: clock.now(),
        updatedAt: null,
        userId: owner.id,
      });
      await invalidateOwner(owner.id);

      logger.info("Post created", { postId: post.id, userId: owner.id });
      return ok(post);
    },

    async updatePost(caller: UserAuthContext, input: unknown): Promise<Result<PostRecord, PostWriteError>> {
      const parsed = parseInput(updatePostInputSchema, input);
      if (parsed.isErr()) {return err(parsed.error);}

      const existing = await posts.findById(parsed.value.postId);
      if (!existing) {return err(new NotFoundError("Post", parsed.value.postId));}
      if (!canModify(caller, existing)) {
        return err(new AuthorizationError("Only the owner can update this post"));
      }

      const updated = await posts.updateContent(existing.id, parsed.value.newContent, clock.now());
      if (!updated) {return err(new NotFoundError("Post", existing.id));}
      await invalidateOwner(updated.userId);

      logger.info("Post updated", { postId: updated.id, userId: updated.userId });
      return ok(updated);
    },

    async deletePost(caller: UserAuthContext, input: unknown): Promise<Result<true, PostWriteError>> {
      const parsed = parseInput(deletePostArgsSchema, input);
      if (parsed.isErr()) {return err(parsed.error);}

      const existing = await posts.findById(parsed.value.postId);
      if (!existing) {return err(new NotFoundError("Post", parsed.value.postId));}
      if (!canModify(caller, existing)) {
        return err(new AuthorizationError("Only the owner can delete this post"));
      }

      const removed = await posts.delete(existing.id);
      if (!removed) {return err(new NotFoundError("Post", existing.id));}
      await invalidateOwner(existing.userId);

      logger.info("Post deleted", { postId: existing.id, userId: existing.userId });
      return ok(true);
    },

    getUserPosts,

    /**
     * A user's posts from the cached list, filtered, sorted and paged in memory.
     */
    async userPostsConnection(userId: string, args: PostsQueryArgs): Promise<Connection<PostRecord>> {
      const all = await getUserPosts(userId);
      const terms = toSortTerms(args.order, POST_SORT_FIELDS);
      const filtered = all.filter((p) => matchesFilter(p, args.where));
      const sorted = terms.length > 0 ? [...filtered].sort(compareBy(terms, readSortField)) : filtered;
      return connectionFromArray(sorted, args);
    },

    async listPosts(args: PostsQueryArgs): Promise<Connection<PostRecord>> {
      const total = await posts.count(args.where);
      const window = resolvePageWindow(args, total);
      const items = await posts.list(args.where, toSortTerms(args.order, POST_SORT_FIELDS), window);
      return toConnection(items, window, total);
    },

    async listComments(postId: string, args: PagingArgs): Promise<Connection<CommentRow>> {
      const total = await posts.countComments(postId);
      const window = resolvePageWindow(args, total);
      const items = await posts.listComments(postId, window);
      return toConnection(items, window, total);
    },
  };
}

export type PostsService = ReturnType<typeof createPostsService>;
