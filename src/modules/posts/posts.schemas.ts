/**
 * Posts Schemas
 * =============
 * Mutation inputs and list arguments for posts.
 */

import { z } from "zod";

import type { PostRow } from "../../shared/db-schema.js";
import { pagingArgsSchema } from "../../shared/paging.js";
import { idFilterSchema, sortDirectionSchema, stringFilterSchema } from "../../shared/query-filters.js";

const contentSchema = z
  .string({ required_error: "Content is required" })
  .trim()
  .min(1, "Content is required");

const idSchema = z.string().trim().min(1, "Id is required");

export const createPostInputSchema = z.object({
  content: contentSchema,
  userId: idSchema.nullish(),
});

export type CreatePostInput = z.infer<typeof createPostInputSchema>;

export const updatePostInputSchema = z.object({
  postId: idSchema,
  newContent: contentSchema,
});

export type UpdatePostInput = z.infer<typeof updatePostInputSchema>;

export const deletePostArgsSchema = z.object({
  postId: idSchema,
});

export const POST_SORT_FIELDS = ["createdAt", "updatedAt", "content"] as const;
export type PostSortField = (typeof POST_SORT_FIELDS)[number];

export const postFilterSchema = z.object({
  content: stringFilterSchema.nullish(),
  userId: idFilterSchema.nullish(),
});

export type PostFilter = z.infer<typeof postFilterSchema>;

export const postSortSchema = z.object({
  createdAt: sortDirectionSchema.nullish(),
  updatedAt: sortDirectionSchema.nullish(),
  content: sortDirectionSchema.nullish(),
});

export const postsQueryArgsSchema = pagingArgsSchema.extend({
  where: postFilterSchema.nullish(),
  order: z.array(postSortSchema).nullish(),
});

export type PostsQueryArgs = z.infer<typeof postsQueryArgsSchema>;

export const userPostsArgsSchema = postsQueryArgsSchema.extend({
  userId: idSchema,
});

export const commentsArgsSchema = pagingArgsSchema;

export type PostRecord = PostRow;
