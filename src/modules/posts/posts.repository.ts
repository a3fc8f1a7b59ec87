/**
 * Posts Repository
 * ================
 * Post and comment rows.
 */

import { and, asc, desc, eq, type SQL, sql } from "drizzle-orm";

import type { Db } from "../../shared/database.js";
import { type CommentRow, comments, type NewCommentRow, type NewPostRow, type PostRow, posts } from "../../shared/db-schema.js";
import type { PageWindow } from "../../shared/paging.js";
import { type SortTerm, stringCondition, toOrderBy } from "../../shared/query-filters.js";
import type { PostFilter, PostSortField } from "./posts.schemas.js";

function filterCondition(filter: PostFilter | null | undefined): SQL | undefined {
  if (!filter) {return undefined;}
  const userId = filter.userId?.eq;
  return and(
    stringCondition(posts.content, filter.content),
    userId !== null && userId !== undefined ? eq(posts.userId, userId) : undefined
  );
}

const SORT_COLUMNS = {
  createdAt: posts.createdAt,
  updatedAt: posts.updatedAt,
  content: posts.content,
};

export function createPostsRepository(db: Db) {
  return {
    async findById(id: string): Promise<PostRow | null> {
      return db.select().from(posts).where(eq(posts.id, id)).get() ?? null;
    },

    async insert(row: NewPostRow): Promise<PostRow> {
      return db.insert(posts).values(row).returning().get();
    },

    async updateContent(id: string, content: string, updatedAt: Date): Promise<PostRow | null> {
      const row = db
        .update(posts)
        .set({ content, updatedAt })
        .where(eq(posts.id, id))
        .returning()
        .get();
      return row ?? null;
    },

    /**
     * Comments go with the post (FK cascade).
     */
    async delete(id: string): Promise<boolean> {
      const removed = db.delete(posts).where(eq(posts.id, id)).returning({ id: posts.id }).all();
      return removed.length > 0;
    },

    /** Newest first. */
    async listByUser(userId: string): Promise<PostRow[]> {
      return db
        .select()
        .from(posts)
        .where(eq(posts.userId, userId))
        .orderBy(desc(posts.createdAt), desc(posts.id))
        .all();
    },

    async count(filter?: PostFilter | null): Promise<number> {
      const row = db
        .select({ value: sql<number>`count(*)` })
        .from(posts)
        .where(filterCondition(filter))
        .get();
      return row?.value ?? 0;
    },

    async list(
      filter: PostFilter | null | undefined,
      order: SortTerm<PostSortField>[],
      window: PageWindow
    ): Promise<PostRow[]> {
      const terms: SortTerm<PostSortField>[] = order.length > 0 ? order : [{ field: "createdAt", direction: "DESC" }];
      return db
        .select()
        .from(posts)
        .where(filterCondition(filter))
        .orderBy(...toOrderBy(terms, SORT_COLUMNS), asc(posts.id))
        .limit(window.limit)
        .offset(window.offset)
        .all();
    },

    async countComments(postId: string): Promise<number> {
      const row = db
        .select({ value: sql<number>`count(*)` })
        .from(comments)
        .where(eq(comments.postId, postId))
        .get();
      return row?.value ?? 0;
    },

    /** Oldest first. */
    async listComments(postId: string, window: PageWindow): Promise<CommentRow[]> {
      return db
        .select()
        .from(comments)
        .where(eq(comments.postId, postId))
        .orderBy(asc(comments.createdAt), asc(comments.id))
        .limit(window.limit)
        .offset(window.offset)
        .all();
    },

    async insertComment(row: NewCommentRow): Promise<CommentRow> {
      return db.insert(comments).values(row).returning().get();
    },
  };
}

export type PostsRepository = ReturnType<typeof createPostsRepository>;
