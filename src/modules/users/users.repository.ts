/**
 * Users Repository
 * ================
 * Credential store: user rows keyed by id / email / username.
 */

import { and, asc, eq, type SQL, sql } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";

import { findUniqueViolation, type Db } from "../../shared/database.js";
import { type NewUserRow, type UserRow, users } from "../../shared/db-schema.js";
import type { PageWindow } from "../../shared/paging.js";
import { type SortTerm, stringCondition, toOrderBy } from "../../shared/query-filters.js";
import type { UserFilter, UserSortField } from "./users.schemas.js";

export type UniqueViolation = {
  field: "email" | "username";
};

function filterCondition(filter: UserFilter | null | undefined): SQL | undefined {
  if (!filter) {return undefined;}
  return and(
    stringCondition(users.username, filter.username),
    stringCondition(users.email, filter.email),
    filter.role?.eq ? eq(users.role, filter.role.eq) : undefined
  );
}

const SORT_COLUMNS = {
  username: users.username,
  email: users.email,
  createdAt: users.createdAt,
};

export function createUsersRepository(db: Db) {
  return {
    async findById(id: string): Promise<UserRow | null> {
      return db.select().from(users).where(eq(users.id, id)).get() ?? null;
    },

    async findByEmail(email: string): Promise<UserRow | null> {
      return db.select().from(users).where(eq(users.email, email)).get() ?? null;
    },

    async existsByUsername(username: string): Promise<boolean> {
      const row = db.select({ id: users.id }).from(users).where(eq(users.username, username)).get();
      return row !== undefined;
    },

    /**
     * Inserts unless a unique column is already taken.
     */
    async insert(row: NewUserRow): Promise<Result<UserRow, UniqueViolation>> {
      try {
        return ok(db.insert(users).values(row).returning().get());
      } catch (error) {
        const column = findUniqueViolation(error);
        if (column === "email" || column === "username") {
          return err({ field: column });
        }
        throw error;
      }
    },

    async count(filter?: UserFilter | null): Promise<number> {
      const row = db
        .select({ value: sql<number>`count(*)` })
        .from(users)
        .where(filterCondition(filter))
        .get();
      return row?.value ?? 0;
    },

    async list(
      filter: UserFilter | null | undefined,
      order: SortTerm<UserSortField>[],
      window: PageWindow
    ): Promise<UserRow[]> {
      const terms: SortTerm<UserSortField>[] = order.length > 0 ? order : [{ field: "createdAt", direction: "ASC" }];
      return db
        .select()
        .from(users)
        .where(filterCondition(filter))
        .orderBy(...toOrderBy(terms, SORT_COLUMNS), asc(users.id))
        .limit(window.limit)
        .offset(window.offset)
        .all();
    },
  };
}

export type UsersRepository = ReturnType<typeof createUsersRepository>;
