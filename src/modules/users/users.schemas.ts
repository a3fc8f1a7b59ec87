/**
 * Users Schemas
 * =============
 * GraphQL argument shapes for user list fields.
 */

import { z } from "zod";

import { ROLES, type UserRow } from "../../shared/db-schema.js";
import { pagingArgsSchema } from "../../shared/paging.js";
import { sortDirectionSchema, stringFilterSchema } from "../../shared/query-filters.js";

export const USER_SORT_FIELDS = ["username", "email", "createdAt"] as const;
export type UserSortField = (typeof USER_SORT_FIELDS)[number];

export const userFilterSchema = z.object({
  username: stringFilterSchema.nullish(),
  email: stringFilterSchema.nullish(),
  role: z.object({ eq: z.enum(ROLES).nullish() }).nullish(),
});

export type UserFilter = z.infer<typeof userFilterSchema>;

export const userSortSchema = z.object({
  username: sortDirectionSchema.nullish(),
  email: sortDirectionSchema.nullish(),
  createdAt: sortDirectionSchema.nullish(),
});

export const usersQueryArgsSchema = pagingArgsSchema.extend({
  where: userFilterSchema.nullish(),
  order: z.array(userSortSchema).nullish(),
});

export type UsersQueryArgs = z.infer<typeof usersQueryArgsSchema>;

/** User as exposed to API callers. */
export type PublicUser = Omit<UserRow, "passwordHash">;

export function toPublicUser(row: UserRow): PublicUser {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    role: row.role,
    createdAt: row.createdAt,
  };
}
