/**
 * Users Service
 * =============
 * Read side of the user directory.
 */

import { err, ok, type Result } from "neverthrow";

import { NotFoundError } from "../../shared/errors.js";
import { type Connection, resolvePageWindow, toConnection } from "../../shared/paging.js";
import { toSortTerms } from "../../shared/query-filters.js";
import type { UsersRepository } from "./users.repository.js";
import { type PublicUser, toPublicUser, USER_SORT_FIELDS, type UsersQueryArgs } from "./users.schemas.js";

export function createUsersService(deps: { users: UsersRepository }) {
  const { users } = deps;

  return {
    async getUser(id: string): Promise<Result<PublicUser, NotFoundError>> {
      const row = await users.findById(id);
      if (!row) {return err(new NotFoundError("User", id));}
      return ok(toPublicUser(row));
    },

    async listUsers(args: UsersQueryArgs): Promise<Connection<PublicUser>> {
      const total = await users.count(args.where);
      const window = resolvePageWindow(args, total);
      const rows = await users.list(args.where, toSortTerms(args.order, USER_SORT_FIELDS), window);
      return toConnection(rows.map(toPublicUser), window, total);
    },
  };
}

export type UsersService = ReturnType<typeof createUsersService>;
