import type { GraphQLSchema } from "graphql";

import { authResolvers } from "../modules/auth/index.js";
import { postsResolvers } from "../modules/posts/index.js";
import { usersResolvers } from "../modules/users/index.js";
import { buildExecutableSchema, type FieldRegistration, loadSchemaSource } from "./registry.js";

export const fieldRegistry: readonly FieldRegistration[] = [
  ...authResolvers,
  ...usersResolvers,
  ...postsResolvers,
];

export function createExecutableSchema(): GraphQLSchema {
  return buildExecutableSchema(loadSchemaSource(), fieldRegistry);
}
