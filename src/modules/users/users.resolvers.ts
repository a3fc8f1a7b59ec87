import { requireCaller } from "../../graphql/context.js";
import { type FieldRegistration, unwrap } from "../../graphql/registry.js";
import { parseArgs } from "../../shared/validation.js";
import { type PublicUser, usersQueryArgsSchema } from "./users.schemas.js";

const me: FieldRegistration = {
  type: "Query",
  field: "me",
  roles: ["User", "Admin"],
  resolve(_source, _args, context) {
    return unwrap(context.services.users.getUser(requireCaller(context).userId));
  },
};

const users: FieldRegistration = {
  type: "Query",
  field: "users",
  resolve(_source, args, context) {
    return context.services.users.listUsers(parseArgs(usersQueryArgsSchema, args));
  },
};

const userPosts: FieldRegistration<PublicUser> = {
  type: "User",
  field: "posts",
  resolve(user, _args, context) {
    return context.services.posts.getUserPosts(user.id);
  },
};

export const usersResolvers: FieldRegistration[] = [me, users, userPosts];
