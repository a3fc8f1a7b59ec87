import { requireCaller } from "../../graphql/context.js";
import { type FieldRegistration, unwrap } from "../../graphql/registry.js";
import { parseArgs } from "../../shared/validation.js";
import { commentsArgsSchema, type PostRecord, postsQueryArgsSchema, userPostsArgsSchema } from "./posts.schemas.js";

const queries: FieldRegistration[] = [
  {
    type: "Query",
    field: "posts",
    resolve(_source, args, context) {
      return context.services.posts.listPosts(parseArgs(postsQueryArgsSchema, args));
    },
  },
  {
    type: "Query",
    field: "userPosts",
    resolve(_source, args, context) {
      const { userId, ...rest } = parseArgs(userPostsArgsSchema, args);
      return context.services.posts.userPostsConnection(userId, rest);
    },
  },
];

const postFields: FieldRegistration<PostRecord>[] = [
  {
    type: "Post",
    field: "user",
    resolve(post, _args, context) {
      return unwrap(context.services.users.getUser(post.userId));
    },
  },
  {
    type: "Post",
    field: "comments",
    resolve(post, args, context) {
      return context.services.posts.listComments(post.id, parseArgs(commentsArgsSchema, args));
    },
  },
];

const mutations: FieldRegistration[] = [
  {
    type: "Mutation",
    field: "createPost",
    roles: ["User"],
    resolve(_source, args, context) {
      return unwrap(context.services.posts.createPost(requireCaller(context), args.input));
    },
  },
  {
    type: "Mutation",
    field: "updatePost",
    roles: ["User", "Admin"],
    resolve(_source, args, context) {
      return unwrap(context.services.posts.updatePost(requireCaller(context), args.input));
    },
  },
  {
    type: "Mutation",
    field: "deletePost",
    roles: ["User", "Admin"],
    resolve(_source, args, context) {
      return unwrap(context.services.posts.deletePost(requireCaller(context), { postId: args.postId }));
    },
  },
];

export const postsResolvers: FieldRegistration[] = [...queries, ...postFields, ...mutations];
