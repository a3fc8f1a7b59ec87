import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { insertComment, insertUser, makeApp, makeTestContext, START, type TestContext } from "./test-app.js";
import { getTestAccessToken } from "./test-auth.js";

const REGISTER = `
  mutation Register($input: RegisterInput!) {
    register(input: $input) { id username email role createdAt }
  }
`;

const LOGIN = `
  mutation Login($input: LoginInput!) {
    login(input: $input)
  }
`;

const CREATE_POST = `
  mutation Create($input: CreatePostInput!) {
    createPost(input: $input) { id content createdAt updatedAt userId }
  }
`;

const UPDATE_POST = `
  mutation Update($input: UpdatePostInput!) {
    updatePost(input: $input) { id content }
  }
`;

const DELETE_POST = `
  mutation Delete($postId: ID!) {
    deletePost(postId: $postId)
  }
`;

const USER_POSTS = `
  query UserPosts($userId: ID!) {
    userPosts(userId: $userId) { totalCount nodes { content } }
  }
`;

describe("POST /graphql", () => {
  let ctx: TestContext;
  let app: ReturnType<typeof makeApp>;

  beforeEach(() => {
    ctx = makeTestContext();
    app = makeApp(ctx);
  });

  function gql(query: string, variables?: Record<string, unknown>, token?: string) {
    const req = request(app).post("/graphql");
    if (token) {req.set("Authorization", `Bearer ${token}`);}
    return req.send({ query, variables });
  }

  it("GET /health returns ok", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "ok",
      service: "graphql-posts-api",
      timestamp: expect.any(String),
    });
  });

  it("registers, logs in and manages posts end to end", async () => {
    const registered = await gql(REGISTER, {
      input: { username: "carol", email: "Carol@Example.com", password: "secret-1" },
    });
    expect(registered.status).toBe(200);
    expect(registered.body.data.register).toEqual({
      id: expect.any(String),
      username: "carol",
      email: "carol@example.com",
      role: "User",
      createdAt: START.toISOString(),
    });
    const userId: string = registered.body.data.register.id;

    const login = await gql(LOGIN, { input: { email: "carol@example.com", password: "secret-1" } });
    const token: string = login.body.data.login;
    expect(typeof token).toBe("string");

    const me = await gql("{ me { id username } }", undefined, token);
    expect(me.body.data.me).toEqual({ id: userId, username: "carol" });

    const created = await gql(CREATE_POST, { input: { content: "first post" } }, token);
    expect(created.body.data.createPost).toEqual({
      id: expect.any(String),
      content: "first post",
      createdAt: START.toISOString(),
      updatedAt: null,
      userId,
    });
    const postId: string = created.body.data.createPost.id;

    const listed = await gql(USER_POSTS, { userId });
    expect(listed.body.data.userPosts).toEqual({ totalCount: 1, nodes: [{ content: "first post" }] });

    const updated = await gql(UPDATE_POST, { input: { postId, newContent: "edited" } }, token);
    expect(updated.body.data.updatePost).toEqual({ id: postId, content: "edited" });
    const afterUpdate = await gql(USER_POSTS, { userId });
    expect(afterUpdate.body.data.userPosts.nodes).toEqual([{ content: "edited" }]);

    const deleted = await gql(DELETE_POST, { postId }, token);
    expect(deleted.body.data.deletePost).toBe(true);
    const afterDelete = await gql(USER_POSTS, { userId });
    expect(afterDelete.body.data.userPosts).toEqual({ totalCount: 0, nodes: [] });
  });

  it("returns every registration problem as validationErrors", async () => {
    const res = await gql(REGISTER, { input: { username: "ab", email: "bad", password: "123" } });

    expect(res.status).toBe(200);
    expect(res.body.data).toBeNull();
    expect(res.body.errors).toHaveLength(1);
    expect(res.body.errors[0]).toEqual({
      message: "Validation failed.",
      locations: expect.any(Array),
      path: ["register"],
      extensions: {
        validationErrors: {
          username: ["Username must be at least 3 characters"],
          email: ["Email must be a valid email address"],
          password: ["Password must be at least 6 characters"],
        },
      },
    });
  });

  it("reports a duplicate email with its errorType", async () => {
    const input = { username: "dave", email: "a@b.com", password: "secret-1" };
    await gql(REGISTER, { input });
    const res = await gql(REGISTER, { input: { ...input, username: "dave2" } });

    expect(res.body.errors[0].message).toBe("Unexpected error occurred.");
    expect(res.body.errors[0].extensions).toEqual({
      errorType: "DuplicateEmail",
      details: "Email 'a@b.com' is already in use",
    });
  });

  it("reports failed logins without saying which part was wrong", async () => {
    await insertUser(ctx, { username: "erin", email: "erin@example.com", password: "right-pw" });

    const wrongPassword = await gql(LOGIN, { input: { email: "erin@example.com", password: "wrong-pw" } });
    const unknownEmail = await gql(LOGIN, { input: { email: "nobody@example.com", password: "right-pw" } });

    const expected = { errorType: "InvalidCredentials", details: "Invalid email or password" };
    expect(wrongPassword.body.errors[0].extensions).toEqual(expected);
    expect(unknownEmail.body.errors[0].extensions).toEqual(expected);
  });

  it("requires authentication for guarded fields", async () => {
    const res = await gql(CREATE_POST, { input: { content: "anonymous" } });

    expect(res.status).toBe(200);
    expect(res.body.errors[0].extensions).toEqual({
      errorType: "Unauthenticated",
      details: "Authentication required",
    });
  });

  it("enforces the role set of a field", async () => {
    const admin = await insertUser(ctx, { username: "root", email: "root@example.com", role: "Admin" });
    const token = await getTestAccessToken(ctx, admin);

    const res = await gql(CREATE_POST, { input: { content: "admin post" } }, token);

    expect(res.body.errors[0].extensions).toEqual({
      errorType: "Forbidden",
      details: "Requires role User",
    });
  });

  it("forbids editing another user's post", async () => {
    const owner = await insertUser(ctx, { username: "owner", email: "owner@example.com" });
    const other = await insertUser(ctx, { username: "other", email: "other@example.com" });
    const created = await gql(CREATE_POST, { input: { content: "mine" } }, await getTestAccessToken(ctx, owner));
    const postId: string = created.body.data.createPost.id;

    const res = await gql(
      UPDATE_POST,
      { input: { postId, newContent: "theirs" } },
      await getTestAccessToken(ctx, other)
    );

    expect(res.body.errors[0].extensions).toEqual({
      errorType: "Forbidden",
      details: "Only the owner can update this post",
    });
  });

  it("reports NotFound for an unknown post", async () => {
    const user = await insertUser(ctx, { username: "frank", email: "frank@example.com" });

    const res = await gql(DELETE_POST, { postId: "missing-post" }, await getTestAccessToken(ctx, user));

    expect(res.body.errors[0].extensions).toEqual({
      errorType: "NotFound",
      details: "Post with ID 'missing-post' not found",
    });
  });

  it("resolves a post's author and comments", async () => {
    const author = await insertUser(ctx, { username: "gina", email: "gina@example.com" });
    const reader = await insertUser(ctx, { username: "hank", email: "hank@example.com" });
    const created = await gql(CREATE_POST, { input: { content: "with comments" } }, await getTestAccessToken(ctx, author));
    await insertComment(ctx, { postId: created.body.data.createPost.id, userId: reader.id, text: "nice" });

    const res = await gql(
      `query ($userId: ID!) {
        userPosts(userId: $userId) {
          nodes { user { username } comments { totalCount nodes { text userId } } }
        }
      }`,
      { userId: author.id }
    );

    expect(res.body.data.userPosts.nodes).toEqual([
      {
        user: { username: "gina" },
        comments: { totalCount: 1, nodes: [{ text: "nice", userId: reader.id }] },
      },
    ]);
  });

  it("filters, sorts and pages users", async () => {
    await insertUser(ctx, { username: "alice", email: "alice@example.com" });
    await insertUser(ctx, { username: "anna", email: "anna@example.com" });
    await insertUser(ctx, { username: "bob", email: "bob@example.com" });

    const res = await gql(`{
      users(where: { username: { startsWith: "a" } }, order: [{ username: DESC }], first: 1) {
        totalCount
        nodes { username }
        pageInfo { hasNextPage hasPreviousPage }
      }
    }`);

    expect(res.body.data.users).toEqual({
      totalCount: 2,
      nodes: [{ username: "anna" }],
      pageInfo: { hasNextPage: true, hasPreviousPage: false },
    });
  });

  it("rejects an oversized page as a validation failure", async () => {
    const res = await gql("{ posts(first: 51) { totalCount } }");

    expect(res.body.errors[0]).toMatchObject({
      message: "Validation failed.",
      extensions: { validationErrors: { first: ["first must not exceed 50"] } },
    });
  });
});

describe("GraphQL transport errors", () => {
  let app: ReturnType<typeof makeApp>;

  beforeEach(() => {
    app = makeApp();
  });

  it("rejects an invalid bearer token with 401", async () => {
    const res = await request(app)
      .post("/graphql")
      .set("Authorization", "Bearer not-a-token")
      .send({ query: "{ me { id } }" });

    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      errors: [
        {
          message: "Unexpected error occurred.",
          extensions: { errorType: "Unauthenticated", details: "Invalid or expired access token" },
        },
      ],
    });
  });

  it("rejects a malformed Authorization header with 401", async () => {
    const res = await request(app)
      .post("/graphql")
      .set("Authorization", "Token abc")
      .send({ query: "{ users { totalCount } }" });

    expect(res.status).toBe(401);
    expect(res.body.errors[0].extensions).toEqual({
      errorType: "Unauthenticated",
      details: "Malformed Authorization header",
    });
  });

  it("rejects an invalid JSON body", async () => {
    const res = await request(app)
      .post("/graphql")
      .set("Content-Type", "application/json")
      .send('{"query":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      errors: [{ message: "Validation failed.", extensions: { validationErrors: { body: ["Invalid JSON body"] } } }],
    });
  });

  it("requires a query", async () => {
    const res = await request(app).post("/graphql").send({});

    expect(res.status).toBe(400);
    expect(res.body.errors[0].extensions).toEqual({ validationErrors: { query: ["Query is required"] } });
  });

  it("passes syntax errors through unchanged", async () => {
    const res = await request(app).post("/graphql").send({ query: "{ users {" });

    expect(res.status).toBe(400);
    expect(res.body.errors[0].message).toMatch(/^Syntax Error/);
    expect(res.body.errors[0].extensions).toBeUndefined();
  });

  it("rejects missing variables before execution", async () => {
    const res = await request(app).post("/graphql").send({ query: DELETE_POST });

    expect(res.status).toBe(400);
    expect(res.body.data).toBeUndefined();
    expect(res.body.errors[0].message).toBe('Variable "$postId" of required type "ID!" was not provided.');
  });

  it("serves queries over GET", async () => {
    const res = await request(app).get("/graphql").query({ query: "{ users { totalCount } }" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ data: { users: { totalCount: 0 } } });
  });

  it("refuses mutations over GET", async () => {
    const res = await request(app).get("/graphql").query({ query: 'mutation { deletePost(postId: "x") }' });

    expect(res.status).toBe(405);
    expect(res.headers.allow).toBe("POST");
    expect(res.body.errors[0].message).toBe("Mutations can only be performed with a POST request.");
  });

  it("answers unknown routes with a normalized 404", async () => {
    const res = await request(app).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      errors: [
        {
          message: "Unexpected error occurred.",
          extensions: { errorType: "NotFound", details: "Route with ID '/nope' not found" },
        },
      ],
    });
  });
});
