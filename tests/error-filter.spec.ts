import { GraphQLError } from "graphql";
import { describe, expect, it } from "vitest";

import { formatGraphQLError, normalizeFault, statusForFault } from "../src/graphql/error-filter.js";
import {
  AuthenticationError,
  AuthorizationError,
  ConfigurationError,
  DuplicateEmailError,
  InvalidCredentialsError,
  NotFoundError,
  ValidationError,
} from "../src/shared/errors.js";

describe("normalizeFault", () => {
  it("exposes validation failures field by field", () => {
    const fault = new ValidationError({
      username: ["Username must be at least 3 characters"],
      password: ["Password must be at least 6 characters"],
    });

    expect(normalizeFault(fault)).toEqual({
      message: "Validation failed.",
      extensions: {
        validationErrors: {
          username: ["Username must be at least 3 characters"],
          password: ["Password must be at least 6 characters"],
        },
      },
    });
  });

  it.each([
    [new DuplicateEmailError("a@b.com"), "DuplicateEmail", "Email 'a@b.com' is already in use"],
    [new InvalidCredentialsError(), "InvalidCredentials", "Invalid email or password"],
    [new NotFoundError("Post", "p-1"), "NotFound", "Post with ID 'p-1' not found"],
    [new AuthenticationError(), "Unauthenticated", "Authentication required"],
    [new AuthorizationError(), "Forbidden", "Not authorized"],
  ])("maps typed fault %# to its kind", (fault, errorType, details) => {
    expect(normalizeFault(fault)).toEqual({
      message: "Unexpected error occurred.",
      extensions: { errorType, details },
    });
  });

  it("uses the class name for untyped faults", () => {
    expect(normalizeFault(new TypeError("x is not a function")).extensions).toEqual({
      errorType: "TypeError",
      details: "x is not a function",
    });
    expect(normalizeFault(new ConfigurationError("JWT_SECRET is required")).extensions).toEqual({
      errorType: "ConfigurationError",
      details: "Configuration error: JWT_SECRET is required",
    });
  });

  it("handles thrown non-errors", () => {
    expect(normalizeFault("boom")).toEqual({
      message: "Unexpected error occurred.",
      extensions: { errorType: "Error", details: "boom" },
    });
  });
});

describe("statusForFault", () => {
  it("follows the fault's status code", () => {
    expect(statusForFault(ValidationError.forField("a", "b"))).toBe(400);
    expect(statusForFault(new AuthenticationError())).toBe(401);
    expect(statusForFault(new AuthorizationError())).toBe(403);
    expect(statusForFault(new Error("x"))).toBe(500);
  });
});

describe("formatGraphQLError", () => {
  it("passes GraphQL's own errors through unchanged", () => {
    const error = new GraphQLError('Cannot query field "nope" on type "Query".');
    expect(formatGraphQLError(error)).toEqual({ message: 'Cannot query field "nope" on type "Query".' });
  });

  it("normalizes the original error of a field failure", () => {
    const error = new GraphQLError("ignored", {
      path: ["createPost"],
      originalError: new AuthorizationError("Requires role User"),
    });

    expect(formatGraphQLError(error)).toEqual({
      message: "Unexpected error occurred.",
      path: ["createPost"],
      extensions: { errorType: "Forbidden", details: "Requires role User" },
    });
  });
});
