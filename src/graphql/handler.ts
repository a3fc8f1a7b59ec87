/**
 * GraphQL HTTP Handler
 * ====================
 * `POST /graphql` with a JSON body `{ query, variables, operationName }`, or
 * `GET /graphql?query=...` for queries. Every operation is logged with its
 * query text, elapsed time, caller and outcome.
 */

import type { RequestHandler } from "express";
import {
  type DocumentNode,
  execute,
  type FormattedExecutionResult,
  getOperationAST,
  GraphQLError,
  type GraphQLSchema,
  parse,
  validate,
} from "graphql";
import { z } from "zod";

import type { AppServices } from "../container.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { getRequestAuth } from "../shared/auth-context.js";
import { ValidationError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import { parseArgs } from "../shared/validation.js";
import type { GraphQLContext } from "./context.js";
import { formatGraphQLError, logFault } from "./error-filter.js";

const graphqlRequestSchema = z.object({
  query: z.string({ required_error: "Query is required" }).trim().min(1, "Query is required"),
  variables: z.record(z.unknown()).nullish(),
  operationName: z.string().nullish(),
});

type GraphQLRequest = z.infer<typeof graphqlRequestSchema>;

function parseVariables(raw: unknown): unknown {
  if (typeof raw !== "string" || raw.length === 0) {return raw;}
  try {
    return JSON.parse(raw);
  } catch {
    throw ValidationError.forField("variables", "Variables must be valid JSON");
  }
}

function readRequest(method: string, body: unknown, query: Record<string, unknown>): GraphQLRequest {
  if (method === "GET") {
    return parseArgs(graphqlRequestSchema, {
      query: query.query,
      variables: parseVariables(query.variables),
      operationName: query.operationName,
    });
  }
  return parseArgs(graphqlRequestSchema, body);
}

function parseDocument(source: string): DocumentNode | GraphQLError {
  try {
    return parse(source);
  } catch (error) {
    if (error instanceof GraphQLError) {return error;}
    throw error;
  }
}

type Outcome = {
  status: number;
  body: FormattedExecutionResult;
};

function requestErrors(status: number, errors: readonly GraphQLError[]): Outcome {
  return { status, body: { errors: errors.map(formatGraphQLError) } };
}

export function createGraphQLHandler(schema: GraphQLSchema, services: AppServices): RequestHandler {
  return asyncHandler(async (req, res) => {
    const started = performance.now();
    const auth = getRequestAuth(req);
    const request = readRequest(req.method, req.body, req.query);

    const outcome = await run(request, req.method, { auth, services });

    const errors = outcome.body.errors;
    logger.info("GraphQL Operation", {
      query: request.query,
      operationName: request.operationName ?? undefined,
      elapsed_ms: Math.round(performance.now() - started),
      user: auth?.email ?? "Anonymous",
      status: errors && errors.length > 0 ? "Fail" : "Success",
    });

    if (outcome.status === 405) {res.setHeader("Allow", "POST");}
    res.status(outcome.status).json(outcome.body);
  });

  async function run(request: GraphQLRequest, method: string, context: GraphQLContext): Promise<Outcome> {
    const document = parseDocument(request.query);
    if (document instanceof GraphQLError) {return requestErrors(400, [document]);}

    const validationErrors = validate(schema, document);
    if (validationErrors.length > 0) {return requestErrors(400, validationErrors);}

    const operation = getOperationAST(document, request.operationName ?? undefined);
    if (method === "GET" && operation?.operation === "mutation") {
      return requestErrors(405, [
        new GraphQLError("Mutations can only be performed with a POST request."),
      ]);
    }

    const result = await execute({
      schema,
      document,
      variableValues: request.variables ?? undefined,
      operationName: request.operationName ?? undefined,
      contextValue: context,
    });

    for (const error of result.errors ?? []) {
      if (error.originalError) {
        logFault(error.originalError, { path: error.path?.join(".") });
      }
    }

    return {
      // No `data` key: the request never reached execution (e.g. bad variables).
      status: "data" in result ? 200 : 400,
      body: {
        ...result,
        errors: result.errors?.map(formatGraphQLError),
      },
    };
  }
}
