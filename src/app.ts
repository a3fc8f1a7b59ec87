/**
 * Express Application Factory
 * ============================
 * Creates and configures the Express app with the GraphQL endpoint and middleware
 */

import cors from "cors";
import express from "express";
import type { GraphQLSchema } from "graphql";

import type { AppServices } from "./container.js";
import { createGraphQLHandler } from "./graphql/handler.js";
import { createExecutableSchema } from "./graphql/schema.js";
import { createAuthContextMiddleware } from "./middleware/auth-context.js";
import { errorHandler } from "./middleware/error-handler.js";
import { notFoundHandler } from "./middleware/not-found.js";
import type { TokenIssuer } from "./shared/auth.js";

export type AppOptions = {
  services: AppServices;
  tokens: TokenIssuer;
  corsOrigins?: string[];
  schema?: GraphQLSchema;
};

export function createApp(options: AppOptions) {
  const app = express();
  const schema = options.schema ?? createExecutableSchema();

  const origins = options.corsOrigins ?? [];
  app.use(cors(origins.length > 0 ? { origin: origins, credentials: true } : undefined));
  app.use(express.json({ limit: "1mb" }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      service: "graphql-posts-api",
    });
  });

  const graphql = createGraphQLHandler(schema, options.services);
  app.use("/graphql", createAuthContextMiddleware(options.tokens));
  app.post("/graphql", graphql);
  app.get("/graphql", graphql);

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
