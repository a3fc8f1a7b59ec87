/**
 * Error Handler Middleware
 * ========================
 * Central place for errors raised outside GraphQL execution (bad JSON, invalid
 * token, unknown route). Responses use the same normalized shape as GraphQL
 * errors: `{ errors: [{ message, extensions }] }`.
 */

import type { ErrorRequestHandler } from "express";

import { logFault, normalizeFault, statusForFault } from "../graphql/error-filter.js";
import { ValidationError } from "../shared/errors.js";

function isBodyParserSyntaxError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {return next(error);}

  // Bad JSON body (express.json)
  const fault = isBodyParserSyntaxError(error)
    ? ValidationError.forField("body", "Invalid JSON body")
    : error;

  const status = statusForFault(fault);
  logFault(fault, { method: req.method, path: req.originalUrl });

  res.status(status).json({ errors: [normalizeFault(fault)] });
};
