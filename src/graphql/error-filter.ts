/**
 * GraphQL Error Filter
 * ====================
 * The one place faults become wire errors.
 *
 * - `ValidationError` -> "Validation failed." + `validationErrors`
 * - anything else thrown -> "Unexpected error occurred." + `errorType`, `details`
 * - GraphQL syntax/validation errors (nothing thrown) pass through unchanged
 */

import type { GraphQLError, GraphQLFormattedError } from "graphql";

import { AppError, ValidationError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

export const VALIDATION_FAILED_MESSAGE = "Validation failed.";
export const UNEXPECTED_ERROR_MESSAGE = "Unexpected error occurred.";

export type NormalizedError = {
  message: string;
  extensions:
    | { validationErrors: Record<string, string[]> }
    | { errorType: string; details: string };
};

type FaultDescription =
  | { kind: "ValidationFailure"; fields: Record<string, string[]> }
  | { kind: "Other"; errorType: string; details: string };

function describeFault(fault: unknown): FaultDescription {
  if (fault instanceof ValidationError) {
    return { kind: "ValidationFailure", fields: fault.fields };
  }
  if (fault instanceof AppError) {
    return {
      kind: "Other",
      errorType: fault.kind === "Unexpected" ? fault.name : fault.kind,
      details: fault.message,
    };
  }
  if (fault instanceof Error) {
    return { kind: "Other", errorType: fault.name, details: fault.message };
  }
  return { kind: "Other", errorType: "Error", details: String(fault) };
}

export function normalizeFault(fault: unknown): NormalizedError {
  const described = describeFault(fault);
  switch (described.kind) {
    case "ValidationFailure":
      return {
        message: VALIDATION_FAILED_MESSAGE,
        extensions: { validationErrors: described.fields },
      };
    case "Other":
      return {
        message: UNEXPECTED_ERROR_MESSAGE,
        extensions: { errorType: described.errorType, details: described.details },
      };
  }
}

export function statusForFault(fault: unknown): number {
  return fault instanceof AppError ? fault.statusCode : 500;
}

/**
 * Client faults (401/403/404/validation) stay below ERROR level.
 */
export function logFault(fault: unknown, meta: Record<string, unknown> = {}): void {
  const status = statusForFault(fault);
  const payload = {
    status,
    code: fault instanceof AppError ? fault.code : undefined,
    error: fault instanceof Error ? fault.message : String(fault),
    ...meta,
  };

  if (status >= 500) {
    logger.error("GraphQL error", {
      ...payload,
      stack: fault instanceof Error ? fault.stack : undefined,
    });
  } else if (status === 401 || status === 403 || status === 404) {
    logger.info("GraphQL error", payload);
  } else {
    logger.warn("GraphQL error", payload);
  }
}

export function formatGraphQLError(error: GraphQLError): GraphQLFormattedError {
  const fault = error.originalError;
  if (!fault) {return error.toJSON();}

  const normalized = normalizeFault(fault);
  return {
    message: normalized.message,
    locations: error.locations,
    path: error.path,
    extensions: normalized.extensions,
  };
}
