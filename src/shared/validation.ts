import { err, ok, type Result } from "neverthrow";
import type { z, ZodError } from "zod";

import { type FieldErrors, ValidationError } from "./errors.js";

/**
 * Groups every zod issue under its dotted path, keeping issue order.
 */
export function fieldErrorsFromZod(error: ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "input";
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return err(new ValidationError(fieldErrorsFromZod(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * Throwing variant for resolver arguments already shaped by the GraphQL schema.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = parseInput(schema, data);
  if (result.isErr()) {throw result.error;}
  return result.value;
}
