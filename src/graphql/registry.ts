/**
 * Field Registry
 * ==============
 * Resolvers are plain data: each entry names its object type, its field and
 * the roles allowed to call it. `buildExecutableSchema` attaches them to the
 * SDL schema and refuses to start when the two disagree.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { buildSchema, type GraphQLSchema, isObjectType, isScalarType } from "graphql";
import type { Result } from "neverthrow";

import type { AuthContext } from "../shared/auth-context.js";
import type { Role } from "../shared/db-schema.js";
import { AppError, AuthenticationError, AuthorizationError, ConfigurationError } from "../shared/errors.js";
import type { GraphQLContext } from "./context.js";

export type ResolverArgs = Record<string, unknown>;

export interface FieldRegistration<TSource = unknown> {
  readonly type: string;
  readonly field: string;
  /** Omitted: open to anonymous callers. */
  readonly roles?: readonly Role[];
  resolve(source: TSource, args: ResolverArgs, context: GraphQLContext): unknown;
}

const SCHEMA_PATH = fileURLToPath(new URL("../../schema.graphql", import.meta.url));

export function loadSchemaSource(): string {
  return readFileSync(SCHEMA_PATH, "utf8");
}

export function authorize(auth: AuthContext | undefined, roles: readonly Role[]): AuthContext {
  if (!auth) {throw new AuthenticationError();}
  if (!roles.includes(auth.role)) {
    throw new AuthorizationError(`Requires role ${roles.join(" or ")}`);
  }
  return auth;
}

/**
 * Awaits a service result and throws its error so GraphQL execution records it
 * as the field's original error.
 */
export async function unwrap<T, E extends AppError>(pending: Promise<Result<T, E>>): Promise<T> {
  const result = await pending;
  if (result.isErr()) {throw result.error;}
  return result.value;
}

function serializeDateTime(value: unknown): string {
  if (value instanceof Date) {return value.toISOString();}
  if (typeof value === "string") {return value;}
  throw new TypeError(`DateTime cannot represent ${String(value)}`);
}

function attachDateTime(schema: GraphQLSchema): void {
  const scalar = schema.getType("DateTime");
  if (isScalarType(scalar)) {
    scalar.serialize = serializeDateTime;
  }
}

export function buildExecutableSchema(
  source: string,
  registrations: readonly FieldRegistration[]
): GraphQLSchema {
  const schema = buildSchema(source);
  attachDateTime(schema);
  const registered = new Set<string>();

  for (const reg of registrations) {
    const id = `${reg.type}.${reg.field}`;
    const type = schema.getType(reg.type);
    if (!isObjectType(type)) {
      throw new ConfigurationError(`Resolver ${id} targets unknown object type`);
    }
    const field = type.getFields()[reg.field];
    if (!field) {
      throw new ConfigurationError(`Resolver ${id} targets unknown field`);
    }
    if (registered.has(id)) {
      throw new ConfigurationError(`Resolver ${id} registered twice`);
    }
    registered.add(id);

    const roles = reg.roles;
    field.resolve = (parent: unknown, args: ResolverArgs, context: GraphQLContext) => {
      if (roles) {authorize(context.auth, roles);}
      return reg.resolve(parent, args, context);
    };
  }

  for (const root of [schema.getQueryType(), schema.getMutationType()]) {
    if (!root) {continue;}
    for (const name of Object.keys(root.getFields())) {
      if (!registered.has(`${root.name}.${name}`)) {
        throw new ConfigurationError(`No resolver registered for ${root.name}.${name}`);
      }
    }
  }

  return schema;
}
