import type { Role } from "./db-schema.js";

export type UserAuthContext = {
  kind: "user";
  userId: string;
  email: string;
  role: Role;
};

export type AuthContext = UserAuthContext;

export function isUserAuth(ctx: AuthContext | undefined | null): ctx is UserAuthContext {
  return Boolean(ctx && ctx.kind === "user");
}

export function isAdmin(ctx: AuthContext | undefined | null): boolean {
  return isUserAuth(ctx) && ctx.role === "Admin";
}

/**
 * Accessors for storing auth context on Express `req` without relying on
 * global type augmentation.
 */
export function getRequestAuth(req: { auth?: AuthContext }): AuthContext | undefined {
  return req.auth;
}

export function setRequestAuth(req: { auth?: AuthContext }, ctx: AuthContext | undefined): void {
  req.auth = ctx;
}
