import type { AppServices } from "../container.js";
import { type AuthContext, isUserAuth, type UserAuthContext } from "../shared/auth-context.js";
import { AuthenticationError } from "../shared/errors.js";

export type GraphQLContext = {
  auth: AuthContext | undefined;
  services: AppServices;
};

export function requireCaller(context: GraphQLContext): UserAuthContext {
  if (!isUserAuth(context.auth)) {throw new AuthenticationError();}
  return context.auth;
}
