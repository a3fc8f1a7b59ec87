import type { AuthContext } from "../shared/auth-context.js";

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth-context middleware; undefined for anonymous callers. */
      auth?: AuthContext;
    }
  }
}

export {};
