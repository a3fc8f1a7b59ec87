import type { RequestHandler } from "express";

import { extractBearerToken, type TokenIssuer } from "../shared/auth.js";
import { setRequestAuth } from "../shared/auth-context.js";
import { AuthenticationError } from "../shared/errors.js";

/**
 * Populates `req.auth` from `Authorization: Bearer <jwt>`.
 *
 * - no header: anonymous, `req.auth` stays undefined
 * - malformed header or invalid/expired token: 401 through the error handler
 */
export function createAuthContextMiddleware(tokens: TokenIssuer): RequestHandler {
  return (req, _res, next) => {
    setRequestAuth(req, undefined);

    const header = req.headers.authorization;
    if (header === undefined) {return next();}

    const bearer = extractBearerToken(header);
    if (!bearer) {return next(new AuthenticationError("Malformed Authorization header"));}

    tokens
      .verifyAccessToken(bearer)
      .then((result) => {
        if (result.isErr()) {return next(result.error);}
        const claims = result.value;
        setRequestAuth(req, {
          kind: "user",
          userId: claims.sub,
          email: claims.email,
          role: claims.role,
        });
        next();
      })
      .catch(next);
  };
}
