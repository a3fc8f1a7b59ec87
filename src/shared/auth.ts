import { errors as joseErrors, jwtVerify, SignJWT } from "jose";
import { err, ok, type Result } from "neverthrow";

import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { AuthConfig } from "./config.js";
import { isRole, type Role } from "./db-schema.js";
import { AuthenticationError } from "./errors.js";

export type AccessTokenClaims = {
  sub: string; // user id
  email: string;
  role: Role;
};

export type SignedAccessToken = {
  token: string;
  expiresAt: Date;
  expiresIn: number;
};

export interface TokenIssuer {
  signAccessToken(params: { userId: string; email: string; role: Role }): Promise<SignedAccessToken>;
  verifyAccessToken(token: string): Promise<Result<AccessTokenClaims, AuthenticationError>>;
}

/**
 * HS256 session tokens. Stateless: no refresh flow and no revocation, a token
 * is valid until `exp`.
 */
export function createTokenIssuer(config: AuthConfig, clock: Clock = systemClock): TokenIssuer {
  const key = new TextEncoder().encode(config.secret);

  return {
    async signAccessToken(params) {
      const issuedAt = Math.floor(clock.now().getTime() / 1000);
      const expiresAt = issuedAt + config.tokenTtlSeconds;

      const token = await new SignJWT({
        email: params.email,
        role: params.role,
      })
        .setProtectedHeader({ alg: "HS256", typ: "JWT" })
        .setIssuer(config.issuer)
        .setAudience(config.audience)
        .setSubject(params.userId)
        .setIssuedAt(issuedAt)
        .setExpirationTime(expiresAt)
        .sign(key);

      return {
        token,
        expiresAt: new Date(expiresAt * 1000),
        expiresIn: config.tokenTtlSeconds,
      };
    },

    async verifyAccessToken(token) {
      try {
        const { payload } = await jwtVerify(token, key, {
          issuer: config.issuer,
          audience: config.audience,
          algorithms: ["HS256"],
          currentDate: clock.now(),
        });

        const sub = typeof payload.sub === "string" && payload.sub.trim() ? payload.sub.trim() : null;
        const email = typeof payload.email === "string" && payload.email.trim() ? payload.email.trim() : null;
        if (!sub || !email || !isRole(payload.role)) {
          return err(new AuthenticationError("Invalid access token"));
        }

        return ok({ sub, email, role: payload.role });
      } catch (error: unknown) {
        if (error instanceof joseErrors.JWTExpired) {
          return err(new AuthenticationError("Access token expired"));
        }
        return err(new AuthenticationError("Invalid or expired access token"));
      }
    },
  };
}

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") {return null;}
  const v = value.trim();
  if (!v) {return null;}
  const m = /^Bearer\s+(.+)$/i.exec(v);
  if (!m) {return null;}
  const token = m[1]?.trim();
  return token ? token : null;
}
