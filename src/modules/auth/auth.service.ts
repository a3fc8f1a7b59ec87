/**
 * Auth Service
 * ============
 * Registration and login.
 */

import { randomUUID } from "node:crypto";

import { err, ok, type Result } from "neverthrow";

import type { SignedAccessToken, TokenIssuer } from "../../shared/auth.js";
import type { Clock } from "../../shared/clock.js";
import { DuplicateEmailError, InvalidCredentialsError, ValidationError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { PasswordHasher } from "../../shared/password.js";
import { parseInput } from "../../shared/validation.js";
import type { UsersRepository } from "../users/users.repository.js";
import { type PublicUser, toPublicUser } from "../users/users.schemas.js";
import { loginInputSchema, registerInputSchema } from "./auth.schemas.js";

export type LoginResult = {
  token: string;
  expiresAt: Date;
  expiresIn: number;
  user: PublicUser;
};

export type AuthServiceDeps = {
  users: UsersRepository;
  tokens: TokenIssuer;
  hasher: PasswordHasher;
  clock: Clock;
};

export function createAuthService(deps: AuthServiceDeps) {
  const { users, tokens, hasher, clock } = deps;

  // Verified against when the email is unknown, so both login failures cost a hash.
  let dummyHash: Promise<string> | null = null;
  const getDummyHash = () => (dummyHash ??= hasher.hash(randomUUID()));

  return {
    async register(input: unknown): Promise<Result<PublicUser, ValidationError | DuplicateEmailError>> {
      const parsed = parseInput(registerInputSchema, input);
      if (parsed.isErr()) {
        logger.warn("Registration rejected", { fields: Object.keys(parsed.error.fields) });
        return err(parsed.error);
      }
      const { username, email, password } = parsed.value;

      if (await users.findByEmail(email)) {
        logger.warn("Registration failed: email already in use", { email });
        return err(new DuplicateEmailError(email));
      }
      if (await users.existsByUsername(username)) {
        return err(ValidationError.forField("username", "Username is already taken"));
      }

      logger.info("Registering user", { email });

      const inserted = await users.insert({
        id: randomUUID(),
        username,
        email,
        passwordHash: await hasher.hash(password),
        role: "User",
        createdAt: clock.now(),
      });

      if (inserted.isErr()) {
        if (inserted.error.field === "email") {return err(new DuplicateEmailError(email));}
        return err(ValidationError.forField("username", "Username is already taken"));
      }
      return ok(toPublicUser(inserted.value));
    },

    async login(input: unknown): Promise<Result<LoginResult, InvalidCredentialsError>> {
      const parsed = parseInput(loginInputSchema, input);
      if (parsed.isErr()) {return err(new InvalidCredentialsError());}
      const { email, password } = parsed.value;

      const user = await users.findByEmail(email);
      if (!user) {
        await hasher.verify(password, await getDummyHash());
        logger.warn("Login failed", { email });
        return err(new InvalidCredentialsError());
      }

      if (!(await hasher.verify(password, user.passwordHash))) {
        logger.warn("Login failed", { email });
        return err(new InvalidCredentialsError());
      }

      const signed: SignedAccessToken = await tokens.signAccessToken({
        userId: user.id,
        email: user.email,
        role: user.role,
      });

      logger.info("User logged in", { userId: user.id });
      return ok({ ...signed, user: toPublicUser(user) });
    },
  };
}

export type AuthService = ReturnType<typeof createAuthService>;
