/**
 * Auth Module
 * ===========
 * Registration, login and session tokens.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { authResolvers } from "./auth.resolvers.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { type AuthService, createAuthService, type LoginResult } from "./auth.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./auth.schemas.js";
export { loginInputSchema, registerInputSchema } from "./auth.schemas.js";
