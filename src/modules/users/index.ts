/**
 * Users Module
 * ============
 * Credential store and user directory queries.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { usersResolvers } from "./users.resolvers.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createUsersService, type UsersService } from "./users.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// DATA LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createUsersRepository, type UsersRepository } from "./users.repository.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./users.schemas.js";
export { toPublicUser, usersQueryArgsSchema } from "./users.schemas.js";
