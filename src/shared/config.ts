/**
 * Application Config
 * ==================
 * Environment-driven settings. Read on every call; nothing is memoized.
 */

import { ConfigurationError } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export function envString(key: string): string | undefined {
  const raw = process.env[key];
  const trimmed = typeof raw === "string" ? raw.trim() : "";
  return trimmed.length > 0 ? trimmed : undefined;
}

export function envInt(key: string, fallback: number): number {
  const raw = envString(key);
  if (!raw) {return fallback;}
  const v = Number(raw);
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : fallback;
}

export function envList(key: string): string[] {
  const raw = envString(key);
  if (!raw) {return [];}
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export type AppConfig = {
  port: number;
  databaseUrl: string;
  postsCacheSlidingSeconds: number;
  redisUrl: string | null;
  corsOrigins: string[];
};

export function getAppConfig(): AppConfig {
  return {
    port: envInt("PORT", 3000),
    databaseUrl: envString("DATABASE_URL") || "file:./data/app.db",
    postsCacheSlidingSeconds: envInt("POSTS_CACHE_SLIDING_SECONDS", 5 * 60),
    redisUrl: envString("REDIS_URL") ?? null,
    corsOrigins: envList("CORS_ORIGINS"),
  };
}

export type AuthConfig = {
  secret: string;
  issuer: string;
  audience: string;
  tokenTtlSeconds: number;
};

export function getAuthConfig(): AuthConfig {
  const secret = envString("JWT_SECRET");
  if (!secret) {throw new ConfigurationError("JWT_SECRET is required");}

  return {
    secret,
    issuer: envString("JWT_ISSUER") || "graphql-posts",
    audience: envString("JWT_AUDIENCE") || "graphql-posts",
    tokenTtlSeconds: envInt("AUTH_TOKEN_TTL_SECONDS", 24 * 60 * 60),
  };
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function getLogLevel(): LogLevel {
  const raw = (envString("LOG_LEVEL") || "").toLowerCase();
  const found = LOG_LEVELS.find((level) => level === raw);
  if (found) {return found;}
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}
