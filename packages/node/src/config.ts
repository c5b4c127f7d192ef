/**
 * @ordergrid/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and derives the auth and event settings the app is built with.
 */

import { z } from "zod";
import type { Logger } from "pino";
import { LoggingEventPublisher, WebhookEventPublisher } from "@ordergrid/events";
import type { EventPublisher } from "@ordergrid/events";
import type { AuthConfig } from "./middleware/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().optional(),

  // Background tasks
  TASK_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  TASK_PHASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  // Events
  EVENTS_WEBHOOK_URL: z.string().url().optional(),
  EVENTS_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into a key set.
 *
 * Format: "key1,key2,key3"
 */
export function parseApiKeys(raw: string): ReadonlySet<string> {
  const keys = new Set<string>();
  if (raw.trim() === "") {
    return keys;
  }

  for (const entry of raw.split(",")) {
    const key = entry.trim();
    if (key === "") {
      throw new Error("API key cannot be empty in API_KEYS");
    }
    keys.add(key);
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Derived Settings
// =============================================================================

/**
 * Auth is enabled when at least one API key or a JWT secret is configured.
 */
export function toAuthConfig(config: AppConfig): AuthConfig | undefined {
  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.size === 0 && config.JWT_SECRET === undefined) {
    return undefined;
  }
  return {
    apiKeys,
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}

/**
 * Webhook delivery when EVENTS_WEBHOOK_URL is set, otherwise events are
 * only logged at debug.
 */
export function createEventPublisher(
  config: AppConfig,
  logger: Logger,
  fetchFn?: typeof fetch,
): EventPublisher {
  if (config.EVENTS_WEBHOOK_URL === undefined) {
    return new LoggingEventPublisher(logger);
  }
  return new WebhookEventPublisher({
    url: config.EVENTS_WEBHOOK_URL,
    timeoutMs: config.EVENTS_TIMEOUT_MS,
    fetchFn,
  });
}
