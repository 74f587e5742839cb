/**
 * @chainprobe/identify — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Path to a JSON file of extra chain descriptors, appended to the built-ins
  CHAIN_REGISTRY_EXTRA: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? undefined : v)),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Same as loadConfig, with validation failures returned instead of thrown.
 */
export function tryLoadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, z.ZodError> {
  const parsed = ConfigSchema.safeParse(env);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}
