/**
 * @concentra/core — Configuration.
 *
 * Loads and validates engine configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),

  // Engine identity
  CORE_ADDRESS: z.string().min(1).default("0xcore"),
  CORE_OWNER: z.string().min(1).default("0xowner"),

  // Swap defaults
  DEFAULT_SKIP_AHEAD: z.coerce.number().int().min(0).default(0),
});

export type CoreConfig = z.infer<typeof ConfigSchema>;

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
): CoreConfig {
  return ConfigSchema.parse(env);
}
