/**
 * @cosign/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Engine
  ENGINE_ID: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[a-z0-9][a-z0-9._-]*$/, "lowercase letters, digits, '.', '_' or '-'")
    .default("cosign-multisig"),

  // Limits
  MAX_PAYLOAD_BYTES: z.coerce.number().int().min(1).max(65536).default(1024),
  MAX_SIGNERS: z.coerce.number().int().min(1).max(256).default(32),
  MAX_BODY_BYTES: z.coerce.number().int().min(1024).default(262144),

  // Request signing
  SIGNATURE_MAX_AGE_MS: z.coerce.number().int().min(1000).default(300000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
