/**
 * Environment Variable Handler
 *
 * Reads the variables stackterm understands, with .env support via dotenv
 * for local development:
 * - STACKTERM_HOME: config directory (default ~/.stackterm)
 * - STACKTERM_LOG_FILE: append debug logs to this file
 * - SHELL: shell used by shell-out when no command is configured
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const nonEmpty = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const EnvSchema = z.object({
  STACKTERM_HOME: nonEmpty,
  STACKTERM_LOG_FILE: nonEmpty,
  SHELL: nonEmpty.transform((value) => value ?? '/bin/sh'),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through getEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @returns The parsed environment variables with defaults applied
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    STACKTERM_HOME: process.env.STACKTERM_HOME,
    STACKTERM_LOG_FILE: process.env.STACKTERM_LOG_FILE,
    SHELL: process.env.SHELL,
  });
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 *
 * @param key - The environment variable name
 * @returns The value (undefined for unset optional keys)
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
