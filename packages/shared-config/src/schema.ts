/**
 * Configuration Schema
 *
 * Defines all environment variables with validation, types, and defaults.
 */

import { z } from 'zod';

/**
 * Environment flag: "1", "true" and "yes" (any case) are on, anything else is off
 */
const flag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase()));

/**
 * Complete configuration schema for all groundcheck components
 */
export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================================================
  // Core Connection
  // ============================================================================
  GROUNDCHECK_CORE_URL: z.string().url().default('http://localhost:8080'),
  GROUNDCHECK_API_KEY: z.string().min(1).optional(),
  GROUNDCHECK_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  GROUNDCHECK_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  GROUNDCHECK_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(100),
  GROUNDCHECK_CLIENT_MODE: z.enum(['concurrent', 'serial']).default('concurrent'),

  // ============================================================================
  // Logging & Output
  // ============================================================================
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  GROUNDCHECK_NO_COLOR: flag,
});

export type ConfigSchema = z.infer<typeof configSchema>;

/**
 * Secrets that should be redacted when printing config
 */
export const SECRET_KEYS = [
  'GROUNDCHECK_API_KEY',
  'GROUNDCHECK_CORE_URL', // May contain credentials
] as const;
