/**
 * Centralized Configuration System
 *
 * Single source of truth for all environment variables and configuration.
 * Provides type-safe, validated configuration with:
 * - Schema validation via Zod
 * - Type normalization (numbers, flags, URLs)
 * - Fail-fast on insecure transport in production
 * - Secret redaction for debugging
 */

export {
  loadConfig,
  printConfig,
  clearConfigCache,
  parseEnvFile,
  toClientOptions,
  type Config,
  type ConfigOptions,
  type ClientSettings,
  type Environment,
} from './loader.js';
export { configSchema, SECRET_KEYS, type ConfigSchema } from './schema.js';
export { redactSecrets } from './redaction.js';
