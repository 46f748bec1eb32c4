/**
 * Configuration Loader
 *
 * Loads and validates configuration from environment variables.
 * Supports .env files in development only (never in production).
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { configSchema, type ConfigSchema } from './schema.js';
import { redactSecrets } from './redaction.js';

export type Config = ConfigSchema;

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ConfigOptions {
  /**
   * Whether to load .env files (default: true in dev, false in prod)
   */
  loadEnvFile?: boolean;

  /**
   * Path to .env file (default: searches the working directory)
   */
  envFilePath?: string;

  /**
   * Whether to reject an unencrypted remote Core URL (default: true in prod)
   */
  failFast?: boolean;

  /**
   * Variables to read instead of process.env
   */
  env?: Environment;
}

/**
 * Settings for building a Core client, in the shape the client factory takes
 */
export interface ClientSettings {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  apiKey?: string;
  mode: Config['GROUNDCHECK_CLIENT_MODE'];
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]', '::1']);

let cachedConfig: Config | null = null;

/**
 * Parse .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  const lines = content.split('\n');

  for (const line of lines) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    // Parse KEY=VALUE format
    const match = trimmed.match(/^([^#=]+)=(.*)$/);
    if (match && match[1] && match[2] !== undefined) {
      const key = match[1].trim();
      let value = match[2].trim();

      // Remove quotes if present
      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

/**
 * Find .env file in the working directory
 */
function findEnvFile(startPath: string = process.cwd()): string | null {
  const searchPaths = [
    resolve(startPath, '.env'),
    resolve(startPath, '.env.local'),
    resolve(startPath, '.env.development'),
  ];

  for (const path of searchPaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

/**
 * Load environment variables from .env file (dev only)
 */
function loadEnvFile(nodeEnv: string, filePath?: string): Record<string, string> {
  // Never load .env files in production
  if (nodeEnv === 'production') {
    return {};
  }

  const envPath = filePath || findEnvFile();
  if (!envPath) {
    return {};
  }

  try {
    const content = readFileSync(envPath, 'utf-8');
    return parseEnvFile(content);
  } catch (error) {
    // A missing file is the same as no file
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new Error(`Failed to load .env file at ${envPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Merge environment variables (the environment takes precedence over .env file)
 */
function mergeEnvVars(envFileVars: Record<string, string>, env: Environment): Record<string, string> {
  const result: Record<string, string> = { ...envFileVars };

  // Only copy defined values from the environment
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Reject (or warn about) plain HTTP to a non-loopback Core in production
 */
function validateProductionTransport(config: Config, failFast: boolean): void {
  if (config.NODE_ENV !== 'production') {
    return;
  }

  const url = new URL(config.GROUNDCHECK_CORE_URL);
  if (url.protocol !== 'http:' || LOOPBACK_HOSTS.has(url.hostname)) {
    return;
  }

  const errorMessage = [
    '⚠️  SECURITY WARNING: Unencrypted Core connection in production!',
    `   GROUNDCHECK_CORE_URL points at ${url.host} over plain HTTP.`,
    '   Serve the Core over HTTPS or reach it through a loopback tunnel.',
  ].join('\n');

  if (failFast) {
    throw new Error(`Production requires HTTPS for a remote Core: ${url.host}\n${errorMessage}`);
  }

  // eslint-disable-next-line no-console
  console.error(errorMessage);
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: ConfigOptions = {}): Config {
  // Return cached config if available
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;

  // Read NODE_ENV directly (before loading .env) to determine defaults
  const nodeEnv = env.NODE_ENV || 'development';
  const isProduction = nodeEnv === 'production';

  const {
    loadEnvFile: shouldLoadEnvFile = !isProduction,
    envFilePath,
    failFast = isProduction,
  } = options;

  // Load .env file if enabled
  const envFileVars = shouldLoadEnvFile ? loadEnvFile(nodeEnv, envFilePath) : {};

  // Merge environment variables (the environment takes precedence)
  const envVars = mergeEnvVars(envFileVars, env);

  // Parse and validate with Zod
  const parseResult = configSchema.safeParse(envVars);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((err) => {
        const path = err.path.join('.');
        return `  • ${path || 'root'}: ${err.message}`;
      })
      .join('\n');

    throw new Error(`Invalid configuration:\n${errors}`);
  }

  const config = parseResult.data;

  validateProductionTransport(config, failFast);

  // Cache the config
  cachedConfig = config;

  return config;
}

/**
 * Print configuration (with secret redaction)
 */
export function printConfig(config?: Config, options: { redactSecrets?: boolean } = {}): void {
  const configToPrint = config || loadConfig();
  const { redactSecrets: shouldRedact = true } = options;

  const output = shouldRedact
    ? redactSecrets(configToPrint)
    : configToPrint;

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(output, null, 2));
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Map configuration onto Core client settings
 */
export function toClientOptions(config: Config): ClientSettings {
  return {
    baseUrl: config.GROUNDCHECK_CORE_URL,
    timeoutMs: config.GROUNDCHECK_TIMEOUT_MS,
    maxRetries: config.GROUNDCHECK_MAX_RETRIES,
    retryDelayMs: config.GROUNDCHECK_RETRY_DELAY_MS,
    ...(config.GROUNDCHECK_API_KEY ? { apiKey: config.GROUNDCHECK_API_KEY } : {}),
    mode: config.GROUNDCHECK_CLIENT_MODE,
  };
}
