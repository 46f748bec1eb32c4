/**
 * Secret Redaction Utilities
 *
 * Safely redacts secrets from configuration objects for debugging/logging.
 */

import { SECRET_KEYS } from './schema.js';

const REDACTION_PLACEHOLDER = '***REDACTED***';

type SecretKey = (typeof SECRET_KEYS)[number];

function redactValue(value: string): string {
  // For URLs, redact credentials but keep structure
  if (value.includes('://')) {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      return REDACTION_PLACEHOLDER;
    }
    // A URL without credentials carries no secret
    if (!url.username && !url.password) {
      return value;
    }
    return `${url.protocol}//${REDACTION_PLACEHOLDER}@${url.host}${url.pathname}${url.search}${url.hash}`;
  }

  // For non-URLs, show first 4 and last 4 chars if long enough
  return value.length > 8
    ? `${value.slice(0, 4)}${REDACTION_PLACEHOLDER}${value.slice(-4)}`
    : REDACTION_PLACEHOLDER;
}

/**
 * Redact secrets from a configuration object
 */
export function redactSecrets(config: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...config };

  for (const [key, value] of Object.entries(redacted)) {
    if (isSecretKey(key) && value !== undefined && value !== null) {
      redacted[key] = redactValue(String(value));
    }
  }

  return redacted;
}

function isSecretKey(key: string): key is SecretKey {
  return SECRET_KEYS.some((secret) => secret === key);
}
