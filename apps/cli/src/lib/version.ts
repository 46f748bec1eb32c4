/**
 * CLI Version - injected at build time by tsup
 *
 * @module lib/version
 */

// Build-time constant injected by tsup
declare const __CLI_VERSION__: string;

/**
 * CLI version string, falling back to the source version when run unbundled
 */
export const CLI_VERSION = typeof __CLI_VERSION__ !== 'undefined' ? __CLI_VERSION__ : '0.1.0';
