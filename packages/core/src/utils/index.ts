/**
 * Core Utilities Module
 *
 * Shared utilities for error handling, logging, retries, validation and
 * concurrency control.
 */

export * from './errors.js';
export * from './logger.js';
export * from './validation.js';
export * from './retry.js';
export * from './semaphore.js';
