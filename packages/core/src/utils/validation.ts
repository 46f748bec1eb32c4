/**
 * Input Validation Utilities
 *
 * Provides type-safe validation with detailed error messages.
 */

import { ValidationError } from './errors.js';

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

export interface Validator<T> {
  (value: unknown): ValidationResult<T>;
}

/**
 * Create a string validator. Byte limits are measured on the UTF-8 encoding.
 */
export function string(options: {
  maxBytes?: number;
  allowEmpty?: boolean;
} = {}): Validator<string> {
  return (value: unknown): ValidationResult<string> => {
    const errors: string[] = [];

    if (typeof value !== 'string') {
      return { valid: false, errors: ['Expected a string'] };
    }

    if (!options.allowEmpty && value.length === 0) {
      errors.push('String cannot be empty');
    }

    if (options.maxBytes !== undefined) {
      const bytes = Buffer.byteLength(value, 'utf8');
      if (bytes > options.maxBytes) {
        errors.push(`String exceeds ${options.maxBytes} bytes (${bytes} bytes)`);
      }
    }

    return errors.length === 0 ? { valid: true, value } : { valid: false, errors };
  };
}

/**
 * Create a number validator
 */
export function number(options: {
  min?: number;
  max?: number;
  integer?: boolean;
} = {}): Validator<number> {
  return (value: unknown): ValidationResult<number> => {
    const errors: string[] = [];

    if (typeof value !== 'number' || isNaN(value)) {
      return { valid: false, errors: ['Expected a number'] };
    }

    if (options.integer && !Number.isSafeInteger(value)) {
      errors.push('Number must be an integer');
    }

    if (options.min !== undefined && value < options.min) {
      errors.push(`Number must be at least ${options.min}`);
    }

    if (options.max !== undefined && value > options.max) {
      errors.push(`Number must be at most ${options.max}`);
    }

    return errors.length === 0 ? { valid: true, value } : { valid: false, errors };
  };
}

/**
 * Create an array validator
 */
export function array<T>(
  itemValidator: Validator<T>,
  options: { minLength?: number; maxLength?: number } = {}
): Validator<T[]> {
  return (value: unknown): ValidationResult<T[]> => {
    const errors: string[] = [];

    if (!Array.isArray(value)) {
      return { valid: false, errors: ['Expected an array'] };
    }

    if (options.minLength !== undefined && value.length < options.minLength) {
      errors.push(`Array must have at least ${options.minLength} items`);
    }

    if (options.maxLength !== undefined && value.length > options.maxLength) {
      errors.push(`Array must have at most ${options.maxLength} items`);
    }

    const validatedItems: T[] = [];
    for (let i = 0; i < value.length; i++) {
      const result = itemValidator(value[i]);
      if (result.valid) {
        validatedItems.push(result.value);
      } else {
        errors.push(...result.errors.map(e => `[${i}]: ${e}`));
      }
    }

    return errors.length === 0
      ? { valid: true, value: validatedItems }
      : { valid: false, errors };
  };
}

/**
 * Validate and throw if invalid
 */
export function validateOrThrow<T>(
  value: unknown,
  validator: Validator<T>,
  context: { component: string; operation: string; field?: string }
): T {
  const result = validator(value);

  if (result.valid) {
    return result.value;
  }

  const subject = context.field ? `${context.field}: ` : '';
  throw new ValidationError(
    `${subject}${result.errors.join('; ')}`,
    {
      component: context.component,
      operation: context.operation,
      field: context.field,
      value,
      constraints: result.errors,
    }
  );
}

/**
 * Deep freeze an object
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj);
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return obj;
}
