import type { ValidationResult } from '~/types';

export const VALID: ValidationResult = { valid: true };

export const failure = (message: string, ...rest: string[]): ValidationResult => {
  return { valid: false, errors: [message, ...rest] };
};

export const isValid = (result: ValidationResult): result is { valid: true } => result.valid;

/**
 * Reduces results to one. Messages of every invalid member are kept,
 * in the order the results were produced.
 */

export const flatten = (results: Iterable<ValidationResult>): ValidationResult => {
  const errors: string[] = [];

  for (const result of results) {
    if (!result.valid) {
      errors.push(...result.errors);
    }
  }

  const [first, ...rest] = errors;
  return first === undefined ? VALID : failure(first, ...rest);
};
