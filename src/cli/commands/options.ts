/**
 * Shared option parsers
 */

import { InvalidArgumentError } from 'commander';

/**
 * Parse a non-negative integer option value
 */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

/**
 * Parse a positive integer option value
 */
export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
