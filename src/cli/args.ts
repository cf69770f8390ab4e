/**
 * @fileoverview Argument parsing helpers shared by the commands
 */

import { getErrorMessage } from '../utils/errors.js';
import { createError } from './errors.js';

/**
 * Run a `parseArgs` call, reporting unknown flags and missing values as
 * INVALID_ARGUMENT.
 */
export function parseCommandArgs<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
