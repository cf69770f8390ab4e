/**
 * @fileoverview Safe JSON Parsing
 *
 * Utilities for safely parsing JSON with error handling.
 *
 * @packageDocumentation
 */

import { Err, Ok, type Result } from '../core/result.js';

/**
 * Safely parse JSON, returning a Result with ok/value/error. The value is
 * `unknown`; callers narrow it with a schema.
 */
export function safeJsonParse(text: string): Result<unknown, Error> {
  try {
    return Ok(JSON.parse(text));
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
