/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { ConfigurationError, StorageError, isSynthesisError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NO_INPUT'
  | 'INPUT_INVALID'
  | 'CONFIG_ERROR'
  | 'STORAGE_ERROR'
  | 'RUN_FAILED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `dna-synth help <command>` for usage information.',
  NO_INPUT: 'Check the glob pattern; quote it so the shell does not expand it first.',
  INPUT_INVALID: 'Each input file must hold one worker output: { workerId, findings[], absences[] }.',
  CONFIG_ERROR: 'Run `dna-synth config` to print the effective configuration.',
  STORAGE_ERROR: 'Check that the --store path is writable and not locked by another process.',
  RUN_FAILED: 'No worker produced a finding; inspect the worker errors above.',
};

/** Exit code for each error: 2 for usage mistakes, 1 for everything else. */
export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  usage: 2,
} as const;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map any thrown value onto a CliError. Engine errors keep their message.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigurationError) {
    return createError('CONFIG_ERROR', error.message, { issues: error.issues });
  }
  if (error instanceof StorageError) {
    return createError('STORAGE_ERROR', error.message, { operation: error.operation });
  }
  if (isSynthesisError(error)) {
    return new CliError(error.message, 'RUN_FAILED', undefined, { code: error.code });
  }
  if (error instanceof Error) {
    return new CliError(error.message, 'RUN_FAILED');
  }
  return new CliError(String(error), 'RUN_FAILED');
}

export function getExitCode(error: CliError): number {
  return error.code === 'INVALID_ARGUMENT' ? EXIT_CODES.usage : EXIT_CODES.failure;
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}
