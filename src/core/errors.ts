/**
 * @fileoverview Synthesizer error hierarchy
 *
 * Worker-level failures are recovered locally and surfaced as status
 * metadata; these types exist so that the metadata carries a stable code.
 * Only ValidationError is ever fatal, and only to the offending finding.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class SynthesisError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

/**
 * A Finding or Evidence violating the evidence model. Rejected at creation,
 * never enters the accumulator.
 */
export class ValidationError extends SynthesisError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// WORKER ERRORS
// ============================================================================

export class WorkerError extends SynthesisError {
  readonly code = 'WORKER_ERROR';
  readonly retryable = false;

  constructor(
    readonly workerId: string,
    readonly phase: string,
    message: string,
  ) {
    super(`Worker ${workerId} failed in phase ${phase}: ${message}`);
    this.name = 'WorkerError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        workerId: this.workerId,
        phase: this.phase,
      },
    };
  }
}

export class WorkerTimeoutError extends SynthesisError {
  readonly code = 'WORKER_TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly workerId: string,
    readonly phase: string,
    readonly timeoutMs: number,
  ) {
    super(`Worker ${workerId} exceeded the ${phase} deadline after ${timeoutMs}ms`);
    this.name = 'WorkerTimeoutError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        workerId: this.workerId,
        phase: this.phase,
        timeoutMs: this.timeoutMs,
      },
    };
  }
}

// ============================================================================
// RUN ERRORS
// ============================================================================

export class RunTimeoutError extends SynthesisError {
  readonly code = 'RUN_TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly runId: string,
    readonly timeoutMs: number,
    readonly skippedPhases: readonly string[],
  ) {
    super(`Run ${runId} exceeded its ${timeoutMs}ms deadline; skipped ${skippedPhases.length} phase(s)`);
    this.name = 'RunTimeoutError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        runId: this.runId,
        timeoutMs: this.timeoutMs,
        skippedPhases: [...this.skippedPhases],
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends SynthesisError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: [...this.issues] },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'query';

export class StorageError extends SynthesisError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { operation: this.operation },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isSynthesisError(error: unknown): error is SynthesisError {
  return error instanceof SynthesisError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
