/**
 * @fileoverview Core infrastructure
 *
 * Result types and the error hierarchy shared by every module.
 */

export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeSync,
} from './result.js';

export {
  type ErrorJSON,
  type StorageOperation,
  SynthesisError,
  ValidationError,
  WorkerError,
  WorkerTimeoutError,
  RunTimeoutError,
  ConfigurationError,
  StorageError,
  isSynthesisError,
  isValidationError,
} from './errors.js';
