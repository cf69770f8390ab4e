/**
 * @fileoverview dna-synthesizer
 *
 * Merges the partial, possibly contradictory findings of independent
 * extraction workers into one confidence-scored report.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Orchestrator, buildRunReport } from 'dna-synthesizer';
 *
 * const orchestrator = new Orchestrator({ runTimeoutMs: 60_000 });
 * const run = await orchestrator.run(
 *   [{ name: 'discovery', mode: 'parallel', timeoutMs: 10_000, workers: [stackWorker, docsWorker] }],
 *   corpus
 * );
 * const report = buildRunReport(run);
 * ```
 *
 * A worker is any object with an `id` and an async `run(context)`. It records
 * findings through `context.record(...)` or returns them; either way they stay
 * private until the phase barrier.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// ============================================================================
// CORE
// ============================================================================

export * from './core/index.js';

// ============================================================================
// EVIDENCE MODEL
// ============================================================================

export * from './evidence/index.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export * from './config/index.js';

// ============================================================================
// SYNTHESIS
// ============================================================================

export * from './synthesis/index.js';

// ============================================================================
// RUNS
// ============================================================================

export * from './accumulator/index.js';
export * from './orchestrator/index.js';

// ============================================================================
// REPORTS
// ============================================================================

export * from './report/index.js';
export * from './storage/index.js';

// ============================================================================
// LOGGING
// ============================================================================

export { logDebug, logInfo, logWarning, logError, getLogLevel, type LogLevel } from './telemetry/logger.js';
