/**
 * @fileoverview Orchestrator module
 *
 * @packageDocumentation
 */

export { Orchestrator, runSynthesis, phaseStatusOf, type OrchestratorOptions } from './orchestrator.js';
export { orderPhases } from './phase_graph.js';
export { runWorker, notStarted, summarizeError, type WorkerRun } from './worker_runner.js';
export type * from './types.js';
