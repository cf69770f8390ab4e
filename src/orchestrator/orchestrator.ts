/**
 * @fileoverview Synthesis Orchestrator
 *
 * Drives a Run through its phase graph:
 *
 *   pending ─▶ phase_running (× phases) ─▶ synthesizing ─▶ complete | failed
 *
 * Every phase ends at a barrier where partitions are merged and synthesis
 * runs once on the frozen snapshot. No worker outcome can abort a run: errors
 * and timeouts become status metadata, and a report is always produced.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ runTimeoutMs: 60_000 });
 * const run = await orchestrator.run(
 *   [
 *     { name: 'discovery', mode: 'parallel', timeoutMs: 10_000, workers: [stackWorker, docsWorker] },
 *     { name: 'modeling', mode: 'sequential', timeoutMs: 20_000, workers: [entityWorker], dependsOn: ['discovery'] },
 *   ],
 *   { root: '/srv/repo' }
 * );
 * console.log(run.synthesis.overall.score);
 * ```
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { Accumulator } from '../accumulator/accumulator.js';
import { getDefaultSynthesisConfig } from '../config/loader.js';
import type { SynthesisConfig } from '../config/schema.js';
import { ConfigurationError, RunTimeoutError } from '../core/errors.js';
import { synthesize, type SynthesisResult } from '../synthesis/index.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { deepFreeze } from '../utils/canonical.js';
import { getErrorMessage } from '../utils/errors.js';
import { orderPhases } from './phase_graph.js';
import type {
  Phase,
  PhaseOutcome,
  PhaseStatus,
  Run,
  RunEvent,
  RunEventListener,
  RunState,
  RunStatus,
  WorkerOutcome,
} from './types.js';
import { notStarted, runWorker, summarizeError } from './worker_runner.js';

const TAG = 'Orchestrator';

export interface OrchestratorOptions {
  config?: SynthesisConfig;
  /** Global deadline for the whole run; unbounded when omitted. */
  runTimeoutMs?: number;
  /** Epoch ms. */
  clock?: () => number;
  idFactory?: () => string;
  onEvent?: RunEventListener;
}

/**
 * Phase status from its worker outcomes. A phase with no workers is complete.
 */
export function phaseStatusOf(workers: readonly WorkerOutcome[]): Exclude<PhaseStatus, 'skipped'> {
  const succeeded = workers.filter((worker) => worker.status === 'success').length;
  if (succeeded === workers.length) return 'complete';
  const contributed = workers.some((worker) => worker.findingsContributed > 0);
  return succeeded > 0 || contributed ? 'partial' : 'failed';
}

/**
 * One instance drives one Run at a time; start concurrent runs on separate
 * instances. It may be reused once its run has finalized.
 */
export class Orchestrator {
  private readonly config: SynthesisConfig;
  private readonly clock: () => number;
  private readonly idFactory: () => string;
  private state: RunState = 'pending';

  constructor(private readonly options: OrchestratorOptions = {}) {
    this.config = options.config ?? getDefaultSynthesisConfig();
    this.clock = options.clock ?? Date.now;
    this.idFactory = options.idFactory ?? (() => `run_${randomUUID()}`);
  }

  /** State of the most recent run. */
  get currentState(): RunState {
    return this.state;
  }

  /**
   * Execute the phases against a corpus and return the finalized Run.
   *
   * @throws ConfigurationError when the phase graph is invalid or a run is
   *   already in progress on this instance; nothing runs
   */
  async run<TCorpus>(phases: readonly Phase<TCorpus>[], corpus: TCorpus): Promise<Run> {
    if (this.state === 'phase_running' || this.state === 'synthesizing') {
      throw new ConfigurationError('Orchestrator is already running; use a separate instance per concurrent run');
    }
    const ordered = orderPhases(phases);
    const runId = this.idFactory();
    const startedMs = this.clock();
    const runDeadline =
      this.options.runTimeoutMs === undefined ? Number.POSITIVE_INFINITY : startedMs + this.options.runTimeoutMs;
    const emit = (event: RunEvent): void => this.emit(event);

    const accumulator = new Accumulator(this.config, {
      now: () => this.isoNow(),
      onRejected: (rejection) => emit({ type: 'finding.rejected', runId, rejection }),
    });

    this.state = 'phase_running';
    logInfo(`${TAG}: run started`, { runId, phases: ordered.length });
    emit({ type: 'run.started', runId, phases: ordered.map((phase) => phase.name) });

    let synthesis: SynthesisResult = synthesize(accumulator.snapshot(), this.config);
    const outcomes: PhaseOutcome[] = [];
    const skipped: string[] = [];
    let truncated = false;

    for (const phase of ordered) {
      if (truncated || this.clock() >= runDeadline) {
        truncated = true;
        skipped.push(phase.name);
        const outcome: PhaseOutcome = {
          name: phase.name,
          mode: phase.mode,
          status: 'skipped',
          startedAt: null,
          completedAt: null,
          workers: phase.workers.map((worker): WorkerOutcome => ({
            workerId: worker.id,
            status: 'pending',
            findingsContributed: 0,
            durationMs: 0,
          })),
          findingsContributed: 0,
          overallAtBarrier: null,
        };
        outcomes.push(outcome);
        emit({ type: 'phase.settled', runId, outcome });
        continue;
      }

      const phaseStart = this.clock();
      const phaseDeadline = Math.min(phaseStart + phase.timeoutMs, runDeadline);
      emit({ type: 'phase.started', runId, phase: phase.name, mode: phase.mode, workers: phase.workers.length });

      const workerOutcomes =
        phase.mode === 'parallel'
          ? await this.runParallel(phase, corpus, { runId, accumulator, synthesis, deadline: phaseDeadline })
          : await this.runSequential(phase, corpus, { runId, accumulator, synthesis, deadline: phaseDeadline });

      for (const outcome of workerOutcomes) {
        emit({ type: 'worker.settled', runId, phase: phase.name, outcome });
      }

      // Barrier: the frozen snapshot is synthesized once, single-threaded.
      synthesis = synthesize(accumulator.snapshot(), this.config);

      const outcome: PhaseOutcome = {
        name: phase.name,
        mode: phase.mode,
        status: phaseStatusOf(workerOutcomes),
        startedAt: new Date(phaseStart).toISOString(),
        completedAt: this.isoNow(),
        workers: workerOutcomes,
        findingsContributed: workerOutcomes.reduce((sum, worker) => sum + worker.findingsContributed, 0),
        overallAtBarrier: synthesis.overall.score,
      };
      outcomes.push(outcome);
      logDebug(`${TAG}: phase settled`, { runId, phase: phase.name, status: outcome.status });
      emit({ type: 'phase.settled', runId, outcome });

      const cutByRun = this.clock() >= runDeadline || workerOutcomes.some((worker) => worker.status === 'timed_out');
      if (phaseDeadline === runDeadline && cutByRun) {
        truncated = true;
      }
    }

    let timeout: Run['timeout'] = null;
    if (truncated) {
      const error = new RunTimeoutError(runId, this.options.runTimeoutMs ?? 0, skipped);
      logWarning(`${TAG}: run deadline exceeded`, { runId, skippedPhases: skipped });
      timeout = summarizeError(error);
    }

    this.state = 'synthesizing';
    const snapshot = accumulator.snapshot();
    synthesis = synthesize(snapshot, this.config);

    const executed = outcomes.filter((outcome) => outcome.status !== 'skipped');
    const anySucceeded = executed.some((outcome) => outcome.workers.some((worker) => worker.status === 'success'));
    const status: RunStatus = !anySucceeded && snapshot.findings.length === 0 ? 'failed' : 'complete';

    const run: Run = deepFreeze({
      runId,
      status,
      truncated,
      startedAt: new Date(startedMs).toISOString(),
      completedAt: this.isoNow(),
      phases: outcomes,
      findings: snapshot.findings,
      absences: snapshot.absences,
      synthesis,
      rejections: [...accumulator.rejections],
      lateDrops: accumulator.lateDrops,
      configVersion: this.config.version,
      timeout,
    });

    this.state = status;
    logInfo(`${TAG}: run finalized`, { runId, status, truncated, overall: synthesis.overall.score });
    emit({ type: 'run.finalized', runId, status, truncated });
    return run;
  }

  // ==========================================================================
  // PHASE MODES
  // ==========================================================================

  private async runParallel<TCorpus>(
    phase: Phase<TCorpus>,
    corpus: TCorpus,
    barrier: BarrierState
  ): Promise<WorkerOutcome[]> {
    const snapshot = barrier.accumulator.snapshot();
    const outcomes = await Promise.all(
      phase.workers.map((worker) =>
        runWorker(worker, {
          runId: barrier.runId,
          phase: phase.name,
          corpus,
          snapshot,
          synthesis: barrier.synthesis,
          deadline: barrier.deadline,
          accumulator: barrier.accumulator,
          clock: this.clock,
        })
      )
    );
    barrier.accumulator.merge(phase.workers.map((worker) => worker.id));
    return outcomes;
  }

  private async runSequential<TCorpus>(
    phase: Phase<TCorpus>,
    corpus: TCorpus,
    barrier: BarrierState
  ): Promise<WorkerOutcome[]> {
    const outcomes: WorkerOutcome[] = [];
    let expired = false;
    for (const worker of phase.workers) {
      if (expired || this.clock() >= barrier.deadline) {
        expired = true;
        outcomes.push(notStarted(worker.id, phase.name));
        continue;
      }
      const outcome = await runWorker(worker, {
        runId: barrier.runId,
        phase: phase.name,
        corpus,
        snapshot: barrier.accumulator.snapshot(),
        synthesis: barrier.synthesis,
        deadline: barrier.deadline,
        accumulator: barrier.accumulator,
        clock: this.clock,
      });
      outcomes.push(outcome);
      expired = outcome.status === 'timed_out';
      // Each later worker sees everything before it.
      barrier.accumulator.merge([worker.id]);
    }
    return outcomes;
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private emit(event: RunEvent): void {
    if (!this.options.onEvent) return;
    try {
      this.options.onEvent(event);
    } catch (error) {
      logWarning(`${TAG}: event listener failed`, { type: event.type, error: getErrorMessage(error) });
    }
  }

  private isoNow(): string {
    return new Date(this.clock()).toISOString();
  }
}

interface BarrierState {
  readonly runId: string;
  readonly accumulator: Accumulator;
  readonly synthesis: SynthesisResult;
  readonly deadline: number;
}

/**
 * One-shot convenience over `new Orchestrator(options).run(...)`.
 */
export function runSynthesis<TCorpus>(
  phases: readonly Phase<TCorpus>[],
  corpus: TCorpus,
  options: OrchestratorOptions = {}
): Promise<Run> {
  return new Orchestrator(options).run(phases, corpus);
}
