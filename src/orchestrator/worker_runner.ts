/**
 * @fileoverview Worker runner
 *
 * Runs one worker against its private partition under a deadline. The worker
 * boundary is untrusted: throws, rejected promises, error results and missed
 * deadlines all come back as a WorkerOutcome, never as an exception.
 */

import { z } from 'zod';
import type { Accumulator, AccumulatorSnapshot, FindingDraft, PartitionSink } from '../accumulator/accumulator.js';
import { formatIssues } from '../config/loader.js';
import { WorkerError, WorkerTimeoutError, type SynthesisError } from '../core/errors.js';
import type { SynthesisResult } from '../synthesis/index.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { raceDeadline } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import type { ErrorSummary, Worker, WorkerContext, WorkerOutcome, WorkerResult } from './types.js';

const TAG = 'WorkerRunner';

/**
 * Shape check for what a worker resolves with. Drafts only need to be objects
 * here; the evidence model validates their fields one by one, so a single bad
 * draft becomes a rejection instead of failing the worker.
 */
export const WorkerResultSchema = z.object({
  status: z.enum(['success', 'error']),
  findings: z.array(z.custom<FindingDraft>((value) => typeof value === 'object' && value !== null, 'Expected object')).optional(),
  absences: z.array(z.object({ section: z.string(), reason: z.string() })).optional(),
  error: z.string().optional(),
});

export function summarizeError(error: SynthesisError): ErrorSummary {
  return { code: error.code, message: error.message };
}

export interface WorkerRun<TCorpus> {
  readonly runId: string;
  readonly phase: string;
  readonly corpus: TCorpus;
  readonly snapshot: AccumulatorSnapshot;
  readonly synthesis: SynthesisResult;
  /** Epoch ms. */
  readonly deadline: number;
  readonly accumulator: Accumulator;
  readonly clock: () => number;
}

export async function runWorker<TCorpus>(worker: Worker<TCorpus>, run: WorkerRun<TCorpus>): Promise<WorkerOutcome> {
  const startedAt = run.clock();
  const controller = new AbortController();
  const sink = run.accumulator.openPartition(worker.id, run.phase);

  const context: WorkerContext<TCorpus> = {
    runId: run.runId,
    phase: run.phase,
    corpus: run.corpus,
    snapshot: run.snapshot,
    synthesis: run.synthesis,
    deadline: run.deadline,
    signal: controller.signal,
    record: (draft) => sink.record(draft),
    declareAbsence: (section, reason) => sink.declareAbsence(section, reason),
  };

  // A synchronous throw inside `run` becomes a rejection here.
  const pending = new Promise<WorkerResult>((resolve) => resolve(worker.run(context)));
  const outcome = await raceDeadline(pending, run.deadline, {
    now: run.clock,
    onLate: (late) => {
      logWarning(`${TAG}: late ${late.kind === 'settled' ? 'result' : 'failure'} ignored`, {
        workerId: worker.id,
        phase: run.phase,
      });
    },
  });

  const finish = (status: WorkerOutcome['status'], error?: SynthesisError): WorkerOutcome => {
    sink.seal();
    return {
      workerId: worker.id,
      status,
      findingsContributed: sink.recorded,
      durationMs: Math.max(0, run.clock() - startedAt),
      ...(error ? { error: summarizeError(error) } : {}),
    };
  };

  switch (outcome.kind) {
    case 'deadline': {
      const error = new WorkerTimeoutError(worker.id, run.phase, Math.max(0, run.deadline - startedAt));
      controller.abort(error);
      logWarning(`${TAG}: worker timed out`, { workerId: worker.id, phase: run.phase, recorded: sink.recorded });
      return finish('timed_out', error);
    }
    case 'rejected': {
      const error = new WorkerError(worker.id, run.phase, getErrorMessage(outcome.error));
      logWarning(`${TAG}: worker threw`, { workerId: worker.id, phase: run.phase, error: error.message });
      return finish('error', error);
    }
    case 'settled': {
      const parsed = WorkerResultSchema.safeParse(outcome.value);
      if (!parsed.success) {
        const error = new WorkerError(
          worker.id,
          run.phase,
          `malformed result (${formatIssues(parsed.error).join('; ')})`
        );
        logWarning(`${TAG}: worker returned a malformed result`, { workerId: worker.id, phase: run.phase, error: error.message });
        return finish('error', error);
      }
      const result = parsed.data;
      try {
        commitResult(sink, result);
      } catch (cause) {
        const error = new WorkerError(worker.id, run.phase, getErrorMessage(cause));
        logWarning(`${TAG}: worker result could not be recorded`, { workerId: worker.id, phase: run.phase, error: error.message });
        return finish('error', error);
      }
      if (result.status === 'success') {
        logDebug(`${TAG}: worker succeeded`, { workerId: worker.id, phase: run.phase, recorded: sink.recorded });
        return finish('success');
      }
      const error = new WorkerError(worker.id, run.phase, result.error ?? 'worker reported an error');
      logWarning(`${TAG}: worker reported an error`, { workerId: worker.id, phase: run.phase, error: error.message });
      return finish('error', error);
    }
  }
}

function commitResult(sink: PartitionSink, result: z.infer<typeof WorkerResultSchema>): void {
  for (const draft of result.findings ?? []) sink.record(draft);
  for (const absence of result.absences ?? []) sink.declareAbsence(absence.section, absence.reason);
}

/**
 * Outcome for a sequential worker that the phase deadline reached before it
 * could start.
 */
export function notStarted(workerId: string, phase: string): WorkerOutcome {
  return {
    workerId,
    status: 'timed_out',
    findingsContributed: 0,
    durationMs: 0,
    error: { code: 'WORKER_TIMEOUT', message: `Worker ${workerId} never started before the ${phase} deadline` },
  };
}
