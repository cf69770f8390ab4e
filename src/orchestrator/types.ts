/**
 * @fileoverview Orchestrator types
 *
 * Phase, Worker and Run shapes, plus the events a run emits. A Worker is any
 * object with an id and an async `run`; the orchestrator knows nothing about
 * what a worker inspects.
 *
 * @packageDocumentation
 */

import type { AccumulatorSnapshot, FindingDraft, Rejection } from '../accumulator/accumulator.js';
import type { SynthesisConfig } from '../config/schema.js';
import type { ValidationError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import type { AbsenceNote, Finding, WorkerId } from '../evidence/types.js';
import type { SynthesisResult } from '../synthesis/index.js';

// ============================================================================
// STATUSES
// ============================================================================

export type PhaseMode = 'parallel' | 'sequential';

export type WorkerStatus = 'pending' | 'running' | 'success' | 'error' | 'timed_out';

export type PhaseStatus = 'complete' | 'partial' | 'failed' | 'skipped';

export type RunState = 'pending' | 'phase_running' | 'synthesizing' | 'complete' | 'failed';

export type RunStatus = Extract<RunState, 'complete' | 'failed'>;

// ============================================================================
// WORKER CONTRACT
// ============================================================================

export interface WorkerContext<TCorpus = unknown> {
  readonly runId: string;
  readonly phase: string;
  /** Opaque reference to whatever the workers inspect. */
  readonly corpus: TCorpus;
  /** Committed state left by every earlier worker this one may see. */
  readonly snapshot: AccumulatorSnapshot;
  /** Synthesis of the last phase barrier. */
  readonly synthesis: SynthesisResult;
  /** Epoch ms. */
  readonly deadline: number;
  readonly signal: AbortSignal;
  /** Append a finding to this worker's private partition. */
  record(draft: FindingDraft): Result<Finding, ValidationError>;
  declareAbsence(section: string, reason: string): Result<AbsenceNote, ValidationError>;
}

export interface AbsenceDraft {
  section: string;
  reason: string;
}

export interface WorkerResult {
  status: 'success' | 'error';
  /** Recorded on settle, as if passed to `record` one by one. */
  findings?: readonly FindingDraft[];
  absences?: readonly AbsenceDraft[];
  error?: string;
}

export interface Worker<TCorpus = unknown> {
  readonly id: WorkerId;
  run(context: WorkerContext<TCorpus>): Promise<WorkerResult>;
}

export interface Phase<TCorpus = unknown> {
  readonly name: string;
  readonly mode: PhaseMode;
  readonly workers: readonly Worker<TCorpus>[];
  readonly timeoutMs: number;
  /** Phases that must run first. Ordering only: a failed dependency does not skip this phase. */
  readonly dependsOn?: readonly string[];
}

// ============================================================================
// OUTCOMES
// ============================================================================

/** The stable part of an error: what a report keeps. */
export interface ErrorSummary {
  readonly code: string;
  readonly message: string;
}

export interface WorkerOutcome {
  readonly workerId: WorkerId;
  readonly status: WorkerStatus;
  /** Findings accepted into the accumulator from this worker. */
  readonly findingsContributed: number;
  readonly durationMs: number;
  readonly error?: ErrorSummary;
}

export interface PhaseOutcome {
  readonly name: string;
  readonly mode: PhaseMode;
  readonly status: PhaseStatus;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
  readonly workers: readonly WorkerOutcome[];
  readonly findingsContributed: number;
  /** Overall score at this phase's barrier; null when skipped. */
  readonly overallAtBarrier: number | null;
}

/**
 * Finalized, deep-frozen record of a run.
 */
export interface Run {
  readonly runId: string;
  readonly status: RunStatus;
  /** Set when the run deadline cut phases short or skipped them. */
  readonly truncated: boolean;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly phases: readonly PhaseOutcome[];
  readonly findings: readonly Finding[];
  readonly absences: readonly AbsenceNote[];
  readonly synthesis: SynthesisResult;
  readonly rejections: readonly Rejection[];
  readonly lateDrops: number;
  readonly configVersion: SynthesisConfig['version'];
  readonly timeout: ErrorSummary | null;
}

// ============================================================================
// EVENTS
// ============================================================================

export type RunEvent =
  | { type: 'run.started'; runId: string; phases: readonly string[] }
  | { type: 'phase.started'; runId: string; phase: string; mode: PhaseMode; workers: number }
  | { type: 'worker.settled'; runId: string; phase: string; outcome: WorkerOutcome }
  | { type: 'phase.settled'; runId: string; outcome: PhaseOutcome }
  | { type: 'finding.rejected'; runId: string; rejection: Rejection }
  | { type: 'run.finalized'; runId: string; status: RunStatus; truncated: boolean };

export type RunEventListener = (event: RunEvent) => void;
