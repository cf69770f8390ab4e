/**
 * @fileoverview Accumulator
 *
 * Append-only store of every Finding in a Run. Workers never write to shared
 * state directly: each gets a private partition, and the orchestrator merges
 * partitions into the committed log at phase barriers (or after each worker in
 * sequential mode). Readers only ever see committed, frozen snapshots.
 *
 * @packageDocumentation
 */

import { ConfigurationError, ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { SynthesisConfig } from '../config/schema.js';
import { createAbsenceNote, tryCreateFinding, type ModelOptions } from '../evidence/model.js';
import type { AbsenceNote, Finding, FindingInput, WorkerId } from '../evidence/types.js';
import { logWarning } from '../telemetry/logger.js';

const TAG = 'Accumulator';

// ============================================================================
// TYPES
// ============================================================================

/** What a worker hands over: its identity is filled in by the partition. */
export type FindingDraft = Omit<FindingInput, 'workerId'>;

export interface Rejection {
  readonly workerId: WorkerId;
  readonly phase: string;
  readonly field: string;
  readonly reason: string;
  readonly rejectedAt: string;
}

export interface AccumulatorSnapshot {
  /** Committed findings in merge order. */
  readonly findings: readonly Finding[];
  readonly absences: readonly AbsenceNote[];
  /** Committed findings per worker. */
  readonly byWorker: Readonly<Record<WorkerId, number>>;
}

/**
 * A worker's private write handle. Nothing recorded here is visible to any
 * other worker until the orchestrator merges the partition.
 */
export interface PartitionSink {
  readonly workerId: WorkerId;
  readonly phase: string;
  readonly sealed: boolean;
  /** Findings accepted so far, merged or not. */
  readonly recorded: number;
  record(draft: FindingDraft): Result<Finding, ValidationError>;
  declareAbsence(section: string, reason: string): Result<AbsenceNote, ValidationError>;
  /** Close the sink; anything recorded afterwards is dropped and counted. */
  seal(): void;
}

export interface AccumulatorOptions extends ModelOptions {
  onRejected?: (rejection: Rejection) => void;
}

// ============================================================================
// PARTITION
// ============================================================================

class Partition implements PartitionSink {
  private isSealed = false;
  private accepted = 0;
  staged: Finding[] = [];
  stagedAbsences: AbsenceNote[] = [];

  constructor(
    readonly workerId: WorkerId,
    readonly phase: string,
    private readonly owner: Accumulator,
  ) {}

  get sealed(): boolean {
    return this.isSealed;
  }

  get recorded(): number {
    return this.accepted;
  }

  record(draft: FindingDraft): Result<Finding, ValidationError> {
    if (this.isSealed) {
      return Err(this.owner.dropLate(this, 'finding'));
    }
    const result = this.owner.validate({ ...draft, workerId: this.workerId }, this);
    if (result.ok) {
      this.staged.push(result.value);
      this.accepted++;
    }
    return result;
  }

  declareAbsence(section: string, reason: string): Result<AbsenceNote, ValidationError> {
    if (this.isSealed) {
      return Err(this.owner.dropLate(this, 'absence'));
    }
    const result = this.owner.validateAbsence(section, reason, this);
    if (result.ok) this.stagedAbsences.push(result.value);
    return result;
  }

  seal(): void {
    this.isSealed = true;
  }
}

// ============================================================================
// ACCUMULATOR
// ============================================================================

export class Accumulator {
  private readonly partitions = new Map<WorkerId, Partition>();
  private readonly committed: Finding[] = [];
  private readonly committedAbsences: AbsenceNote[] = [];
  private readonly byWorker = new Map<WorkerId, number>();
  /** Accepted finding ids, staged or committed, and who recorded them. */
  private readonly owners = new Map<string, WorkerId>();
  private readonly rejected: Rejection[] = [];
  private dropped = 0;
  private cached: AccumulatorSnapshot | null = null;

  constructor(
    private readonly config: SynthesisConfig,
    private readonly options: AccumulatorOptions = {},
  ) {}

  /**
   * Open the private partition for a worker. A worker id may be reopened
   * only after its previous partition was sealed.
   */
  openPartition(workerId: WorkerId, phase: string): PartitionSink {
    const existing = this.partitions.get(workerId);
    if (existing && !existing.sealed) {
      throw new ConfigurationError(`Partition for worker ${workerId} is already open`);
    }
    const partition = new Partition(workerId, phase, this);
    this.partitions.set(workerId, partition);
    return partition;
  }

  /**
   * Commit staged partitions in the given order and return the findings that
   * became visible. Workers without a partition are skipped.
   */
  merge(workerIds: readonly WorkerId[]): Finding[] {
    const merged: Finding[] = [];
    let absencesMerged = 0;
    for (const workerId of workerIds) {
      const partition = this.partitions.get(workerId);
      if (!partition) continue;
      for (const finding of partition.staged) {
        this.committed.push(finding);
        merged.push(finding);
      }
      if (partition.staged.length > 0) {
        this.byWorker.set(workerId, (this.byWorker.get(workerId) ?? 0) + partition.staged.length);
      }
      this.committedAbsences.push(...partition.stagedAbsences);
      absencesMerged += partition.stagedAbsences.length;
      partition.staged = [];
      partition.stagedAbsences = [];
    }
    if (merged.length > 0 || absencesMerged > 0) {
      this.cached = null;
    }
    return merged;
  }

  /**
   * Frozen view of committed state. Staged, unmerged findings are never
   * included.
   */
  snapshot(): AccumulatorSnapshot {
    if (!this.cached) {
      const byWorker: Record<WorkerId, number> = {};
      for (const [workerId, count] of [...this.byWorker].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        byWorker[workerId] = count;
      }
      this.cached = Object.freeze({
        findings: Object.freeze([...this.committed]),
        absences: Object.freeze([...this.committedAbsences]),
        byWorker: Object.freeze(byWorker),
      });
    }
    return this.cached;
  }

  get rejections(): readonly Rejection[] {
    return this.rejected;
  }

  /** Records that arrived after their partition was sealed. */
  get lateDrops(): number {
    return this.dropped;
  }

  get size(): number {
    return this.committed.length;
  }

  // --------------------------------------------------------------------------
  // Partition callbacks
  // --------------------------------------------------------------------------

  /**
   * A finding may only supersede one its own worker recorded earlier in the
   * run: corrections never reach across workers.
   *
   * @internal
   */
  validate(input: FindingInput, partition: PartitionSink): Result<Finding, ValidationError> {
    if (typeof input.id === 'string' && this.owners.has(input.id)) {
      return Err(this.reject(new ValidationError('finding.id', 'an id unique within the run', input.id), partition));
    }
    const result = tryCreateFinding(input, this.config, this.options);
    if (!result.ok) {
      return Err(this.reject(result.error, partition));
    }
    const finding = result.value;
    if (finding.supersedes !== undefined && this.owners.get(finding.supersedes) !== partition.workerId) {
      return Err(
        this.reject(
          new ValidationError('finding.supersedes', 'an id recorded earlier by the same worker', finding.supersedes),
          partition
        )
      );
    }
    this.owners.set(finding.id, partition.workerId);
    return Ok(finding);
  }

  /** @internal */
  validateAbsence(section: string, reason: string, partition: PartitionSink): Result<AbsenceNote, ValidationError> {
    try {
      return Ok(createAbsenceNote({ section, reason, workerId: partition.workerId }, this.options));
    } catch (error) {
      if (error instanceof ValidationError) return Err(this.reject(error, partition));
      throw error;
    }
  }

  /** @internal */
  dropLate(partition: PartitionSink, kind: 'finding' | 'absence'): ValidationError {
    this.dropped++;
    logWarning(`${TAG}: dropped ${kind} recorded after its partition was sealed`, {
      workerId: partition.workerId,
      phase: partition.phase,
    });
    return new ValidationError(`${kind}.partition`, 'an open partition', 'sealed');
  }

  private reject(error: ValidationError, partition: PartitionSink): ValidationError {
    const rejection: Rejection = Object.freeze({
      workerId: partition.workerId,
      phase: partition.phase,
      field: error.field,
      reason: error.message,
      rejectedAt: (this.options.now ?? (() => new Date().toISOString()))(),
    });
    this.rejected.push(rejection);
    logWarning(`${TAG}: rejected ${error.field}`, {
      workerId: rejection.workerId,
      phase: rejection.phase,
      reason: rejection.reason,
    });
    this.options.onRejected?.(rejection);
    return error;
  }
}
