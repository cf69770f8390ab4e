/**
 * @fileoverview Evidence Model operations
 *
 * Pure constructors and validation. Every Finding that leaves this module is
 * deduped, scored and frozen; nothing here mutates an existing object.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { ValidationError, isValidationError } from '../core/errors.js';
import { safeSync, type Result } from '../core/result.js';
import type { SynthesisConfig } from '../config/schema.js';
import { classifyCertainty } from '../synthesis/certainty.js';
import { computeCorroboration } from '../synthesis/corroboration.js';
import { canonicalJson, isJsonValue } from '../utils/canonical.js';
import {
  evidenceKey,
  isCertaintyClass,
  isFindingType,
  isSectionName,
  type AbsenceNote,
  type Evidence,
  type EvidenceInput,
  type Finding,
  type FindingId,
  type FindingInput,
  type FindingValue,
  type WorkerId,
} from './types.js';

export function createFindingId(id?: string): FindingId {
  return (id ?? `fnd_${randomUUID()}`) as FindingId;
}

export interface ModelOptions {
  /** ISO timestamp source; defaults to the wall clock. */
  now?: () => string;
}

const defaultNow = (): string => new Date().toISOString();

// Inputs cross worker boundaries, so their declared types are not trusted.
function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

function describeReceived(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

// ============================================================================
// EVIDENCE
// ============================================================================

/**
 * Build an immutable Evidence item. Weight comes from the input or, failing
 * that, from the configured source-kind table.
 *
 * @throws ValidationError when the weight is outside (0, 1], the source kind
 *   is unknown without an explicit weight, or the locator is blank
 */
export function createEvidence(
  input: EvidenceInput,
  config: SynthesisConfig,
  options: ModelOptions = {}
): Evidence {
  if (typeof input !== 'object' || input === null) {
    throw new ValidationError('evidence', 'an object', describeReceived(input));
  }
  if (isBlank(input.sourceKind)) {
    throw new ValidationError('evidence.sourceKind', 'non-empty string', describeReceived(input.sourceKind));
  }
  if (isBlank(input.locator)) {
    throw new ValidationError('evidence.locator', 'non-empty string', describeReceived(input.locator));
  }
  if (!isOptionalString(input.snippet)) {
    throw new ValidationError('evidence.snippet', 'a string', describeReceived(input.snippet));
  }
  if (!isOptionalString(input.collectedAt)) {
    throw new ValidationError('evidence.collectedAt', 'an ISO timestamp string', describeReceived(input.collectedAt));
  }

  const weight = input.weight ?? config.sourceKinds[input.sourceKind];
  if (weight === undefined) {
    throw new ValidationError('evidence.weight', `a weight or a configured source kind`, input.sourceKind);
  }
  if (typeof weight !== 'number' || !Number.isFinite(weight) || weight <= 0 || weight > 1) {
    throw new ValidationError('evidence.weight', 'number in (0, 1]', String(weight));
  }

  return Object.freeze({
    sourceKind: input.sourceKind,
    weight,
    locator: input.locator,
    snippet: input.snippet ?? '',
    collectedAt: input.collectedAt ?? (options.now ?? defaultNow)(),
  });
}

/**
 * Collapse entries sharing (sourceKind, locator), keeping the highest weight.
 * First-occurrence order is preserved; on equal weights the first entry wins.
 */
export function dedupeEvidence(evidence: readonly Evidence[]): Evidence[] {
  const order: string[] = [];
  const best = new Map<string, Evidence>();
  for (const item of evidence) {
    const key = evidenceKey(item);
    const current = best.get(key);
    if (!current) {
      order.push(key);
      best.set(key, item);
    } else if (item.weight > current.weight) {
      best.set(key, item);
    }
  }
  const deduped: Evidence[] = [];
  for (const key of order) {
    const item = best.get(key);
    if (item) deduped.push(item);
  }
  return deduped;
}

// ============================================================================
// FINDING
// ============================================================================

/**
 * Canonical identity of a finding's value. Two findings disagree iff these
 * differ.
 */
export function findingValueKey(value: FindingValue): string {
  return canonicalJson(value);
}

/**
 * Validate, dedupe, classify and freeze a Finding.
 *
 * @throws ValidationError for any evidence-model violation
 */
export function createFinding(input: FindingInput, config: SynthesisConfig, options: ModelOptions = {}): Finding {
  if (typeof input !== 'object' || input === null) {
    throw new ValidationError('finding', 'an object', describeReceived(input));
  }
  if (isBlank(input.workerId)) {
    throw new ValidationError('finding.workerId', 'non-empty string', describeReceived(input.workerId));
  }
  if (!isSectionName(input.section)) {
    throw new ValidationError('finding.section', 'a known section', describeReceived(input.section));
  }
  if (isBlank(input.key)) {
    throw new ValidationError('finding.key', 'non-empty string', describeReceived(input.key));
  }
  const findingType = input.findingType ?? 'general';
  if (!isFindingType(findingType)) {
    throw new ValidationError('finding.findingType', 'a known finding type', describeReceived(findingType));
  }
  if (!isJsonValue(input.value)) {
    throw new ValidationError('finding.value', 'a JSON value', describeReceived(input.value));
  }
  let claimedCertainty: Finding['claimedCertainty'];
  if (input.certaintyClass !== undefined) {
    if (!isCertaintyClass(input.certaintyClass)) {
      throw new ValidationError(
        'finding.certaintyClass',
        'certain | inferred | speculated | unknown',
        describeReceived(input.certaintyClass)
      );
    }
    claimedCertainty = input.certaintyClass;
  }
  for (const field of ['id', 'supersedes', 'createdAt'] as const) {
    if (!isOptionalString(input[field])) {
      throw new ValidationError(`finding.${field}`, 'a string', describeReceived(input[field]));
    }
  }
  if (!Array.isArray(input.evidence)) {
    throw new ValidationError('finding.evidence', 'an array', describeReceived(input.evidence));
  }

  // Already-built evidence is re-validated too: it may have crossed a worker boundary.
  const evidence = dedupeEvidence(input.evidence.map((item) => createEvidence(item, config, options)));
  if (evidence.length === 0 && claimedCertainty !== 'unknown') {
    throw new ValidationError('finding.evidence', "at least one item unless certaintyClass is 'unknown'", 'empty');
  }

  const certainty = classifyCertainty(evidence, findingType, config);
  const corroboration = computeCorroboration(evidence, findingType, config);

  return Object.freeze({
    id: createFindingId(input.id),
    workerId: input.workerId,
    section: input.section,
    key: input.key,
    findingType,
    value: input.value,
    certaintyClass: certainty.certaintyClass,
    certaintyScore: certainty.certaintyScore,
    ...(claimedCertainty ? { claimedCertainty } : {}),
    evidence: Object.freeze(evidence),
    corroborationScore: corroboration.score,
    ...(input.supersedes ? { supersedes: createFindingId(input.supersedes) } : {}),
    createdAt: input.createdAt ?? (options.now ?? defaultNow)(),
  });
}

/**
 * `createFinding` for boundaries where rejection is an expected outcome.
 * Only ValidationError is captured; anything else is a bug and propagates.
 */
export function tryCreateFinding(
  input: FindingInput,
  config: SynthesisConfig,
  options: ModelOptions = {}
): Result<Finding, ValidationError> {
  return safeSync(() => createFinding(input, config, options), isValidationError);
}

/**
 * Return a NEW finding with the evidence appended, deduped and re-scored. The
 * new finding keeps the original id: it is the same claim with more support,
 * produced before the finding is handed to the accumulator.
 */
export function addEvidence(
  finding: Finding,
  evidence: Evidence | EvidenceInput,
  config: SynthesisConfig,
  options: ModelOptions = {}
): Finding {
  return createFinding(
    {
      id: finding.id,
      workerId: finding.workerId,
      section: finding.section,
      key: finding.key,
      findingType: finding.findingType,
      value: finding.value,
      certaintyClass: finding.claimedCertainty,
      evidence: [...finding.evidence, evidence],
      supersedes: finding.supersedes,
      createdAt: finding.createdAt,
    },
    config,
    options
  );
}

// ============================================================================
// ABSENCE
// ============================================================================

export function createAbsenceNote(
  input: { section: string; reason: string; workerId: WorkerId },
  options: ModelOptions = {}
): AbsenceNote {
  if (typeof input !== 'object' || input === null) {
    throw new ValidationError('absence', 'an object', describeReceived(input));
  }
  if (!isSectionName(input.section)) {
    throw new ValidationError('absence.section', 'a known section', describeReceived(input.section));
  }
  if (isBlank(input.reason)) {
    throw new ValidationError('absence.reason', 'non-empty string', describeReceived(input.reason));
  }
  return Object.freeze({
    section: input.section,
    reason: input.reason,
    workerId: input.workerId,
    recordedAt: (options.now ?? defaultNow)(),
  });
}
