/**
 * @fileoverview Evidence Model vocabulary
 *
 * Finding, Evidence and Section are the shared shapes every synthesis
 * component reads. All of them are immutable once created: a correction is a
 * new Finding that names the one it supersedes.
 *
 * @packageDocumentation
 */

import type { JsonValue } from '../utils/canonical.js';

// ============================================================================
// BRANDED TYPES
// ============================================================================

export type FindingId = string & { readonly __brand: 'FindingId' };
export type WorkerId = string;

// ============================================================================
// ENUMERATIONS
// ============================================================================

export const SECTION_NAMES = [
  'identity',
  'domain-model',
  'capabilities',
  'stack',
  'conventions',
  'constraints',
  'operations',
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export const FINDING_TYPES = ['language', 'framework', 'entity', 'relationship', 'general'] as const;

export type FindingType = (typeof FINDING_TYPES)[number];

/** Ordered strongest first. */
export const CERTAINTY_CLASSES = ['certain', 'inferred', 'speculated', 'unknown'] as const;

export type CertaintyClass = (typeof CERTAINTY_CLASSES)[number];

export function isSectionName(value: string): value is SectionName {
  return (SECTION_NAMES as readonly string[]).includes(value);
}

export function isFindingType(value: string): value is FindingType {
  return (FINDING_TYPES as readonly string[]).includes(value);
}

export function isCertaintyClass(value: string): value is CertaintyClass {
  return (CERTAINTY_CLASSES as readonly string[]).includes(value);
}

/** certain=3 ... unknown=0; higher is stronger. */
export function certaintyRank(value: CertaintyClass): number {
  return CERTAINTY_CLASSES.length - 1 - CERTAINTY_CLASSES.indexOf(value);
}

// ============================================================================
// EVIDENCE
// ============================================================================

/**
 * One piece of support for a Finding.
 *
 * INVARIANT: 0 < weight <= 1
 * INVARIANT: (sourceKind, locator) identifies the evidence for dedup purposes
 */
export interface Evidence {
  readonly sourceKind: string;
  readonly weight: number;
  /** Opaque: `file:line` or `doc#section`. */
  readonly locator: string;
  readonly snippet: string;
  readonly collectedAt: string;
}

/** Dedup identity: two items sharing it are the same evidence. */
export function evidenceKey(evidence: Pick<Evidence, 'sourceKind' | 'locator'>): string {
  return `${evidence.sourceKind}\u0000${evidence.locator}`;
}

export interface EvidenceInput {
  sourceKind: string;
  /** Falls back to the configured weight of `sourceKind`. */
  weight?: number;
  locator: string;
  snippet?: string;
  collectedAt?: string;
}

// ============================================================================
// FINDING
// ============================================================================

export type FindingValue = JsonValue;

/**
 * A single claimed fact about the corpus.
 *
 * INVARIANT: evidence is deduped on (sourceKind, locator)
 * INVARIANT: evidence.length === 0 implies certaintyClass === 'unknown'
 * INVARIANT: certaintyScore and corroborationScore are in [0, 1]
 */
export interface Finding {
  readonly id: FindingId;
  readonly workerId: WorkerId;
  readonly section: SectionName;
  readonly key: string;
  readonly findingType: FindingType;
  readonly value: FindingValue;
  readonly certaintyClass: CertaintyClass;
  readonly certaintyScore: number;
  /** What the worker said about itself; informational only. */
  readonly claimedCertainty?: CertaintyClass;
  readonly evidence: readonly Evidence[];
  readonly corroborationScore: number;
  readonly supersedes?: FindingId;
  readonly createdAt: string;
}

export interface FindingInput {
  id?: string;
  workerId: WorkerId;
  section: string;
  key: string;
  findingType?: string;
  value: FindingValue;
  /**
   * The worker's own label. Only `'unknown'` has an effect: it is the one
   * class under which an evidence-free finding is accepted.
   */
  certaintyClass?: string;
  evidence: readonly (Evidence | EvidenceInput)[];
  supersedes?: string;
  createdAt?: string;
}

// ============================================================================
// ABSENCE
// ============================================================================

/**
 * A worker's explicit statement that a section has nothing to report, e.g.
 * "no database detected". Turns an empty section into `not_applicable`.
 */
export interface AbsenceNote {
  readonly section: SectionName;
  readonly reason: string;
  readonly workerId: WorkerId;
  readonly recordedAt: string;
}
