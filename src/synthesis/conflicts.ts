/**
 * @fileoverview Conflict Resolver
 *
 * Findings that share (section, key) but disagree on value are a Conflict.
 * Per bucket the lifecycle is:
 *
 *   open ──(second distinct value)──▶ conflicted ──▶ resolved | unresolved
 *
 * Resolution compares VALUES, each represented by its strongest finding, and
 * applies the policy in strict order until one step discriminates:
 *
 *   1. strictly higher corroborationScore
 *   2. higher certainty class
 *   3. more evidence items
 *   4. otherwise unresolved: no winner is guessed
 *
 * Arrival order never participates; identical finding sets always resolve
 * identically. Contradictions stay visible: an unresolved conflict keeps
 * every competitor verbatim.
 *
 * @packageDocumentation
 */

import { findingValueKey } from '../evidence/model.js';
import { certaintyRank, type Finding, type FindingId, type FindingValue, type SectionName } from '../evidence/types.js';

// ============================================================================
// TYPES
// ============================================================================

export type BucketState = 'open' | 'conflicted';

export type ConflictStatus = 'resolved' | 'unresolved';

/** Which policy step decided the conflict, or `tie` when none did. */
export type ResolutionReason = 'corroboration' | 'certainty_class' | 'evidence_count' | 'tie';

export interface ValueGroup {
  readonly valueKey: string;
  readonly value: FindingValue;
  /** Sorted by id. */
  readonly findings: readonly Finding[];
  readonly representative: Finding;
}

export interface FindingBucket {
  readonly section: SectionName;
  readonly key: string;
  readonly state: BucketState;
  /** Strongest value first. */
  readonly groups: readonly ValueGroup[];
}

export interface Conflict {
  readonly section: SectionName;
  readonly key: string;
  /** Every competing finding, sorted by id. */
  readonly competing: readonly Finding[];
  readonly resolution: Finding | null;
  readonly status: ConflictStatus;
  readonly reason: ResolutionReason;
}

// ============================================================================
// EFFECTIVE FINDINGS
// ============================================================================

/**
 * Ids named by some other finding's `supersedes`. Only a finding from the
 * same worker can be superseded; a reference across workers is ignored.
 */
export function supersededIds(findings: readonly Finding[]): Set<FindingId> {
  const owners = new Map<FindingId, Finding['workerId']>();
  for (const finding of findings) owners.set(finding.id, finding.workerId);

  const ids = new Set<FindingId>();
  for (const finding of findings) {
    const target = finding.supersedes;
    if (target && target !== finding.id && owners.get(target) === finding.workerId) ids.add(target);
  }
  return ids;
}

/**
 * Findings that take part in synthesis: everything not corrected by a later
 * finding.
 */
export function effectiveFindings(findings: readonly Finding[]): Finding[] {
  const superseded = supersededIds(findings);
  return findings.filter((finding) => !superseded.has(finding.id));
}

// ============================================================================
// POLICY
// ============================================================================

export interface PolicyComparison {
  /** Positive when `a` is stronger, negative when `b` is, zero on a full tie. */
  readonly order: number;
  readonly reason: ResolutionReason;
}

export function compareByPolicy(a: Finding, b: Finding): PolicyComparison {
  if (a.corroborationScore !== b.corroborationScore) {
    return { order: a.corroborationScore - b.corroborationScore, reason: 'corroboration' };
  }
  const rankDelta = certaintyRank(a.certaintyClass) - certaintyRank(b.certaintyClass);
  if (rankDelta !== 0) {
    return { order: rankDelta, reason: 'certainty_class' };
  }
  const evidenceDelta = a.evidence.length - b.evidence.length;
  if (evidenceDelta !== 0) {
    return { order: evidenceDelta, reason: 'evidence_count' };
  }
  return { order: 0, reason: 'tie' };
}

function compareIds(a: Finding, b: Finding): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Strongest first. Ids only order findings that already carry the same
 * value, where the choice of representative does not change the outcome.
 */
function strongestFirst(a: Finding, b: Finding): number {
  const { order } = compareByPolicy(a, b);
  return order !== 0 ? -order : compareIds(a, b);
}

// ============================================================================
// BUCKETING
// ============================================================================

export function bucketKey(section: SectionName, key: string): string {
  return `${section}\u0000${key}`;
}

/**
 * Group effective findings by (section, key), then by value. Buckets come back
 * sorted by section then key.
 */
export function bucketFindings(findings: readonly Finding[]): FindingBucket[] {
  const buckets = new Map<string, { section: SectionName; key: string; byValue: Map<string, Finding[]> }>();

  for (const finding of effectiveFindings(findings)) {
    const id = bucketKey(finding.section, finding.key);
    let bucket = buckets.get(id);
    if (!bucket) {
      bucket = { section: finding.section, key: finding.key, byValue: new Map() };
      buckets.set(id, bucket);
    }
    const valueKey = findingValueKey(finding.value);
    const members = bucket.byValue.get(valueKey) ?? [];
    members.push(finding);
    bucket.byValue.set(valueKey, members);
  }

  const result: FindingBucket[] = [];
  for (const bucket of buckets.values()) {
    const groups: ValueGroup[] = [];
    for (const [valueKey, members] of bucket.byValue) {
      const ranked = [...members].sort(strongestFirst);
      const representative = ranked[0];
      if (!representative) continue;
      groups.push({
        valueKey,
        value: representative.value,
        findings: [...members].sort(compareIds),
        representative,
      });
    }
    groups.sort((a, b) => {
      const { order } = compareByPolicy(a.representative, b.representative);
      if (order !== 0) return -order;
      return a.valueKey < b.valueKey ? -1 : a.valueKey > b.valueKey ? 1 : 0;
    });
    result.push({
      section: bucket.section,
      key: bucket.key,
      state: groups.length > 1 ? 'conflicted' : 'open',
      groups,
    });
  }

  return result.sort((a, b) => {
    if (a.section !== b.section) return a.section < b.section ? -1 : 1;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  });
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Terminal outcome for a bucket; `null` while it is still open (one value).
 */
export function resolveBucket(bucket: FindingBucket): Conflict | null {
  const [first, second] = bucket.groups;
  if (bucket.state === 'open' || !first || !second) return null;

  const competing = bucket.groups.flatMap((group) => group.findings).sort(compareIds);
  const { order, reason } = compareByPolicy(first.representative, second.representative);

  if (order === 0) {
    return { section: bucket.section, key: bucket.key, competing, resolution: null, status: 'unresolved', reason: 'tie' };
  }
  return {
    section: bucket.section,
    key: bucket.key,
    competing,
    resolution: first.representative,
    status: 'resolved',
    reason,
  };
}

/**
 * Detect and resolve every conflict in a finding set. Idempotent: the same
 * set, in any order, yields the same conflicts, statuses and winners.
 */
export function resolveConflicts(findings: readonly Finding[]): Conflict[] {
  const conflicts: Conflict[] = [];
  for (const bucket of bucketFindings(findings)) {
    const conflict = resolveBucket(bucket);
    if (conflict) conflicts.push(conflict);
  }
  return conflicts;
}
