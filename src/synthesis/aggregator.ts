/**
 * @fileoverview Confidence Aggregator
 *
 * Three levels of rollup:
 *
 *   finding:  weighted = certainty * (0.5 + 0.5 * corroboration)
 *   section:  coverage * mean(weighted per key) * conflictFactor^unresolved
 *   overall:  Σ section * weight, then each applicable penalty once
 *
 * Corroboration can at most halve certainty, never dominate it. Every penalty
 * is reported with its reason and factor so the final number is auditable.
 *
 * @packageDocumentation
 */

import { sectionRule, type SynthesisConfig } from '../config/schema.js';
import { SECTION_NAMES, type AbsenceNote, type Finding, type SectionName } from '../evidence/types.js';
import { clamp01, mean, roundTo } from '../utils/math.js';

// ============================================================================
// FINDING
// ============================================================================

export function scoreFinding(finding: Pick<Finding, 'certaintyScore' | 'corroborationScore'>): number {
  return roundTo(clamp01(finding.certaintyScore * (0.5 + 0.5 * finding.corroborationScore)));
}

// ============================================================================
// SECTION
// ============================================================================

/**
 * - `scored`: has findings
 * - `not_applicable`: no findings and at least one documented absence
 * - `empty`: no findings and nothing explaining why
 */
export type SectionStatus = 'scored' | 'not_applicable' | 'empty';

export interface SectionScore {
  readonly section: SectionName;
  readonly status: SectionStatus;
  /** Distinct keys observed. */
  readonly findingsCount: number;
  readonly expectedMinCount: number;
  readonly coverageFactor: number;
  readonly meanWeightedScore: number;
  readonly unresolvedConflicts: number;
  /** Multiplier applied for unresolved conflicts; 1 when there are none. */
  readonly conflictFactor: number;
  readonly sectionConfidence: number;
  readonly weight: number;
  readonly absenceReasons: readonly string[];
}

export interface SectionInput {
  /** One weighted score per distinct key in the section. */
  readonly keyScores: readonly number[];
  readonly absences: readonly AbsenceNote[];
  readonly unresolvedConflicts: number;
}

export function scoreSection(section: SectionName, input: SectionInput, config: SynthesisConfig): SectionScore {
  const rule = sectionRule(config, section);
  const absenceReasons = [...new Set(input.absences.map((note) => note.reason))].sort();
  const base = {
    section,
    expectedMinCount: rule.expectedMinCount,
    weight: rule.weight,
    absenceReasons,
  };

  if (input.keyScores.length === 0) {
    // Absence that is itself the finding must not read as low confidence.
    if (absenceReasons.length > 0) {
      return {
        ...base,
        status: 'not_applicable',
        findingsCount: 0,
        coverageFactor: 1,
        meanWeightedScore: 1,
        unresolvedConflicts: 0,
        conflictFactor: 1,
        sectionConfidence: 1,
      };
    }
    return {
      ...base,
      status: 'empty',
      findingsCount: 0,
      coverageFactor: 0,
      meanWeightedScore: 0,
      unresolvedConflicts: 0,
      conflictFactor: 1,
      sectionConfidence: 0,
    };
  }

  const coverageFactor = roundTo(Math.min(1, input.keyScores.length / rule.expectedMinCount));
  const meanWeightedScore = roundTo(mean(input.keyScores));
  const conflictFactor = roundTo(config.penalties.sectionConflictFactor ** input.unresolvedConflicts);

  return {
    ...base,
    status: 'scored',
    findingsCount: input.keyScores.length,
    coverageFactor,
    meanWeightedScore,
    unresolvedConflicts: input.unresolvedConflicts,
    conflictFactor,
    sectionConfidence: roundTo(clamp01(coverageFactor * meanWeightedScore * conflictFactor)),
  };
}

// ============================================================================
// OVERALL
// ============================================================================

export type PenaltyReason = 'low_section' | 'uncertainties' | 'unresolved_conflicts';

export interface Penalty {
  readonly reason: PenaltyReason;
  readonly factor: number;
  readonly detail: string;
}

export interface OverallScore {
  /** Weighted section sum before penalties. */
  readonly base: number;
  readonly score: number;
  readonly penalties: readonly Penalty[];
}

export interface OverallCounts {
  readonly uncertainFindings: number;
  readonly unresolvedConflicts: number;
}

export function aggregateOverall(
  sections: readonly SectionScore[],
  counts: OverallCounts,
  config: SynthesisConfig
): OverallScore {
  const base = roundTo(clamp01(sections.reduce((sum, s) => sum + s.sectionConfidence * s.weight, 0)));
  const { lowSection, uncertainties, unresolvedConflicts } = config.penalties;
  const penalties: Penalty[] = [];

  const low = sections.filter((s) => s.sectionConfidence < lowSection.threshold).map((s) => s.section);
  if (low.length > 0) {
    penalties.push({
      reason: 'low_section',
      factor: lowSection.factor,
      detail: `${low.length} section(s) below ${lowSection.threshold}: ${low.join(', ')}`,
    });
  }
  if (counts.uncertainFindings > uncertainties.maxCount) {
    penalties.push({
      reason: 'uncertainties',
      factor: uncertainties.factor,
      detail: `${counts.uncertainFindings} unresolved uncertainties exceed ${uncertainties.maxCount}`,
    });
  }
  if (counts.unresolvedConflicts > unresolvedConflicts.maxCount) {
    penalties.push({
      reason: 'unresolved_conflicts',
      factor: unresolvedConflicts.factor,
      detail: `${counts.unresolvedConflicts} unresolved conflicts exceed ${unresolvedConflicts.maxCount}`,
    });
  }

  const score = penalties.reduce((value, penalty) => value * penalty.factor, base);
  return { base, score: roundTo(clamp01(score)), penalties };
}

/**
 * Sections in their canonical order, for callers that build SectionScores
 * from a map.
 */
export function orderSections(sections: ReadonlyMap<SectionName, SectionScore>): SectionScore[] {
  const ordered: SectionScore[] = [];
  for (const name of SECTION_NAMES) {
    const score = sections.get(name);
    if (score) ordered.push(score);
  }
  return ordered;
}
