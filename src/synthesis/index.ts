/**
 * @fileoverview Synthesis entry point
 *
 * One call turns a frozen finding snapshot into section scores, conflicts and
 * an overall score. Runs single-threaded at each phase barrier; it never sees
 * a snapshot that is still being written.
 *
 * @packageDocumentation
 */

import type { SynthesisConfig } from '../config/schema.js';
import { SECTION_NAMES, type AbsenceNote, type Finding, type FindingId, type SectionName } from '../evidence/types.js';
import { mean, roundTo } from '../utils/math.js';
import { isCrossValidated, computeCorroboration } from './corroboration.js';
import { aggregateOverall, orderSections, scoreFinding, scoreSection, type OverallScore, type SectionScore } from './aggregator.js';
import { bucketFindings, effectiveFindings, resolveBucket, type Conflict } from './conflicts.js';

export * from './certainty.js';
export * from './corroboration.js';
export * from './aggregator.js';
export * from './conflicts.js';

export interface FindingScore {
  readonly findingId: FindingId;
  readonly section: SectionName;
  readonly key: string;
  readonly certaintyScore: number;
  readonly corroborationScore: number;
  readonly weightedScore: number;
  readonly crossValidated: boolean;
}

export interface SynthesisCounts {
  readonly findings: number;
  readonly effective: number;
  readonly superseded: number;
  /** Contributing findings classified speculated or unknown. */
  readonly uncertain: number;
  readonly conflicts: number;
  readonly unresolvedConflicts: number;
}

export interface SynthesisResult {
  /** Effective findings only, sorted by id. */
  readonly findingScores: readonly FindingScore[];
  /** In canonical section order. */
  readonly sections: readonly SectionScore[];
  readonly conflicts: readonly Conflict[];
  readonly overall: OverallScore;
  readonly counts: SynthesisCounts;
}

export interface SynthesisInput {
  readonly findings: readonly Finding[];
  readonly absences: readonly AbsenceNote[];
}

export function synthesize(input: SynthesisInput, config: SynthesisConfig): SynthesisResult {
  const effective = effectiveFindings(input.findings);

  const findingScores: FindingScore[] = effective
    .map((finding) => ({
      findingId: finding.id,
      section: finding.section,
      key: finding.key,
      certaintyScore: finding.certaintyScore,
      corroborationScore: finding.corroborationScore,
      weightedScore: scoreFinding(finding),
      crossValidated: isCrossValidated(computeCorroboration(finding.evidence, finding.findingType, config)),
    }))
    .sort((a, b) => (a.findingId < b.findingId ? -1 : a.findingId > b.findingId ? 1 : 0));

  const keyScores = new Map<SectionName, number[]>();
  const unresolvedBySection = new Map<SectionName, number>();
  const conflicts: Conflict[] = [];
  let uncertain = 0;

  for (const bucket of bucketFindings(effective)) {
    const conflict = resolveBucket(bucket);
    let contributors: Finding[];
    if (!conflict) {
      contributors = bucket.groups.map((group) => group.representative);
    } else {
      conflicts.push(conflict);
      if (conflict.resolution) {
        contributors = [conflict.resolution];
      } else {
        contributors = bucket.groups.map((group) => group.representative);
        unresolvedBySection.set(bucket.section, (unresolvedBySection.get(bucket.section) ?? 0) + 1);
      }
    }

    // An unresolved key contributes the mean of its competing values.
    const scores = keyScores.get(bucket.section) ?? [];
    scores.push(roundTo(mean(contributors.map((finding) => scoreFinding(finding)))));
    keyScores.set(bucket.section, scores);

    for (const finding of contributors) {
      if (finding.certaintyClass === 'speculated' || finding.certaintyClass === 'unknown') uncertain++;
    }
  }

  const sectionScores = new Map<SectionName, SectionScore>();
  for (const section of SECTION_NAMES) {
    sectionScores.set(
      section,
      scoreSection(
        section,
        {
          keyScores: keyScores.get(section) ?? [],
          absences: input.absences.filter((note) => note.section === section),
          unresolvedConflicts: unresolvedBySection.get(section) ?? 0,
        },
        config
      )
    );
  }
  const sections = orderSections(sectionScores);

  const unresolvedConflicts = conflicts.filter((conflict) => conflict.status === 'unresolved').length;
  const overall = aggregateOverall(sections, { uncertainFindings: uncertain, unresolvedConflicts }, config);

  return {
    findingScores,
    sections,
    conflicts,
    overall,
    counts: {
      findings: input.findings.length,
      effective: effective.length,
      superseded: input.findings.length - effective.length,
      uncertain,
      conflicts: conflicts.length,
      unresolvedConflicts,
    },
  };
}
