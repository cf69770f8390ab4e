/**
 * @fileoverview Certainty Classifier
 *
 * Maps a finding's evidence set to a certainty class and score:
 *
 *   raw        = min(Σ weight over deduped evidence, maxPossible(type))
 *   score      = raw / maxPossible(type)
 *   class      = band(score)
 *
 * Pure and order-independent: identical evidence sets classify identically.
 * Adding a non-duplicate item can only raise `raw`, so the score is
 * monotonically nondecreasing in evidence.
 *
 * @packageDocumentation
 */

import { findingTypeRule, type SynthesisConfig } from '../config/schema.js';
import { evidenceKey, type CertaintyClass, type Evidence, type FindingType } from '../evidence/types.js';
import { clamp01, roundTo } from '../utils/math.js';

export interface CertaintyResult {
  readonly certaintyClass: CertaintyClass;
  readonly certaintyScore: number;
  /** Evidence mass after dedup, before capping. */
  readonly raw: number;
  readonly maxPossible: number;
}

export function classifyCertainty(
  evidence: readonly Evidence[],
  findingType: FindingType,
  config: SynthesisConfig
): CertaintyResult {
  const maxPossible = findingTypeRule(config, findingType).maxPossible;
  const raw = sumDistinctWeights(evidence);
  const certaintyScore = roundTo(clamp01(Math.min(raw, maxPossible) / maxPossible));
  return {
    certaintyClass: bandFor(certaintyScore, config),
    certaintyScore,
    raw: roundTo(raw),
    maxPossible,
  };
}

/**
 * Band lookup, shared with anything that needs to label a bare score.
 */
export function bandFor(score: number, config: SynthesisConfig): CertaintyClass {
  const bands = config.certaintyBands;
  if (score >= bands.certain) return 'certain';
  if (score >= bands.inferred) return 'inferred';
  if (score >= bands.speculated) return 'speculated';
  return 'unknown';
}

/**
 * Σ weight with duplicates collapsed to their highest weight. Summed in a
 * sorted order so the float result does not depend on input order.
 */
function sumDistinctWeights(evidence: readonly Evidence[]): number {
  const best = new Map<string, number>();
  for (const item of evidence) {
    const key = evidenceKey(item);
    best.set(key, Math.max(best.get(key) ?? 0, item.weight));
  }
  return [...best.values()].sort((a, b) => a - b).reduce((sum, weight) => sum + weight, 0);
}
