/**
 * @fileoverview Corroboration Engine
 *
 * Measures independent source diversity rather than evidence mass: each
 * source kind contributes once, at its strongest weight, so a worker cannot
 * raise its own corroboration by repeating one signal.
 *
 *   score = min(Σ max weight per distinct source kind / maxPossible(type), 1)
 *
 * @packageDocumentation
 */

import { findingTypeRule, type SynthesisConfig } from '../config/schema.js';
import type { Evidence, FindingType } from '../evidence/types.js';
import { clamp01, roundTo } from '../utils/math.js';

export interface CorroborationResult {
  readonly score: number;
  readonly distinctKinds: number;
  /** Strongest weight per source kind, keys sorted. */
  readonly kindWeights: Readonly<Record<string, number>>;
}

export function computeCorroboration(
  evidence: readonly Evidence[],
  findingType: FindingType,
  config: SynthesisConfig
): CorroborationResult {
  const byKind = new Map<string, number>();
  for (const item of evidence) {
    byKind.set(item.sourceKind, Math.max(byKind.get(item.sourceKind) ?? 0, item.weight));
  }

  const kinds = [...byKind.keys()].sort();
  const kindWeights: Record<string, number> = {};
  let total = 0;
  for (const kind of kinds) {
    const weight = byKind.get(kind) ?? 0;
    kindWeights[kind] = weight;
    total += weight;
  }

  const maxPossible = findingTypeRule(config, findingType).maxPossible;
  return {
    score: roundTo(clamp01(total / maxPossible)),
    distinctKinds: kinds.length,
    kindWeights,
  };
}

/**
 * True when more than one independent source kind backs the finding:
 * distinguishes "certain and cross-validated" from "certain but unconfirmed".
 */
export function isCrossValidated(result: Pick<CorroborationResult, 'distinctKinds'>): boolean {
  return result.distinctKinds >= 2;
}
