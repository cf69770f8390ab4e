/**
 * @fileoverview Shared builders for synthesis tests.
 */

import { getDefaultSynthesisConfig } from '../config/loader.js';
import type { SynthesisConfig } from '../config/schema.js';
import { createFinding } from '../evidence/model.js';
import type { EvidenceInput, Finding, FindingInput } from '../evidence/types.js';

export const FIXED_TIME = '2026-01-01T00:00:00.000Z';

export const fixedNow = (): string => FIXED_TIME;

export function testConfig(): SynthesisConfig {
  return getDefaultSynthesisConfig();
}

export function ev(sourceKind: string, locator: string, weight?: number, snippet = ''): EvidenceInput {
  return { sourceKind, locator, snippet, ...(weight !== undefined ? { weight } : {}) };
}

let counter = 0;

/**
 * Build a finding with deterministic timestamps. Ids default to a running
 * counter so tests never depend on random UUIDs.
 */
export function makeFinding(overrides: Partial<FindingInput> & Pick<FindingInput, 'key' | 'value'>, config = testConfig()): Finding {
  counter += 1;
  return createFinding(
    {
      id: `fnd_test_${String(counter).padStart(4, '0')}`,
      workerId: 'worker-a',
      section: 'stack',
      findingType: 'general',
      evidence: [ev('config_file', `file-${counter}.json`)],
      createdAt: FIXED_TIME,
      ...overrides,
    },
    config,
    { now: fixedNow }
  );
}
