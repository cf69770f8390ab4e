import { describe, it, expect } from 'vitest';
import { loadSynthesisConfig } from '../../config/loader.js';
import { createEvidence, dedupeEvidence } from '../../evidence/model.js';
import type { Evidence, EvidenceInput } from '../../evidence/types.js';
import { computeCorroboration, isCrossValidated } from '../corroboration.js';
import { ev, testConfig } from '../../test/fixtures.js';

const config = testConfig();

function items(...inputs: EvidenceInput[]): Evidence[] {
  return inputs.map((input) => createEvidence(input, config));
}

describe('computeCorroboration', () => {
  it('sums the strongest weight of each distinct source kind', () => {
    const result = computeCorroboration(
      items(ev('file_extension', 'src/a.ts'), ev('doc', 'README.md', 0.5), ev('doc', 'docs/stack.md', 0.6)),
      'language',
      config
    );

    expect(result.kindWeights).toEqual({ doc: 0.6, file_extension: 0.8 });
    expect(result.distinctKinds).toBe(2);
    expect(result.score).toBe(0.777778);
  });

  it('does not reward repeating a single signal', () => {
    const result = computeCorroboration(
      items(ev('file_extension', 'a.ts'), ev('file_extension', 'b.ts'), ev('file_extension', 'c.ts')),
      'language',
      config
    );

    expect(result.score).toBe(0.444444);
    expect(result.distinctKinds).toBe(1);
    expect(isCrossValidated(result)).toBe(false);
  });

  it('does not depend on evidence order', () => {
    const evidence = items(
      ev('file_extension', 'src/a.ts'),
      ev('doc', 'README.md', 0.5),
      ev('naming', 'src/helpers'),
      ev('doc', 'docs/stack.md', 0.6)
    );
    const expected = computeCorroboration(evidence, 'framework', config);

    for (const order of [[3, 2, 1, 0], [1, 3, 0, 2], [2, 0, 3, 1]]) {
      const shuffled = order.map((index) => evidence[index]).filter((item): item is Evidence => item !== undefined);
      expect(computeCorroboration(shuffled, 'framework', config)).toEqual(expected);
    }
    expect(expected.score).toBe(0.85);
  });

  it('is unchanged by an exact duplicate entry', () => {
    const evidence = items(ev('config_file', 'tsconfig.json'), ev('naming', 'src/helpers'));
    const withDuplicate = [...evidence, createEvidence(ev('config_file', 'tsconfig.json'), config)];

    expect(withDuplicate).toHaveLength(3);
    expect(computeCorroboration(withDuplicate, 'language', config)).toEqual(computeCorroboration(evidence, 'language', config));
    expect(computeCorroboration(dedupeEvidence(withDuplicate), 'language', config).score).toBe(0.722222);
  });

  it('divides by the configured maximum for the finding type', async () => {
    const tuned = await loadSynthesisConfig({ overrides: { findingTypes: { language: { maxPossible: 1 } } } });

    expect(computeCorroboration(items(ev('file_extension', 'src/a.ts')), 'language', tuned).score).toBe(0.8);
  });

  it('caps the score at 1', () => {
    const result = computeCorroboration(
      items(ev('config_file', 'tsconfig.json'), ev('manifest', 'package.json'), ev('file_extension', 'a.ts')),
      'language',
      config
    );

    expect(result.score).toBe(1);
    expect(isCrossValidated(result)).toBe(true);
  });

  it('is zero without evidence', () => {
    expect(computeCorroboration([], 'general', config)).toEqual({ score: 0, distinctKinds: 0, kindWeights: {} });
  });

  it('distinguishes certain-but-unconfirmed from cross-validated', () => {
    const single = computeCorroboration(items(ev('config_file', 'a.json'), ev('config_file', 'b.json')), 'general', config);
    const crossed = computeCorroboration(items(ev('config_file', 'a.json'), ev('doc', 'README.md')), 'general', config);

    expect(isCrossValidated(single)).toBe(false);
    expect(isCrossValidated(crossed)).toBe(true);
    expect(crossed.score).toBeGreaterThan(single.score);
  });
});
