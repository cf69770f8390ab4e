import { describe, it, expect } from 'vitest';
import { createAbsenceNote } from '../../evidence/model.js';
import { SECTION_NAMES, type AbsenceNote, type SectionName } from '../../evidence/types.js';
import { roundTo } from '../../utils/math.js';
import { scoreFinding, synthesize } from '../index.js';
import { ev, fixedNow, makeFinding, testConfig } from '../../test/fixtures.js';

const config = testConfig();

function absencesExcept(...scored: SectionName[]): AbsenceNote[] {
  return SECTION_NAMES.filter((section) => !scored.includes(section)).map((section) =>
    createAbsenceNote({ section, reason: `no ${section} signals`, workerId: 'worker-a' }, { now: fixedNow })
  );
}

describe('synthesize', () => {
  it('scores nothing as zero, with every section empty', () => {
    const result = synthesize({ findings: [], absences: [] }, config);

    expect(result.sections.map((s) => s.status)).toEqual(SECTION_NAMES.map(() => 'empty'));
    expect(result.overall.base).toBe(0);
    expect(result.overall.score).toBe(0);
    expect(result.overall.penalties.map((p) => p.reason)).toEqual(['low_section']);
    expect(result.counts).toEqual({ findings: 0, effective: 0, superseded: 0, uncertain: 0, conflicts: 0, unresolvedConflicts: 0 });
  });

  it('resolves a language conflict and scores the stack section from the winner', () => {
    const typescript = makeFinding({
      key: 'primary_language',
      findingType: 'language',
      value: 'TypeScript',
      evidence: [ev('config_file', 'tsconfig.json'), ev('file_extension', 'src/index.ts')],
    });
    const javascript = makeFinding({
      key: 'primary_language',
      findingType: 'language',
      value: 'JavaScript',
      workerId: 'worker-b',
      evidence: [ev('naming', 'src/js-helpers')],
    });
    const fastify = makeFinding({
      key: 'framework',
      findingType: 'framework',
      value: 'fastify',
      evidence: [ev('manifest', 'package.json#dependencies'), ev('import_statement', 'src/server.ts:1')],
    });

    const result = synthesize({ findings: [javascript, fastify, typescript], absences: absencesExcept('stack') }, config);

    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0]?.resolution?.value).toBe('TypeScript');

    const stack = result.sections.find((s) => s.section === 'stack');
    expect(stack).toMatchObject({
      status: 'scored',
      findingsCount: 2,
      coverageFactor: 0.5,
      meanWeightedScore: 0.9275,
      sectionConfidence: 0.46375,
    });
    expect(result.sections.filter((s) => s.status === 'not_applicable')).toHaveLength(6);

    expect(result.overall.base).toBeCloseTo(0.9195625, 5);
    expect(result.overall.penalties).toEqual([{ reason: 'low_section', factor: 0.9, detail: '1 section(s) below 0.5: stack' }]);
    expect(result.overall.score).toBeCloseTo(0.82760625, 5);
    expect(result.counts).toEqual({ findings: 3, effective: 3, superseded: 0, uncertain: 0, conflicts: 1, unresolvedConflicts: 0 });
  });

  it('reports per-finding scores sorted by id with cross-validation', () => {
    const crossed = makeFinding({ key: 'a', value: 1, evidence: [ev('config_file', 'x.json'), ev('doc', 'README.md')] });
    const single = makeFinding({ key: 'b', value: 2, evidence: [ev('config_file', 'y.json')] });

    const result = synthesize({ findings: [single, crossed], absences: [] }, config);

    expect(result.findingScores.map((s) => [s.findingId, s.crossValidated])).toEqual([
      [crossed.id, true],
      [single.id, false],
    ]);
    expect(result.findingScores[1]?.weightedScore).toBe(scoreFinding(single));
  });

  it('scores an unresolved key by the mean of its competitors and applies the section conflict factor', () => {
    const shop = makeFinding({ section: 'identity', key: 'name', value: 'shop' });
    const store = makeFinding({ section: 'identity', key: 'name', value: 'store', workerId: 'worker-b' });

    const result = synthesize({ findings: [shop, store], absences: [] }, config);
    const identity = result.sections.find((s) => s.section === 'identity');
    const weighted = scoreFinding(shop);

    expect(result.conflicts[0]?.status).toBe('unresolved');
    expect(identity?.unresolvedConflicts).toBe(1);
    expect(identity?.conflictFactor).toBe(0.9);
    expect(identity?.meanWeightedScore).toBe(weighted);
    expect(identity?.sectionConfidence).toBe(roundTo(0.333333 * weighted * 0.9));
    // Both competitors are speculated and both contribute.
    expect(result.counts.uncertain).toBe(2);
    expect(result.counts.unresolvedConflicts).toBe(1);
  });

  it('drops superseded findings before scoring', () => {
    const wrong = makeFinding({ key: 'database', value: 'mysql' });
    const fixed = makeFinding({ key: 'database', value: 'postgres', supersedes: wrong.id });

    const result = synthesize({ findings: [wrong, fixed], absences: [] }, config);

    expect(result.conflicts).toEqual([]);
    expect(result.findingScores.map((s) => s.findingId)).toEqual([fixed.id]);
    expect(result.counts.superseded).toBe(1);
  });

  it('is independent of finding order', () => {
    const findings = [
      makeFinding({ key: 'primary_language', findingType: 'language', value: 'TypeScript', evidence: [ev('config_file', 'tsconfig.json')] }),
      makeFinding({ key: 'primary_language', findingType: 'language', value: 'Go', evidence: [ev('file_extension', 'main.go')] }),
      makeFinding({ section: 'domain-model', key: 'entity:Order', findingType: 'entity', value: { name: 'Order' } }),
      makeFinding({ section: 'conventions', key: 'test_layout', value: '__tests__' }),
    ];
    const absences = absencesExcept('stack', 'domain-model', 'conventions');

    const forward = synthesize({ findings, absences }, config);
    const backward = synthesize({ findings: [...findings].reverse(), absences: [...absences].reverse() }, config);

    expect(backward).toEqual(forward);
  });
});
