import { describe, it, expect } from 'vitest';
import type { FindingDraft } from '../../accumulator/accumulator.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import type { Phase, Run, Worker } from '../../orchestrator/types.js';
import { JsonReportRenderer } from '../renderer.js';
import { buildRunReport } from '../report.js';
import { RunReportSchema } from '../schema.js';
import { FIXED_TIME, ev, testConfig } from '../../test/fixtures.js';

const FIXED_MS = Date.parse(FIXED_TIME);

function worker(id: string, findings: FindingDraft[], absences: { section: string; reason: string }[] = []): Worker<null> {
  return { id, run: async () => ({ status: 'success', findings, absences }) };
}

async function sampleRun(): Promise<Run> {
  const phases: Phase<null>[] = [
    {
      name: 'discovery',
      mode: 'parallel',
      timeoutMs: 1_000,
      workers: [
        worker('stack', [
          {
            id: 'fnd_ts',
            section: 'stack',
            key: 'primary_language',
            findingType: 'language',
            value: 'TypeScript',
            evidence: [ev('config_file', 'tsconfig.json'), ev('file_extension', 'src/index.ts')],
          },
          { id: 'fnd_db_old', section: 'stack', key: 'database', value: 'mysql', evidence: [ev('doc', 'README.md')] },
          {
            id: 'fnd_db',
            section: 'stack',
            key: 'database',
            value: 'postgres',
            supersedes: 'fnd_db_old',
            evidence: [ev('schema_definition', 'db/schema.sql')],
          },
        ]),
        worker(
          'naming',
          [
            {
              id: 'fnd_js',
              section: 'stack',
              key: 'primary_language',
              findingType: 'language',
              value: 'JavaScript',
              certaintyClass: 'certain',
              evidence: [ev('naming', 'src/js-helpers')],
            },
          ],
          [{ section: 'operations', reason: 'no deployment config' }]
        ),
      ],
    },
    {
      name: 'correction',
      mode: 'sequential',
      timeoutMs: 1_000,
      dependsOn: ['discovery'],
      workers: [
        worker('schema', [
          {
            id: 'fnd_orm',
            section: 'stack',
            key: 'orm',
            value: 'prisma',
            evidence: [ev('schema_definition', 'prisma/schema.prisma')],
          },
        ]),
      ],
    },
  ];
  return new Orchestrator({ clock: () => FIXED_MS, idFactory: () => 'run_report' }).run(phases, null);
}

describe('buildRunReport', () => {
  it('produces a document that satisfies the report schema', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    expect(RunReportSchema.safeParse(report).success).toBe(true);
    expect(report).toMatchObject({
      reportVersion: 1,
      runId: 'run_report',
      status: 'complete',
      truncated: false,
      startedAt: FIXED_TIME,
      completedAt: FIXED_TIME,
      configVersion: 1,
      timeout: null,
    });
  });

  it('survives a JSON round trip unchanged', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    expect(JSON.parse(JSON.stringify(report))).toEqual(report);
  });

  it('is deep-frozen', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.findings[0]?.evidence)).toBe(true);
  });

  it('marks superseded findings and keeps them out of the counts', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    const old = report.findings.find((f) => f.id === 'fnd_db_old');
    const fixed = report.findings.find((f) => f.id === 'fnd_db');
    expect(old?.superseded).toBe(true);
    expect(fixed).toMatchObject({ superseded: false, supersedes: 'fnd_db_old' });
    expect(report.counts).toMatchObject({ findings: 5, effective: 4, superseded: 1, conflicts: 1, rejected: 0, lateDrops: 0 });
  });

  it('summarizes conflicts by finding id', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    expect(report.conflicts).toEqual([
      {
        section: 'stack',
        key: 'primary_language',
        status: 'resolved',
        reason: 'corroboration',
        resolution: 'fnd_ts',
        competing: [
          {
            findingId: 'fnd_js',
            workerId: 'naming',
            value: 'JavaScript',
            certaintyClass: 'unknown',
            corroborationScore: 0.166667,
            evidenceCount: 1,
          },
          {
            findingId: 'fnd_ts',
            workerId: 'stack',
            value: 'TypeScript',
            certaintyClass: 'certain',
            corroborationScore: 1,
            evidenceCount: 2,
          },
        ],
      },
    ]);
  });

  it('keeps the worker claim next to the computed class', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());
    const js = report.findings.find((f) => f.id === 'fnd_js');

    expect(js?.claimedCertainty).toBe('certain');
    expect(js?.certaintyClass).toBe('unknown');
    expect(report.findings.find((f) => f.id === 'fnd_ts')?.claimedCertainty).toBeNull();
  });

  it('lists phases with their workers and absences by section', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    expect(report.phases.map((p) => [p.name, p.status, p.findingsContributed])).toEqual([
      ['discovery', 'complete', 4],
      ['correction', 'complete', 1],
    ]);
    expect(report.phases[0]?.workers.map((w) => w.error)).toEqual([null, null]);
    expect(report.sections.find((s) => s.section === 'operations')).toMatchObject({
      status: 'not_applicable',
      absenceReasons: ['no deployment config'],
    });
  });
});

describe('JsonReportRenderer', () => {
  it('renders indented JSON by default', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());
    const renderer = new JsonReportRenderer();

    expect(renderer.format).toBe('json');
    expect(renderer.render(report)).toBe(JSON.stringify(report, null, 2));
  });

  it('renders a single line with indent 0', async () => {
    const report = buildRunReport(await sampleRun(), testConfig());

    expect(new JsonReportRenderer({ indent: 0 }).render(report)).not.toContain('\n');
  });
});
