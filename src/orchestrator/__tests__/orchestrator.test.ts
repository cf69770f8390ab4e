import { describe, it, expect, vi } from 'vitest';
import type { FindingDraft } from '../../accumulator/accumulator.js';
import { ConfigurationError } from '../../core/errors.js';
import { Orchestrator, phaseStatusOf } from '../orchestrator.js';
import type { Phase, RunEvent, Worker, WorkerContext, WorkerOutcome } from '../types.js';
import { ev } from '../../test/fixtures.js';

interface Corpus {
  root: string;
}

const corpus: Corpus = { root: '/srv/fixture-repo' };

function draft(id: string, key = `key-${id}`, value: FindingDraft['value'] = id): FindingDraft {
  return { id, section: 'stack', key, value, evidence: [ev('config_file', `${id}.json`)] };
}

function emitting(id: string, drafts: FindingDraft[]): Worker<Corpus> {
  return { id, run: async () => ({ status: 'success', findings: drafts }) };
}

/** Records its drafts, then never settles. */
function hanging(id: string, drafts: FindingDraft[] = [], onContext?: (context: WorkerContext<Corpus>) => void): Worker<Corpus> {
  return {
    id,
    run: (context) => {
      for (const item of drafts) context.record(item);
      onContext?.(context);
      return new Promise(() => undefined);
    },
  };
}

function phase(name: string, workers: Worker<Corpus>[], overrides: Partial<Phase<Corpus>> = {}): Phase<Corpus> {
  return { name, mode: 'parallel', timeoutMs: 1_000, workers, ...overrides };
}

function orchestrator(onEvent?: (event: RunEvent) => void, runTimeoutMs?: number): Orchestrator {
  return new Orchestrator({ idFactory: () => 'run_test', onEvent, runTimeoutMs });
}

function outcome(status: WorkerOutcome['status'], findingsContributed = 0): WorkerOutcome {
  return { workerId: 'w', status, findingsContributed, durationMs: 0 };
}

describe('phaseStatusOf', () => {
  it.each([
    [[outcome('success'), outcome('success')], 'complete'],
    [[], 'complete'],
    [[outcome('success'), outcome('error')], 'partial'],
    [[outcome('timed_out', 2)], 'partial'],
    [[outcome('error'), outcome('timed_out')], 'failed'],
  ] as const)('classifies %j as %s', (workers, expected) => {
    expect(phaseStatusOf(workers)).toBe(expected);
  });
});

describe('Orchestrator', () => {
  it('runs a parallel phase and merges every worker at the barrier', async () => {
    const run = await orchestrator().run(
      [phase('discovery', [emitting('stack', [draft('fnd_1')]), emitting('docs', [draft('fnd_2')])])],
      corpus
    );

    expect(run.runId).toBe('run_test');
    expect(run.status).toBe('complete');
    expect(run.truncated).toBe(false);
    expect(run.phases[0]?.status).toBe('complete');
    expect(run.phases[0]?.findingsContributed).toBe(2);
    expect(run.findings.map((f) => f.id)).toEqual(['fnd_1', 'fnd_2']);
    expect(run.synthesis.counts.findings).toBe(2);
    expect(run.timeout).toBeNull();
  });

  it('keeps the findings of a worker that timed out and marks the phase partial', async () => {
    const captured: { signal?: AbortSignal } = {};
    const w3 = hanging('w3', [draft('fnd_w3_a'), draft('fnd_w3_b')], (context) => {
      captured.signal = context.signal;
    });

    const run = await orchestrator().run(
      [phase('discovery', [emitting('w1', [draft('fnd_w1')]), w3], { timeoutMs: 50 })],
      corpus
    );

    const w3Outcome = run.phases[0]?.workers.find((w) => w.workerId === 'w3');
    expect(w3Outcome?.status).toBe('timed_out');
    expect(w3Outcome?.findingsContributed).toBe(2);
    expect(w3Outcome?.error?.code).toBe('WORKER_TIMEOUT');
    expect(run.phases[0]?.status).toBe('partial');
    expect(run.status).toBe('complete');
    expect(run.findings.map((f) => f.id).sort()).toEqual(['fnd_w1', 'fnd_w3_a', 'fnd_w3_b']);
    expect(run.synthesis.findingScores).toHaveLength(3);
    expect(captured.signal?.aborted).toBe(true);
  });

  it('drops records made after the deadline', async () => {
    const captured: { context?: WorkerContext<Corpus> } = {};
    const run = await orchestrator().run(
      [phase('discovery', [hanging('slow', [], (context) => (captured.context = context))], { timeoutMs: 20 })],
      corpus
    );

    expect(captured.context?.record(draft('fnd_late')).ok).toBe(false);
    expect(run.findings).toEqual([]);
  });

  it('isolates worker errors and keeps what they recorded', async () => {
    const thrower: Worker<Corpus> = {
      id: 'thrower',
      run: async () => {
        throw new Error('parser crashed');
      },
    };
    const reporter: Worker<Corpus> = {
      id: 'reporter',
      run: async (context) => {
        context.record(draft('fnd_before_error'));
        return { status: 'error', error: 'manifest unreadable' };
      },
    };

    const run = await orchestrator().run(
      [phase('discovery', [thrower, reporter, emitting('ok', [draft('fnd_ok')])])],
      corpus
    );

    const [first, second, third] = run.phases[0]?.workers ?? [];
    expect(first).toMatchObject({
      status: 'error',
      error: { code: 'WORKER_ERROR', message: 'Worker thrower failed in phase discovery: parser crashed' },
    });
    expect(second).toMatchObject({ status: 'error', findingsContributed: 1 });
    expect(second?.error?.message).toBe('Worker reporter failed in phase discovery: manifest unreadable');
    expect(third?.status).toBe('success');
    expect(run.phases[0]?.status).toBe('partial');
    expect(run.findings.map((f) => f.id)).toEqual(['fnd_before_error', 'fnd_ok']);
  });

  it('treats a synchronous throw as a worker error', async () => {
    const worker: Worker<Corpus> = {
      id: 'sync',
      run: () => {
        throw new Error('boom');
      },
    };

    const run = await orchestrator().run([phase('discovery', [worker])], corpus);

    expect(run.phases[0]?.workers[0]?.status).toBe('error');
    expect(run.phases[0]?.status).toBe('failed');
    expect(run.status).toBe('failed');
    expect(run.synthesis.overall.score).toBe(0);
  });

  it('rejects malformed drafts one by one and keeps the rest of the result', async () => {
    const sloppy: Worker<Corpus> = {
      id: 'sloppy',
      run: async () => ({
        status: 'success',
        findings: [JSON.parse('{"section":"stack","key":"k","value":"x"}'), draft('fnd_sloppy_ok')],
      }),
    };

    const run = await orchestrator().run([phase('discovery', [sloppy, emitting('ok', [draft('fnd_ok')])])], corpus);

    expect(run.status).toBe('complete');
    expect(run.phases[0]?.workers.map((w) => [w.workerId, w.status, w.findingsContributed])).toEqual([
      ['sloppy', 'success', 1],
      ['ok', 'success', 1],
    ]);
    expect(run.findings.map((f) => f.id)).toEqual(['fnd_sloppy_ok', 'fnd_ok']);
    expect(run.rejections.map((r) => [r.workerId, r.reason])).toEqual([
      ['sloppy', 'Validation failed for finding.evidence: expected an array, got undefined'],
    ]);
  });

  it('turns a result that is not a worker result into a worker error', async () => {
    const broken: Worker<Corpus> = { id: 'broken', run: async () => JSON.parse('null') };

    const run = await orchestrator().run([phase('discovery', [broken, emitting('ok', [draft('fnd_ok')])])], corpus);

    expect(run.phases[0]?.workers[0]).toMatchObject({
      workerId: 'broken',
      status: 'error',
      findingsContributed: 0,
      error: {
        code: 'WORKER_ERROR',
        message: 'Worker broken failed in phase discovery: malformed result (Expected object, received null)',
      },
    });
    expect(run.phases[0]?.status).toBe('partial');
    expect(run.status).toBe('complete');
    expect(run.findings.map((f) => f.id)).toEqual(['fnd_ok']);
  });

  it('does not let a worker supersede another worker', async () => {
    const language = (id: string, value: string, evidence: FindingDraft['evidence'], supersedes?: string): FindingDraft => ({
      id,
      section: 'stack',
      key: 'primary_language',
      findingType: 'language',
      value,
      evidence,
      ...(supersedes ? { supersedes } : {}),
    });

    const run = await orchestrator().run(
      [
        phase('discovery', [
          emitting('wa', [language('fa', 'TypeScript', [ev('config_file', 'tsconfig.json'), ev('file_extension', 'src/index.ts')])]),
        ]),
        phase('correction', [emitting('wb', [language('fb', 'JavaScript', [ev('naming', 'src/js-helpers')], 'fa')])], {
          dependsOn: ['discovery'],
        }),
      ],
      corpus
    );

    expect(run.findings.map((f) => f.id)).toEqual(['fa']);
    expect(run.rejections.map((r) => [r.workerId, r.field])).toEqual([['wb', 'finding.supersedes']]);
    expect(run.synthesis.counts.superseded).toBe(0);
    expect(run.synthesis.findingScores.map((s) => s.findingId)).toEqual(['fa']);
  });

  it('shows sequential workers everything committed before them', async () => {
    const seen: number[] = [];
    const reader = (id: string): Worker<Corpus> => ({
      id,
      run: async (context) => {
        seen.push(context.snapshot.findings.length);
        context.record(draft(`fnd_${id}`));
        return { status: 'success' };
      },
    });

    await orchestrator().run(
      [
        phase('discovery', [reader('a'), reader('b')]),
        phase('modeling', [reader('c'), reader('d')], { mode: 'sequential', dependsOn: ['discovery'] }),
      ],
      corpus
    );

    // Parallel workers share the phase-start snapshot; sequential ones see their predecessors.
    expect(seen).toEqual([0, 0, 2, 3]);
  });

  it('marks sequential workers that never started as timed out', async () => {
    const run = await orchestrator().run(
      [phase('modeling', [hanging('first', [draft('fnd_first')]), emitting('second', [draft('fnd_second')])], { mode: 'sequential', timeoutMs: 30 })],
      corpus
    );

    const [first, second] = run.phases[0]?.workers ?? [];
    expect(first?.status).toBe('timed_out');
    expect(second).toEqual({
      workerId: 'second',
      status: 'timed_out',
      findingsContributed: 0,
      durationMs: 0,
      error: { code: 'WORKER_TIMEOUT', message: 'Worker second never started before the modeling deadline' },
    });
    expect(run.findings.map((f) => f.id)).toEqual(['fnd_first']);
    expect(run.phases[0]?.status).toBe('partial');
  });

  it('truncates the remaining phases at the run deadline', async () => {
    const run = await orchestrator(undefined, 40).run(
      [
        phase('discovery', [hanging('stuck', [draft('fnd_partial')])], { timeoutMs: 5_000 }),
        phase('modeling', [emitting('never', [draft('fnd_never')])], { dependsOn: ['discovery'] }),
      ],
      corpus
    );

    expect(run.truncated).toBe(true);
    expect(run.phases.map((p) => p.status)).toEqual(['partial', 'skipped']);
    expect(run.phases[1]?.workers).toEqual([{ workerId: 'never', status: 'pending', findingsContributed: 0, durationMs: 0 }]);
    expect(run.timeout?.code).toBe('RUN_TIMEOUT');
    expect(run.findings.map((f) => f.id)).toEqual(['fnd_partial']);
    expect(run.status).toBe('complete');
  });

  it('orders phases by their dependencies', async () => {
    const order: string[] = [];
    const tracer = (id: string): Worker<Corpus> => ({
      id,
      run: async (context) => {
        order.push(context.phase);
        return { status: 'success' };
      },
    });

    await orchestrator().run(
      [
        phase('report', [tracer('r')], { dependsOn: ['model'] }),
        phase('model', [tracer('m')], { dependsOn: ['scan'] }),
        phase('scan', [tracer('s')]),
        phase('lint', [tracer('l')]),
      ],
      corpus
    );

    expect(order).toEqual(['scan', 'model', 'report', 'lint']);
  });

  it.each([
    ['a cycle', [phase('a', [], { dependsOn: ['b'] }), phase('b', [], { dependsOn: ['a'] })], /dependency cycle among "a", "b"/],
    ['an unknown dependency', [phase('a', [], { dependsOn: ['ghost'] })], /depends on unknown phase "ghost"/],
    ['a duplicate phase', [phase('a', []), phase('a', [])], /duplicate phase "a"/],
    ['a duplicate worker', [phase('a', [emitting('w', [])]), phase('b', [emitting('w', [])])], /duplicate worker "w"/],
    ['a zero timeout', [phase('a', [], { timeoutMs: 0 })], /needs a positive timeoutMs/],
  ])('rejects %s before running anything', async (_label, phases, message) => {
    const onEvent = vi.fn();

    await expect(orchestrator(onEvent).run(phases, corpus)).rejects.toThrow(ConfigurationError);
    await expect(orchestrator(onEvent).run(phases, corpus)).rejects.toThrow(message);
    expect(onEvent).not.toHaveBeenCalled();
  });

  it('emits lifecycle events in order and survives a failing listener', async () => {
    const types: string[] = [];
    const onEvent = (event: RunEvent): void => {
      types.push(event.type);
      throw new Error('listener bug');
    };

    const run = await orchestrator(onEvent).run(
      [phase('discovery', [emitting('w', [draft('fnd_1'), { ...draft('fnd_bad'), evidence: [] }])])],
      corpus
    );

    expect(types).toEqual(['run.started', 'phase.started', 'finding.rejected', 'worker.settled', 'phase.settled', 'run.finalized']);
    expect(run.rejections).toHaveLength(1);
    expect(run.rejections[0]?.field).toBe('finding.evidence');
  });

  it('finalizes into a deep-frozen run', async () => {
    const run = await orchestrator().run(
      [phase('discovery', [emitting('w', [draft('fnd_1', 'runtime', { name: 'node' })])])],
      corpus
    );

    expect(Object.isFrozen(run)).toBe(true);
    expect(Object.isFrozen(run.phases[0])).toBe(true);
    expect(Object.isFrozen(run.synthesis.sections)).toBe(true);
    expect(Object.isFrozen(run.findings[0]?.value)).toBe(true);
  });

  it('reports the run state after finalizing', async () => {
    const instance = orchestrator();
    expect(instance.currentState).toBe('pending');

    await instance.run([phase('discovery', [emitting('w', [draft('fnd_1')])])], corpus);

    expect(instance.currentState).toBe('complete');
  });

  it('refuses a second run while one is in progress and accepts one afterwards', async () => {
    const instance = orchestrator();
    const first = instance.run([phase('discovery', [emitting('w', [draft('fnd_1')])])], corpus);

    expect(instance.currentState).toBe('phase_running');
    await expect(instance.run([phase('other', [])], corpus)).rejects.toThrow(
      'Orchestrator is already running; use a separate instance per concurrent run'
    );

    expect((await first).status).toBe('complete');
    expect((await instance.run([phase('again', [emitting('w2', [draft('fnd_2')])])], corpus)).status).toBe('complete');
  });
});
