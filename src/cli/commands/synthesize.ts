/**
 * @fileoverview Synthesize command - Replay captured worker outputs into a report
 */

import { parseArgs } from 'node:util';
import { loadSynthesisConfig } from '../../config/loader.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import { buildRunReport } from '../../report/report.js';
import { JsonReportRenderer } from '../../report/renderer.js';
import type { RunReport } from '../../report/schema.js';
import { createReportStore } from '../../storage/report_store.js';
import { parseCommandArgs, parsePositiveInt } from '../args.js';
import { EXIT_CODES, createError } from '../errors.js';
import { buildReplayPhases, loadWorkerOutputs } from '../input.js';
import { createProgressBar, printKeyValue, printTable } from '../progress.js';

/** Per-phase budget when --timeout is not given. Replayed workers settle at once. */
export const DEFAULT_PHASE_TIMEOUT_MS = 30_000;

export interface SynthesizeCommandOptions {
  args: string[];
  /** Base directory for the input patterns. */
  cwd?: string;
}

/**
 * @returns the process exit code: 1 when the run itself failed
 */
export async function synthesizeCommand(options: SynthesizeCommandOptions): Promise<number> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        config: { type: 'string', short: 'c' },
        json: { type: 'boolean', default: false },
        store: { type: 'string' },
        timeout: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  if (positionals.length === 0) {
    throw createError(
      'INVALID_ARGUMENT',
      'At least one input pattern is required. Usage: dna-synth synthesize <pattern...>'
    );
  }
  const timeoutMs = parsePositiveInt(values.timeout, '--timeout');

  const config = await loadSynthesisConfig({ path: values.config });
  const outputs = await loadWorkerOutputs(positionals, options.cwd);
  const phases = buildReplayPhases(outputs, timeoutMs ?? DEFAULT_PHASE_TIMEOUT_MS);

  const progress = createProgressBar({ total: outputs.length, enabled: values.json ? false : undefined });
  const orchestrator = new Orchestrator({
    config,
    runTimeoutMs: timeoutMs,
    onEvent: (event) => {
      if (event.type === 'worker.settled') {
        progress.increment(1, { task: event.outcome.workerId });
      }
    },
  });

  let report: RunReport;
  try {
    report = buildRunReport(await orchestrator.run(phases, null), config);
  } finally {
    progress.stop();
  }

  let archived: boolean | null = null;
  if (values.store) {
    const store = await createReportStore(values.store);
    try {
      archived = await store.save(report);
    } finally {
      await store.close();
    }
  }

  if (values.json) {
    console.log(new JsonReportRenderer().render(report));
  } else {
    printSummary(report, archived);
  }

  return report.status === 'failed' ? EXIT_CODES.failure : EXIT_CODES.ok;
}

function printSummary(report: RunReport, archived: boolean | null): void {
  console.log(`\nRun ${report.runId}\n`);
  printKeyValue([
    { key: 'Status', value: report.truncated ? `${report.status} (truncated)` : report.status },
    { key: 'Overall', value: `${report.overall.score.toFixed(3)} (base ${report.overall.base.toFixed(3)})` },
    {
      key: 'Findings',
      value: `${report.counts.findings} (${report.counts.effective} effective, ${report.counts.superseded} superseded)`,
    },
    { key: 'Conflicts', value: `${report.counts.conflicts} (${report.counts.unresolvedConflicts} unresolved)` },
    { key: 'Rejected', value: report.counts.rejected },
  ]);

  console.log('\nSections:');
  printTable(
    ['Section', 'Status', 'Findings', 'Confidence'],
    report.sections.map((section) => [
      section.section,
      section.status,
      String(section.findingsCount),
      section.sectionConfidence.toFixed(3),
    ])
  );

  console.log('\nPhases:');
  printTable(
    ['Phase', 'Mode', 'Status', 'Workers', 'Findings'],
    report.phases.map((phase) => [
      phase.name,
      phase.mode,
      phase.status,
      String(phase.workers.length),
      String(phase.findingsContributed),
    ])
  );

  const failures = report.phases.flatMap((phase) =>
    phase.workers.flatMap((worker) => (worker.error ? [`  ${worker.workerId}: [${worker.error.code}] ${worker.error.message}`] : []))
  );
  if (failures.length > 0) {
    console.log('\nWorker errors:');
    for (const line of failures) console.log(line);
  }

  if (report.overall.penalties.length > 0) {
    console.log('\nPenalties:');
    for (const penalty of report.overall.penalties) {
      console.log(`  x${penalty.factor} ${penalty.reason}: ${penalty.detail}`);
    }
  }

  if (archived !== null) {
    console.log(archived ? '\nReport archived.' : '\nReport already archived; kept the stored copy.');
  }
}
