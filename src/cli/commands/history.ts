/**
 * @fileoverview History command - List archived run reports
 */

import { parseArgs } from 'node:util';
import type { RunStatus } from '../../orchestrator/types.js';
import { createReportStore } from '../../storage/report_store.js';
import { parseCommandArgs, parsePositiveInt } from '../args.js';
import { EXIT_CODES, createError } from '../errors.js';
import { printTable } from '../progress.js';

function isRunStatus(value: string): value is RunStatus {
  return value === 'complete' || value === 'failed';
}

export interface HistoryCommandOptions {
  args: string[];
}

export async function historyCommand(options: HistoryCommandOptions): Promise<number> {
  const { values } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        store: { type: 'string' },
        limit: { type: 'string' },
        status: { type: 'string' },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: false,
      strict: true,
    })
  );

  if (!values.store) {
    throw createError('INVALID_ARGUMENT', '--store is required. Usage: dna-synth history --store <db> [--limit n]');
  }
  const limit = parsePositiveInt(values.limit, '--limit');
  const status = values.status;
  if (status !== undefined && !isRunStatus(status)) {
    throw createError('INVALID_ARGUMENT', `--status must be complete or failed, got "${status}"`);
  }

  const store = await createReportStore(values.store);
  try {
    const summaries = await store.list({ limit, status });

    if (values.json) {
      console.log(JSON.stringify(summaries, null, 2));
    } else if (summaries.length === 0) {
      console.log('No archived runs.');
    } else {
      printTable(
        ['Run', 'Status', 'Overall', 'Findings', 'Unresolved', 'Completed'],
        summaries.map((summary) => [
          summary.runId,
          summary.truncated ? `${summary.status}*` : summary.status,
          summary.overallScore.toFixed(3),
          String(summary.findings),
          String(summary.unresolvedConflicts),
          summary.completedAt,
        ])
      );
      if (summaries.some((summary) => summary.truncated)) {
        console.log('\n* truncated by the run deadline');
      }
    }
  } finally {
    await store.close();
  }
  return EXIT_CODES.ok;
}
