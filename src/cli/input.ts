/**
 * @fileoverview Captured worker output files
 *
 * `dna-synth synthesize` replays workers from JSON files, one per worker. A
 * file is what a worker returned, plus where in the phase graph it ran.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { z } from 'zod';
import { formatIssues } from '../config/loader.js';
import type { Phase, PhaseMode, Worker } from '../orchestrator/types.js';
import { JsonValueSchema } from '../report/schema.js';
import { getErrorMessage } from '../utils/errors.js';
import { safeJsonParse } from '../utils/safe_json.js';
import { createError } from './errors.js';

export const DEFAULT_PHASE = 'default';

const EvidenceFileSchema = z.object({
  sourceKind: z.string(),
  weight: z.number().optional(),
  locator: z.string(),
  snippet: z.string().optional(),
  collectedAt: z.string().optional(),
});

const FindingFileSchema = z.object({
  id: z.string().optional(),
  section: z.string(),
  key: z.string(),
  findingType: z.string().optional(),
  value: JsonValueSchema,
  certaintyClass: z.string().optional(),
  evidence: z.array(EvidenceFileSchema).default([]),
  supersedes: z.string().optional(),
  createdAt: z.string().optional(),
});

export const WorkerOutputFileSchema = z.object({
  workerId: z.string().min(1),
  phase: z.string().min(1).default(DEFAULT_PHASE),
  mode: z.enum(['parallel', 'sequential']).default('parallel'),
  status: z.enum(['success', 'error']).default('success'),
  error: z.string().optional(),
  findings: z.array(FindingFileSchema).default([]),
  absences: z.array(z.object({ section: z.string(), reason: z.string() })).default([]),
});

export type WorkerOutputFile = z.infer<typeof WorkerOutputFileSchema>;

export interface CapturedOutput {
  readonly file: string;
  readonly output: WorkerOutputFile;
}

/**
 * Expand the patterns and parse every matched file, sorted by path.
 *
 * @throws CliError NO_INPUT when nothing matches, INPUT_INVALID on the first bad file
 */
export async function loadWorkerOutputs(patterns: readonly string[], cwd = process.cwd()): Promise<CapturedOutput[]> {
  const matches = await glob([...patterns], { cwd, nodir: true, absolute: true });
  const files = [...new Set(matches)].sort();
  if (files.length === 0) {
    throw createError('NO_INPUT', `No files match ${patterns.join(', ')}`, { patterns: [...patterns] });
  }

  const outputs: CapturedOutput[] = [];
  for (const file of files) {
    outputs.push({ file, output: await readWorkerOutput(file, cwd) });
  }
  return outputs;
}

async function readWorkerOutput(file: string, cwd: string): Promise<WorkerOutputFile> {
  const label = path.relative(cwd, file) || file;
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw createError('INPUT_INVALID', `${label}: ${getErrorMessage(error)}`);
  }

  const json = safeJsonParse(text);
  if (!json.ok) {
    throw createError('INPUT_INVALID', `${label}: not valid JSON (${json.error.message})`);
  }
  const parsed = WorkerOutputFileSchema.safeParse(json.value);
  if (!parsed.success) {
    throw createError('INPUT_INVALID', `${label}: ${formatIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Turn captured outputs back into phases. Phases appear in the order their
 * first file was seen; each phase takes the mode of that first file.
 *
 * @throws CliError INPUT_INVALID when two files claim the same worker id
 */
export function buildReplayPhases(outputs: readonly CapturedOutput[], timeoutMs: number): Phase<null>[] {
  const phases = new Map<string, { mode: PhaseMode; workers: Worker<null>[] }>();
  const seen = new Set<string>();

  for (const { file, output } of outputs) {
    if (seen.has(output.workerId)) {
      throw createError('INPUT_INVALID', `${file}: worker ${output.workerId} appears in more than one file`);
    }
    seen.add(output.workerId);

    let phase = phases.get(output.phase);
    if (!phase) {
      phase = { mode: output.mode, workers: [] };
      phases.set(output.phase, phase);
    }
    phase.workers.push(replayWorker(output));
  }

  return [...phases].map(([name, phase]) => ({ name, mode: phase.mode, workers: phase.workers, timeoutMs }));
}

function replayWorker(output: WorkerOutputFile): Worker<null> {
  return {
    id: output.workerId,
    run: async () => ({
      status: output.status,
      findings: output.findings,
      absences: output.absences,
      error: output.error,
    }),
  };
}
