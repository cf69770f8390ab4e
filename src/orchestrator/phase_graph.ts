/**
 * @fileoverview Phase ordering
 *
 * Phases run in topological order over `dependsOn`. Among phases that are
 * ready at the same time, declaration order wins, so a graph without
 * dependencies runs exactly as declared.
 */

import { ConfigurationError } from '../core/errors.js';
import type { Phase, PhaseMode } from './types.js';

const MODES: readonly PhaseMode[] = ['parallel', 'sequential'];

/**
 * Validate a phase list and return it in execution order.
 *
 * @throws ConfigurationError for duplicate phase names or worker ids,
 *   unknown dependencies, cycles, unknown modes or non-positive timeouts
 */
export function orderPhases<TPhase extends Phase<unknown>>(phases: readonly TPhase[]): TPhase[] {
  const issues: string[] = [];
  const byName = new Map<string, number>();
  const workerIds = new Set<string>();

  phases.forEach((phase, index) => {
    if (byName.has(phase.name)) issues.push(`duplicate phase "${phase.name}"`);
    byName.set(phase.name, index);
    if (!MODES.includes(phase.mode)) issues.push(`phase "${phase.name}" has unknown mode "${String(phase.mode)}"`);
    if (!(phase.timeoutMs > 0)) issues.push(`phase "${phase.name}" needs a positive timeoutMs`);
    for (const worker of phase.workers) {
      if (workerIds.has(worker.id)) issues.push(`duplicate worker "${worker.id}"`);
      workerIds.add(worker.id);
    }
  });

  for (const phase of phases) {
    for (const dep of phase.dependsOn ?? []) {
      if (!byName.has(dep)) issues.push(`phase "${phase.name}" depends on unknown phase "${dep}"`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid phase graph', issues);
  }

  const ordered: TPhase[] = [];
  const done = new Set<string>();
  const pending = [...phases];
  while (pending.length > 0) {
    const next = pending.findIndex((phase) => (phase.dependsOn ?? []).every((dep) => done.has(dep)));
    if (next === -1) {
      throw new ConfigurationError('Invalid phase graph', [
        `dependency cycle among ${pending.map((phase) => `"${phase.name}"`).join(', ')}`,
      ]);
    }
    const [phase] = pending.splice(next, 1);
    if (!phase) break;
    ordered.push(phase);
    done.add(phase.name);
  }
  return ordered;
}
