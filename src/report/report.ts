/**
 * @fileoverview Run report builder
 *
 * Flattens a finalized Run into the single read-only document renderers
 * consume. Everything optional becomes an explicit null so the document
 * survives a JSON round trip unchanged.
 */

import type { Finding } from '../evidence/types.js';
import type { Run } from '../orchestrator/types.js';
import { computeCorroboration, isCrossValidated, scoreFinding, supersededIds, type Conflict } from '../synthesis/index.js';
import type { SynthesisConfig } from '../config/schema.js';
import { getDefaultSynthesisConfig } from '../config/loader.js';
import { deepFreeze } from '../utils/canonical.js';
import { REPORT_VERSION, type ReportConflict, type ReportFinding, type RunReport } from './schema.js';

function toReportFinding(finding: Finding, superseded: boolean, config: SynthesisConfig): ReportFinding {
  return {
    id: finding.id,
    workerId: finding.workerId,
    section: finding.section,
    key: finding.key,
    findingType: finding.findingType,
    value: finding.value,
    certaintyClass: finding.certaintyClass,
    certaintyScore: finding.certaintyScore,
    claimedCertainty: finding.claimedCertainty ?? null,
    corroborationScore: finding.corroborationScore,
    weightedScore: scoreFinding(finding),
    crossValidated: isCrossValidated(computeCorroboration(finding.evidence, finding.findingType, config)),
    supersedes: finding.supersedes ?? null,
    superseded,
    evidence: finding.evidence.map((item) => ({ ...item })),
    createdAt: finding.createdAt,
  };
}

function toReportConflict(conflict: Conflict): ReportConflict {
  return {
    section: conflict.section,
    key: conflict.key,
    status: conflict.status,
    reason: conflict.reason,
    resolution: conflict.resolution?.id ?? null,
    competing: conflict.competing.map((finding) => ({
      findingId: finding.id,
      workerId: finding.workerId,
      value: finding.value,
      certaintyClass: finding.certaintyClass,
      corroborationScore: finding.corroborationScore,
      evidenceCount: finding.evidence.length,
    })),
  };
}

/**
 * Build the deep-frozen report for a finalized run. `config` must be the one
 * the run was scored with; it only feeds the cross-validation flag.
 */
export function buildRunReport(run: Run, config: SynthesisConfig = getDefaultSynthesisConfig()): RunReport {
  const superseded = supersededIds(run.findings);
  const { synthesis } = run;

  return deepFreeze({
    reportVersion: REPORT_VERSION,
    runId: run.runId,
    status: run.status,
    truncated: run.truncated,
    startedAt: run.startedAt,
    completedAt: run.completedAt,
    configVersion: run.configVersion,
    overall: {
      base: synthesis.overall.base,
      score: synthesis.overall.score,
      penalties: synthesis.overall.penalties.map((penalty) => ({ ...penalty })),
    },
    sections: synthesis.sections.map((section) => ({ ...section, absenceReasons: [...section.absenceReasons] })),
    conflicts: synthesis.conflicts.map(toReportConflict),
    phases: run.phases.map((phase) => ({
      name: phase.name,
      mode: phase.mode,
      status: phase.status,
      startedAt: phase.startedAt,
      completedAt: phase.completedAt,
      findingsContributed: phase.findingsContributed,
      overallAtBarrier: phase.overallAtBarrier,
      workers: phase.workers.map((worker) => ({
        workerId: worker.workerId,
        status: worker.status,
        findingsContributed: worker.findingsContributed,
        durationMs: worker.durationMs,
        error: worker.error ? { ...worker.error } : null,
      })),
    })),
    findings: run.findings.map((finding) => toReportFinding(finding, superseded.has(finding.id), config)),
    absences: run.absences.map((note) => ({ ...note })),
    rejections: run.rejections.map((rejection) => ({ ...rejection })),
    counts: {
      ...synthesis.counts,
      rejected: run.rejections.length,
      lateDrops: run.lateDrops,
    },
    timeout: run.timeout ? { ...run.timeout } : null,
  });
}
