/**
 * @fileoverview Run report schema
 *
 * The renderer-facing document. Zod validates it wherever a report crosses a
 * process boundary (the archive, `--json` consumers); the TypeScript type is
 * inferred from the same schema.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { CERTAINTY_CLASSES, FINDING_TYPES, SECTION_NAMES } from '../evidence/types.js';
import type { JsonValue } from '../utils/canonical.js';

export const REPORT_VERSION = 1;

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const SectionNameSchema = z.enum(SECTION_NAMES);
const CertaintyClassSchema = z.enum(CERTAINTY_CLASSES);
const score = z.number().min(0).max(1);

const ErrorSummarySchema = z.object({
  code: z.string(),
  message: z.string(),
});

const EvidenceSchema = z.object({
  sourceKind: z.string().min(1),
  weight: z.number().gt(0).lte(1),
  locator: z.string().min(1),
  snippet: z.string(),
  collectedAt: z.string(),
});

// ============================================================================
// REPORT PARTS
// ============================================================================

export const ReportFindingSchema = z.object({
  id: z.string(),
  workerId: z.string(),
  section: SectionNameSchema,
  key: z.string(),
  findingType: z.enum(FINDING_TYPES),
  value: JsonValueSchema,
  certaintyClass: CertaintyClassSchema,
  certaintyScore: score,
  claimedCertainty: CertaintyClassSchema.nullable(),
  corroborationScore: score,
  weightedScore: score,
  crossValidated: z.boolean(),
  supersedes: z.string().nullable(),
  /** Corrected by a later finding; excluded from scoring. */
  superseded: z.boolean(),
  evidence: z.array(EvidenceSchema),
  createdAt: z.string(),
});

export const ReportSectionSchema = z.object({
  section: SectionNameSchema,
  status: z.enum(['scored', 'not_applicable', 'empty']),
  findingsCount: z.number().int().min(0),
  expectedMinCount: z.number().int().min(1),
  coverageFactor: score,
  meanWeightedScore: score,
  unresolvedConflicts: z.number().int().min(0),
  conflictFactor: score,
  sectionConfidence: score,
  weight: score,
  absenceReasons: z.array(z.string()),
});

export const ReportConflictSchema = z.object({
  section: SectionNameSchema,
  key: z.string(),
  status: z.enum(['resolved', 'unresolved']),
  reason: z.enum(['corroboration', 'certainty_class', 'evidence_count', 'tie']),
  resolution: z.string().nullable(),
  competing: z.array(
    z.object({
      findingId: z.string(),
      workerId: z.string(),
      value: JsonValueSchema,
      certaintyClass: CertaintyClassSchema,
      corroborationScore: score,
      evidenceCount: z.number().int().min(0),
    })
  ),
});

export const ReportPhaseSchema = z.object({
  name: z.string(),
  mode: z.enum(['parallel', 'sequential']),
  status: z.enum(['complete', 'partial', 'failed', 'skipped']),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  findingsContributed: z.number().int().min(0),
  overallAtBarrier: score.nullable(),
  workers: z.array(
    z.object({
      workerId: z.string(),
      status: z.enum(['pending', 'running', 'success', 'error', 'timed_out']),
      findingsContributed: z.number().int().min(0),
      durationMs: z.number().min(0),
      error: ErrorSummarySchema.nullable(),
    })
  ),
});

export const RunReportSchema = z.object({
  reportVersion: z.literal(REPORT_VERSION),
  runId: z.string().min(1),
  status: z.enum(['complete', 'failed']),
  truncated: z.boolean(),
  startedAt: z.string(),
  completedAt: z.string(),
  configVersion: z.union([z.number(), z.string()]),
  overall: z.object({
    base: score,
    score,
    penalties: z.array(
      z.object({
        reason: z.enum(['low_section', 'uncertainties', 'unresolved_conflicts']),
        factor: score,
        detail: z.string(),
      })
    ),
  }),
  sections: z.array(ReportSectionSchema),
  conflicts: z.array(ReportConflictSchema),
  phases: z.array(ReportPhaseSchema),
  findings: z.array(ReportFindingSchema),
  absences: z.array(
    z.object({
      section: SectionNameSchema,
      reason: z.string(),
      workerId: z.string(),
      recordedAt: z.string(),
    })
  ),
  rejections: z.array(
    z.object({
      workerId: z.string(),
      phase: z.string(),
      field: z.string(),
      reason: z.string(),
      rejectedAt: z.string(),
    })
  ),
  counts: z.object({
    findings: z.number().int().min(0),
    effective: z.number().int().min(0),
    superseded: z.number().int().min(0),
    uncertain: z.number().int().min(0),
    conflicts: z.number().int().min(0),
    unresolvedConflicts: z.number().int().min(0),
    rejected: z.number().int().min(0),
    lateDrops: z.number().int().min(0),
  }),
  timeout: ErrorSummarySchema.nullable(),
});

export type RunReport = z.infer<typeof RunReportSchema>;
export type ReportFinding = z.infer<typeof ReportFindingSchema>;
export type ReportSection = z.infer<typeof ReportSectionSchema>;
export type ReportConflict = z.infer<typeof ReportConflictSchema>;
export type ReportPhase = z.infer<typeof ReportPhaseSchema>;
