/**
 * @fileoverview Synthesis configuration schema
 *
 * The weight, threshold and expectation tables behind every score. Nothing
 * numeric is hardcoded in the synthesis functions; they read this shape.
 */

import { z } from 'zod';
import { SECTION_NAMES, type FindingType, type SectionName } from '../evidence/types.js';

const WEIGHT_SUM_TOLERANCE = 1e-6;

const unitWeight = z.number().gt(0).lte(1);
const factor = z.number().gt(0).lte(1);

const findingTypeRuleSchema = z.object({
  maxPossible: z.number().positive(),
});

const sectionRuleSchema = z.object({
  expectedMinCount: z.number().int().min(1),
  weight: z.number().min(0).max(1),
});

export const synthesisConfigSchema = z
  .object({
    version: z.union([z.number(), z.string()]),
    sourceKinds: z.record(z.string().min(1), unitWeight).refine((kinds) => Object.keys(kinds).length > 0, {
      message: 'at least one source kind is required',
    }),
    findingTypes: z
      .object({
        language: findingTypeRuleSchema,
        framework: findingTypeRuleSchema,
        entity: findingTypeRuleSchema,
        relationship: findingTypeRuleSchema,
        general: findingTypeRuleSchema,
      })
      .strict(),
    certaintyBands: z
      .object({
        certain: z.number().gt(0).lte(1),
        inferred: z.number().gt(0).lte(1),
        speculated: z.number().gt(0).lte(1),
      })
      .refine((bands) => bands.certain > bands.inferred && bands.inferred > bands.speculated, {
        message: 'bands must satisfy certain > inferred > speculated',
      }),
    sections: z
      .object({
        identity: sectionRuleSchema,
        'domain-model': sectionRuleSchema,
        capabilities: sectionRuleSchema,
        stack: sectionRuleSchema,
        conventions: sectionRuleSchema,
        constraints: sectionRuleSchema,
        operations: sectionRuleSchema,
      })
      .strict(),
    penalties: z.object({
      lowSection: z.object({ threshold: z.number().min(0).max(1), factor }),
      uncertainties: z.object({ maxCount: z.number().int().min(0), factor }),
      unresolvedConflicts: z.object({ maxCount: z.number().int().min(0), factor }),
      sectionConflictFactor: factor,
    }),
  })
  .superRefine((config, ctx) => {
    const total = SECTION_NAMES.reduce((sum, name) => sum + config.sections[name].weight, 0);
    if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sections'],
        message: `section weights must sum to 1 (got ${total.toFixed(6)})`,
      });
    }
  });

export type SynthesisConfig = z.infer<typeof synthesisConfigSchema>;

// ============================================================================
// TYPE-LEVEL INVARIANTS (COMPILE-TIME)
// ============================================================================

type FindingTypesCovered = Exclude<FindingType, keyof SynthesisConfig['findingTypes']> extends never ? true : false;
const _findingTypesCovered: FindingTypesCovered = true;

type SectionsCovered = Exclude<SectionName, keyof SynthesisConfig['sections']> extends never ? true : false;
const _sectionsCovered: SectionsCovered = true;

export interface FindingTypeRule {
  maxPossible: number;
}

export interface SectionRule {
  expectedMinCount: number;
  weight: number;
}

export function findingTypeRule(config: SynthesisConfig, type: FindingType): FindingTypeRule {
  return config.findingTypes[type];
}

export function sectionRule(config: SynthesisConfig, section: SectionName): SectionRule {
  return config.sections[section];
}
