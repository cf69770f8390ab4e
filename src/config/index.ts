/**
 * @fileoverview Synthesis configuration
 *
 * - `schema`: zod schema and derived `SynthesisConfig` type
 * - `loader`: YAML loading, merging and validation
 */

export {
  synthesisConfigSchema,
  findingTypeRule,
  sectionRule,
  type SynthesisConfig,
  type FindingTypeRule,
  type SectionRule,
} from './schema.js';

export {
  getDefaultSynthesisConfig,
  loadSynthesisConfig,
  validateSynthesisConfig,
  deepMerge,
  formatIssues,
  DEFAULT_CONFIG_PATH,
  CONFIG_PATH_ENV,
  type LoadConfigOptions,
  type ConfigOverrides,
} from './loader.js';
