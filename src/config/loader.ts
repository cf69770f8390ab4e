/**
 * @fileoverview Synthesis configuration loading
 *
 * Resolution order: explicit path, then `DNA_SYNTH_CONFIG`, then the bundled
 * `config/synthesis.yaml`. A user file only needs the keys it changes; it is
 * deep-merged over the bundled defaults before validation.
 */

import { readFileSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { deepFreeze } from '../utils/canonical.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { synthesisConfigSchema, type SynthesisConfig } from './schema.js';

/** Same relative depth from src/config and dist/config. */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/synthesis.yaml', import.meta.url));

export const CONFIG_PATH_ENV = 'DNA_SYNTH_CONFIG';

export interface LoadConfigOptions {
  path?: string;
  /** Applied last, over both the defaults and the file. */
  overrides?: ConfigOverrides;
}

export type ConfigOverrides = { [key: string]: unknown };

let cachedDefault: SynthesisConfig | null = null;

/**
 * The bundled defaults, parsed once and frozen.
 */
export function getDefaultSynthesisConfig(): SynthesisConfig {
  if (!cachedDefault) {
    const raw = parseYaml(readFileSync(DEFAULT_CONFIG_PATH, 'utf8'), DEFAULT_CONFIG_PATH);
    cachedDefault = deepFreeze(validateSynthesisConfig(raw, DEFAULT_CONFIG_PATH));
  }
  return cachedDefault;
}

export async function loadSynthesisConfig(options: LoadConfigOptions = {}): Promise<SynthesisConfig> {
  const defaults = getDefaultSynthesisConfig();
  const filePath = options.path ?? process.env[CONFIG_PATH_ENV];

  let merged: unknown = defaults;
  if (filePath && filePath !== DEFAULT_CONFIG_PATH) {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read configuration file ${filePath}`, [getErrorMessage(error)]);
    }
    merged = deepMerge(defaults, parseYaml(text, filePath));
    logDebug('Loaded synthesis configuration override', { path: filePath });
  }
  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return deepFreeze(validateSynthesisConfig(merged, filePath ?? 'overrides'));
}

/**
 * Validate an already-parsed configuration object.
 */
export function validateSynthesisConfig(raw: unknown, source = 'configuration'): SynthesisConfig {
  const parsed = synthesisConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid synthesis configuration in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function parseYaml(text: string, source: string): unknown {
  try {
    return YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse YAML in ${source}`, [getErrorMessage(error)]);
  }
}

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Objects merge key by key; everything else (numbers, arrays) replaces.
 */
export function deepMerge(base: unknown, patch: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch === undefined ? base : patch;
  }
  const result: { [key: string]: unknown } = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}
