/**
 * @fileoverview Config command - Print the effective synthesis configuration
 */

import { parseArgs } from 'node:util';
import YAML from 'yaml';
import { DEFAULT_CONFIG_PATH, loadSynthesisConfig } from '../../config/loader.js';
import { parseCommandArgs } from '../args.js';
import { EXIT_CODES, createError } from '../errors.js';

export interface ConfigCommandOptions {
  args: string[];
}

export async function configCommand(options: ConfigCommandOptions): Promise<number> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        config: { type: 'string', short: 'c' },
      },
      allowPositionals: true,
      strict: true,
    })
  );
  if (positionals.length > 0) {
    throw createError('INVALID_ARGUMENT', `Unexpected argument: ${positionals[0]}. Usage: dna-synth config [--config <file>]`);
  }

  const config = await loadSynthesisConfig({ path: values.config });
  const source = values.config ?? process.env.DNA_SYNTH_CONFIG ?? DEFAULT_CONFIG_PATH;

  process.stdout.write(`# effective configuration (defaults merged with ${source})\n`);
  process.stdout.write(YAML.stringify(config));
  return EXIT_CODES.ok;
}
