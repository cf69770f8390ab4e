#!/usr/bin/env node
/**
 * @fileoverview dna-synth CLI
 *
 * Commands:
 *   dna-synth synthesize <pattern...> - Replay captured worker outputs into a report
 *   dna-synth config                  - Print the effective configuration
 *   dna-synth history --store <db>    - List archived run reports
 *
 * @packageDocumentation
 */

import { formatError } from './errors.js';
import { runCli } from './main.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
