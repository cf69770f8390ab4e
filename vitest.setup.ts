/**
 * Shared Vitest setup.
 *
 * Logging goes to stderr and would bury test output; keep it quiet unless a
 * run explicitly asks for a level.
 */

if (!process.env.DNA_SYNTH_LOG_LEVEL) {
  process.env.DNA_SYNTH_LOG_LEVEL = 'silent';
}
