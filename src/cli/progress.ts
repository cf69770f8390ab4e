/**
 * @fileoverview Progress indicators for CLI operations
 *
 * The bar writes to stderr so that `--json` output on stdout stays clean.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  /** Defaults to whether stderr is a terminal. */
  enabled?: boolean;
}

/**
 * Create a progress bar, or a no-op handle when output is not interactive.
 */
export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const enabled = options.enabled ?? Boolean(process.stderr.isTTY);
  if (!enabled || options.total === 0) {
    return { increment: () => undefined, stop: () => undefined };
  }

  const format = options.format || '{bar} {percentage}% | {value}/{total} workers | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0, { task: 'starting' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },
    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Print a simple table
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine.trimEnd());
  console.log(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ');
    console.log(line.trimEnd());
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
