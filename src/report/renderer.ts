/**
 * @fileoverview Renderer contract
 *
 * Human-facing formatting lives outside the engine. A renderer receives the
 * frozen report and returns whatever its medium needs.
 */

import type { RunReport } from './schema.js';

export interface ReportRenderer<T> {
  readonly format: string;
  render(report: RunReport): T;
}

export interface JsonRendererOptions {
  /** Spaces of indentation; 0 for a single line. */
  indent?: number;
}

export class JsonReportRenderer implements ReportRenderer<string> {
  readonly format = 'json';

  constructor(private readonly options: JsonRendererOptions = {}) {}

  render(report: RunReport): string {
    const indent = this.options.indent ?? 2;
    return JSON.stringify(report, null, indent > 0 ? indent : undefined);
  }
}
