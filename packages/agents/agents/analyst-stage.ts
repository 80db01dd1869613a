// Analyst stage: one focused report on the instrument
// Runs inside the analyst fan-out, so it reads nothing but the instrument

import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import type { AnalystFocus } from '../config/desk-roles.js';
import { BaseDeskStage, type DeskStageOptions } from './base-desk-stage.js';

export const REPORT_FIELDS: Record<AnalystFocus, string> = {
  technical: CONTEXT_FIELDS.technicalReport,
  sentiment: CONTEXT_FIELDS.sentimentReport,
  news: CONTEXT_FIELDS.newsReport,
  fundamentals: CONTEXT_FIELDS.fundamentalsReport,
};

export const REPORT_SECTIONS: ReadonlyArray<readonly [string, string]> = [
  ['Technical report', CONTEXT_FIELDS.technicalReport],
  ['Sentiment report', CONTEXT_FIELDS.sentimentReport],
  ['News report', CONTEXT_FIELDS.newsReport],
  ['Fundamentals report', CONTEXT_FIELDS.fundamentalsReport],
];

export class AnalystStage extends BaseDeskStage {
  readonly focus: AnalystFocus;

  constructor(focus: AnalystFocus, options: DeskStageOptions) {
    super(`${focus}-analyst`, {
      reads: [CONTEXT_FIELDS.instrument],
      writes: [REPORT_FIELDS[focus]],
    }, options);
    this.focus = focus;
  }

  protected buildPrompt(view: Context): string {
    return `Instrument: ${String(view[CONTEXT_FIELDS.instrument])}\n`
      + `Write the ${this.focus} report for this instrument.`;
  }

  protected interpret(reply: string): ContextUpdate {
    return { [REPORT_FIELDS[this.focus]]: reply };
  }
}
