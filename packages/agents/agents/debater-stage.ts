// Debater stage: one turn in a bull/bear or risk debate
// Each turn appends to the transcript; earlier turns are never rewritten

import { CONTEXT_FIELDS, type Context, type ContextUpdate, type DebateEntry } from '../types/context.js';
import type { DeskRole, ResearchSide, RiskStance } from '../config/desk-roles.js';
import { BaseDeskStage, isDebateRecord, type DeskStageOptions } from './base-desk-stage.js';
import { REPORT_SECTIONS } from './analyst-stage.js';

export type DebaterRole = `${ResearchSide}-researcher` | `${RiskStance}-risk-analyst`;

export interface DebaterOptions extends DeskStageOptions {
  /** True for the first turn of a debate, where no transcript exists yet */
  opening?: boolean;
}

const INVESTMENT_DEBATERS: ReadonlySet<DeskRole> = new Set(['bull-researcher', 'bear-researcher']);

export class DebaterStage extends BaseDeskStage {
  private readonly transcriptField: string;

  constructor(role: DebaterRole, options: DebaterOptions) {
    const investment = INVESTMENT_DEBATERS.has(role);
    const transcriptField = investment ? CONTEXT_FIELDS.debateTranscript : CONTEXT_FIELDS.riskTranscript;
    const reads = [CONTEXT_FIELDS.instrument, ...REPORT_SECTIONS.map(([, field]) => field)];
    if (!investment) reads.push(CONTEXT_FIELDS.researchSynthesis);

    // The opening turn may see no transcript; every later turn requires it
    super(role, {
      reads: options.opening ? reads : [...reads, transcriptField],
      optionalReads: options.opening ? [transcriptField] : [],
      writes: [transcriptField],
    }, options);
    this.transcriptField = transcriptField;
  }

  protected buildPrompt(view: Context): string {
    const material = this.sections(view, [
      ...REPORT_SECTIONS,
      ['Research synthesis', CONTEXT_FIELDS.researchSynthesis],
    ]);
    const transcript = this.sections(view, [['Debate so far', this.transcriptField]]);
    return [
      `Instrument: ${String(view[CONTEXT_FIELDS.instrument])}`,
      material,
      transcript || 'You open the debate.',
      'Give your argument.',
    ].join('\n\n');
  }

  protected interpret(reply: string, view: Context): ContextUpdate {
    const previous = view[this.transcriptField];
    const transcript = isDebateRecord(previous) ? previous : [];
    const entry: DebateEntry = Object.freeze({ role: this.role, argument: reply });
    return { [this.transcriptField]: Object.freeze([...transcript, entry]) };
  }
}
