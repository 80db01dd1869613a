// Trader: turns the research and risk view into a BUY/HOLD/SELL draft
// Re-run by the feedback controller with the previous critique in view

import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import type { DecisionDraft } from '../types/decision.js';
import { parseConfidence, parseTradeAction } from '../utils/reply-parser.js';
import { BaseDeskStage, type DeskStageOptions } from './base-desk-stage.js';
import { REPORT_SECTIONS } from './analyst-stage.js';

export class TraderStage extends BaseDeskStage {
  constructor(options: DeskStageOptions) {
    super('trader', {
      reads: [
        CONTEXT_FIELDS.instrument,
        ...REPORT_SECTIONS.map(([, field]) => field),
        CONTEXT_FIELDS.researchSynthesis,
        CONTEXT_FIELDS.riskAssessment,
      ],
      optionalReads: [CONTEXT_FIELDS.priorCritique],
      writes: [CONTEXT_FIELDS.decision],
    }, options);
  }

  protected buildPrompt(view: Context): string {
    const parts = [
      `Instrument: ${String(view[CONTEXT_FIELDS.instrument])}`,
      this.sections(view, [
        ...REPORT_SECTIONS,
        ['Research synthesis', CONTEXT_FIELDS.researchSynthesis],
        ['Risk assessment', CONTEXT_FIELDS.riskAssessment],
      ]),
    ];

    const critique = view[CONTEXT_FIELDS.priorCritique];
    if (critique !== undefined) {
      parts.push(
        this.sections(view, [['Critique of your previous recommendation', CONTEXT_FIELDS.priorCritique]]),
        'Address every point of the critique and rely only on the material above.',
      );
    }
    parts.push('Give your recommendation.');
    return parts.join('\n\n');
  }

  protected interpret(reply: string): ContextUpdate {
    const action = parseTradeAction(reply);
    if (!action) {
      throw new Error(`${this.name}: reply contains no BUY, HOLD or SELL recommendation`);
    }
    const draft: DecisionDraft = { action, rationale: reply, confidence: parseConfidence(reply) };
    return { [CONTEXT_FIELDS.decision]: Object.freeze(draft) };
  }
}
