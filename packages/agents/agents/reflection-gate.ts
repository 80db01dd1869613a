// Reflection gate: checks the trader's draft against the reports it claims to rest on
// The oracle can be wrong in both directions; the controller bounds how often it is asked

import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import { parseReflection } from '../utils/reply-parser.js';
import { BaseDeskStage, type DeskStageOptions } from './base-desk-stage.js';
import { REPORT_SECTIONS } from './analyst-stage.js';

export class ReflectionGate extends BaseDeskStage {
  constructor(options: DeskStageOptions) {
    super('reflection-gate', {
      reads: [
        ...REPORT_SECTIONS.map(([, field]) => field),
        CONTEXT_FIELDS.researchSynthesis,
        CONTEXT_FIELDS.riskAssessment,
        CONTEXT_FIELDS.decision,
      ],
      writes: [CONTEXT_FIELDS.verdict],
    }, options);
  }

  protected buildPrompt(view: Context): string {
    return this.sections(view, [
      ...REPORT_SECTIONS,
      ['Research synthesis', CONTEXT_FIELDS.researchSynthesis],
      ['Risk assessment', CONTEXT_FIELDS.riskAssessment],
      ['Recommendation under review', CONTEXT_FIELDS.decision],
    ]);
  }

  protected interpret(reply: string): ContextUpdate {
    return { [CONTEXT_FIELDS.verdict]: parseReflection(reply) };
  }
}
