// Research synthesizer: condenses the judged debate and the analyst reports into a thesis
// The transcript itself belongs to the judge; the judgement's justification carries the debate forward

import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import { REPORT_SECTIONS } from './analyst-stage.js';
import { BaseDeskStage, type DeskStageOptions } from './base-desk-stage.js';

export class ResearchSynthesizer extends BaseDeskStage {
  constructor(options: DeskStageOptions) {
    super('research-synthesizer', {
      reads: [...REPORT_SECTIONS.map(([, field]) => field), CONTEXT_FIELDS.debateJudgement],
      writes: [CONTEXT_FIELDS.researchSynthesis],
    }, options);
  }

  protected buildPrompt(view: Context): string {
    return this.sections(view, [
      ...REPORT_SECTIONS,
      ['Debate judgement', CONTEXT_FIELDS.debateJudgement],
    ]);
  }

  protected interpret(reply: string): ContextUpdate {
    return { [CONTEXT_FIELDS.researchSynthesis]: reply };
  }
}
