// Risk synthesizer: one risk assessment out of the three risk stances

import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import { BaseDeskStage, type DeskStageOptions } from './base-desk-stage.js';

export class RiskSynthesizer extends BaseDeskStage {
  constructor(options: DeskStageOptions) {
    super('risk-synthesizer', {
      reads: [CONTEXT_FIELDS.riskTranscript],
      writes: [CONTEXT_FIELDS.riskAssessment],
    }, options);
  }

  protected buildPrompt(view: Context): string {
    return this.sections(view, [['Risk debate', CONTEXT_FIELDS.riskTranscript]]);
  }

  protected interpret(reply: string): ContextUpdate {
    return { [CONTEXT_FIELDS.riskAssessment]: reply };
  }
}
