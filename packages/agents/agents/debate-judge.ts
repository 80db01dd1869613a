// Debate judge: picks the more convincing side of the bull/bear debate

import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import { parseJudgeVerdict } from '../utils/reply-parser.js';
import { BaseDeskStage, type DeskStageOptions } from './base-desk-stage.js';

export class DebateJudge extends BaseDeskStage {
  constructor(options: DeskStageOptions) {
    super('debate-judge', {
      reads: [CONTEXT_FIELDS.debateTranscript],
      writes: [CONTEXT_FIELDS.debateJudgement],
    }, options);
  }

  protected buildPrompt(view: Context): string {
    return this.sections(view, [['Debate transcript', CONTEXT_FIELDS.debateTranscript]])
      + '\n\nWhich side won?';
  }

  protected interpret(reply: string): ContextUpdate {
    return { [CONTEXT_FIELDS.debateJudgement]: Object.freeze(parseJudgeVerdict(reply)) };
  }
}
