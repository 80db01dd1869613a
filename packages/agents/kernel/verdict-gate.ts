// Verdict gate: a stage whose verdict field drives the feedback loop.
// How the gate decides is opaque; only the enumerated outcome is consumed.

import { z } from 'zod';
import { CONTEXT_FIELDS } from '../types/context.js';
import type { Verdict } from '../types/decision.js';
import type { Stage } from '../types/stages.js';
import type { ContextStore } from './context-store.js';
import { assertTimeouts } from './composition.js';
import { ContractViolation, StageFailure } from './errors.js';
import type { RunScope } from './run-scope.js';
import { runStage } from './stage-runner.js';

export const verdictSchema = z.object({
  outcome: z.enum(['accept', 'revise']),
  reasons: z.array(z.string()),
});

export function parseVerdict(value: unknown, stage: string): Verdict {
  const parsed = verdictSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'verdict'}: ${i.message}`);
    throw new ContractViolation(`Gate "${stage}" wrote a malformed verdict (${issues.join('; ')})`, [stage]);
  }

  const reasons = parsed.data.reasons.map(r => r.trim()).filter(r => r.length > 0);
  if (parsed.data.outcome === 'revise' && reasons.length === 0) {
    throw new ContractViolation(`Gate "${stage}" returned "revise" without reasons`, [stage]);
  }

  return Object.freeze({ outcome: parsed.data.outcome, reasons: Object.freeze(reasons) });
}

export class VerdictGate {
  constructor(
    readonly stage: Stage,
    readonly field: string = CONTEXT_FIELDS.verdict,
  ) {
    const verdictWrites = stage.writes.filter(w => w === field);
    if (verdictWrites.length !== 1) {
      throw new ContractViolation(
        `Gate "${stage.name}" must declare exactly one "${field}" write`,
        [stage.name],
      );
    }
    assertTimeouts(`Gate "${stage.name}"`, [stage]);
  }

  get name(): string {
    return this.stage.name;
  }

  async evaluate(store: ContextStore, scope: RunScope): Promise<Verdict> {
    const result = await runStage(this.stage, store.snapshot(), scope);
    if (!result.ok) {
      throw new StageFailure(result.failure);
    }
    const verdict = parseVerdict(result.writes[this.field], this.stage.name);
    store.merge(result.writes);
    return verdict;
  }
}
