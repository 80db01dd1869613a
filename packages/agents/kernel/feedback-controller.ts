// Feedback controller: running -> accepted | exhausted, never unbounded.
// Only an explicit "revise" re-runs the subsequence; stage errors propagate.

import { z } from 'zod';
import { CONTEXT_FIELDS, type Context, type PriorCritique } from '../types/context.js';
import type { ControllerState, RetryState, Verdict } from '../types/decision.js';
import type { ContextStore } from './context-store.js';
import { ConfigurationError, ContractViolation } from './errors.js';
import { emit, type RunScope } from './run-scope.js';
import type { StageChain } from './stage-chain.js';
import type { VerdictGate } from './verdict-gate.js';

export const maxAttemptsSchema = z.number().int().positive();

export interface FeedbackOutcome {
  readonly state: Exclude<ControllerState, 'running'>;
  readonly retry: RetryState;
  readonly context: Context;
}

export class FeedbackController {
  readonly maxAttempts: number;

  constructor(
    private readonly subsequence: StageChain,
    private readonly gate: VerdictGate,
    maxAttempts: number,
    private readonly critiqueField: string = CONTEXT_FIELDS.priorCritique,
  ) {
    if (!maxAttemptsSchema.safeParse(maxAttempts).success) {
      throw new ConfigurationError(`maxAttempts must be a positive integer, got ${String(maxAttempts)}`);
    }
    const writers = [...subsequence.writes, ...gate.stage.writes];
    if (writers.includes(critiqueField)) {
      throw new ContractViolation(`"${critiqueField}" is owned by the feedback controller`);
    }
    this.maxAttempts = maxAttempts;
  }

  async run(store: ContextStore, scope: RunScope): Promise<FeedbackOutcome> {
    const history: Verdict[] = [];

    for (let attempt = 1; ; attempt++) {
      await this.subsequence.run(store, scope);
      const verdict = await this.gate.evaluate(store, scope);
      history.push(verdict);

      emit(scope, 'VerdictIssued', {
        gate: this.gate.name,
        attempt,
        maxAttempts: this.maxAttempts,
        outcome: verdict.outcome,
        reasons: verdict.reasons,
      });

      if (verdict.outcome === 'accept') {
        return this.finish('accepted', attempt, history, store);
      }
      if (attempt >= this.maxAttempts) {
        scope.logger.warn('Revision budget exhausted', { attempt, reasons: verdict.reasons });
        return this.finish('exhausted', attempt, history, store);
      }

      const critique: PriorCritique = Object.freeze({ attempt, reasons: verdict.reasons });
      store.merge({ [this.critiqueField]: critique });
      emit(scope, 'RevisionRequested', { attempt, nextAttempt: attempt + 1, reasons: verdict.reasons });
      scope.logger.info('Revision requested', { attempt, reasons: verdict.reasons });
    }
  }

  private finish(
    state: FeedbackOutcome['state'],
    attempt: number,
    history: Verdict[],
    store: ContextStore,
  ): FeedbackOutcome {
    return Object.freeze({
      state,
      retry: Object.freeze({ attempt, maxAttempts: this.maxAttempts, history: Object.freeze([...history]) }),
      context: store.snapshot(),
    });
  }
}
