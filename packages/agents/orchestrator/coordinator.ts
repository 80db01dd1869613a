// Pipeline driver: analysts fan out, deliberation runs in order,
// then the trader is re-run under the verdict gate until accepted or out of attempts

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { CONTEXT_FIELDS, type Context, type ContextUpdate } from '../types/context.js';
import { TRADE_ACTIONS, type FinalDecision, type RetryState } from '../types/decision.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus, type DomainEvent, type EventBus } from '../types/events.js';
import type { Stage } from '../types/stages.js';
import { ContextStore } from '../kernel/context-store.js';
import { FanOutGroup } from '../kernel/fan-out-group.js';
import { StageChain } from '../kernel/stage-chain.js';
import { VerdictGate } from '../kernel/verdict-gate.js';
import { FeedbackController } from '../kernel/feedback-controller.js';
import { MAX_TIMEOUT_MS, assertUniqueNames } from '../kernel/composition.js';
import { emit, type RunScope } from '../kernel/run-scope.js';
import {
  ConfigurationError, ContractViolation, PipelineError, type PipelinePhase,
} from '../kernel/errors.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_STAGE_TIMEOUT_MS = 120_000;

export interface PipelineConfig {
  /** Independent analysts, run concurrently */
  analysts: readonly Stage[];
  /** Debate, judge, synthesis and risk stages, run in declaration order */
  chain: readonly Stage[];
  /** Writes the decision draft; re-run on every revise verdict */
  trader: Stage;
  /** Writes the verdict that accepts or revises the trader's draft */
  verdictGate: Stage;
  maxAttempts?: number;
  stageTimeoutMs?: number;
  logger?: Logger;
  onEvent?: (event: { type: string; runId: string; payload: unknown }) => void;
}

const settingsSchema = z.object({
  maxAttempts: z.number().int().positive(),
  stageTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
});

export const decisionDraftSchema = z.object({
  action: z.enum(TRADE_ACTIONS),
  rationale: z.string(),
  confidence: z.number().min(0).max(1),
});

export type RunResult =
  | { readonly ok: true; readonly decision: FinalDecision; readonly retry: RetryState; readonly context: Context }
  | { readonly ok: false; readonly error: PipelineError };

export interface PipelineRunner {
  run(instrumentId: string, initialContext?: ContextUpdate): Promise<RunResult>;
}

export class TradingPipeline implements PipelineRunner {
  private readonly analysts: FanOutGroup;
  private readonly deliberation: StageChain;
  private readonly controller: FeedbackController;
  private readonly stageTimeoutMs: number;
  private readonly traderName: string;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;

  constructor(config: PipelineConfig) {
    const settings = settingsSchema.safeParse({
      maxAttempts: config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      stageTimeoutMs: config.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS,
    });
    if (!settings.success) {
      const issues = settings.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError(`Invalid pipeline settings (${issues.join('; ')})`);
    }

    assertUniqueNames('Pipeline', [...config.analysts, ...config.chain, config.trader, config.verdictGate]);
    if (!config.trader.writes.includes(CONTEXT_FIELDS.decision)) {
      throw new ContractViolation(
        `Trader "${config.trader.name}" must declare a "${CONTEXT_FIELDS.decision}" write`,
        [config.trader.name],
      );
    }

    this.logger = config.logger ?? createLogger('Pipeline');
    this.analysts = new FanOutGroup('analysts', config.analysts);
    this.deliberation = new StageChain('deliberation', config.chain);
    this.controller = new FeedbackController(
      new StageChain('decision', [config.trader]),
      new VerdictGate(config.verdictGate),
      settings.data.maxAttempts,
    );
    this.stageTimeoutMs = settings.data.stageTimeoutMs;
    this.traderName = config.trader.name;

    this.eventBus = new SimpleEventBus((err, event) => {
      this.logger.warn('Event handler threw', {
        type: event.type,
        error: errorMessage(err),
      });
    });
    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e: DomainEvent) => handler({ type: e.type, runId: e.runId, payload: e.payload }));
      }
    }
  }

  get maxAttempts(): number {
    return this.controller.maxAttempts;
  }

  async run(instrumentId: string, initialContext: ContextUpdate = {}): Promise<RunResult> {
    const scope: RunScope = {
      runId: randomUUID(),
      events: this.eventBus,
      logger: this.logger,
      defaultTimeoutMs: this.stageTimeoutMs,
    };

    const instrument = instrumentId.trim();
    if (!instrument) {
      return this.fail(scope, new PipelineError('Instrument identifier must not be empty', 'input'));
    }

    emit(scope, 'RunStarted', { instrument, seedFields: Object.keys(initialContext) });
    this.logger.info('Run started', { runId: scope.runId, instrument });

    const store = new ContextStore({ ...initialContext, [CONTEXT_FIELDS.instrument]: instrument });
    let phase: PipelinePhase = 'analysis';

    try {
      await this.analysts.run(store, scope);
      phase = 'deliberation';
      await this.deliberation.run(store, scope);
      phase = 'decision';
      const outcome = await this.controller.run(store, scope);

      const draft = decisionDraftSchema.safeParse(outcome.context[CONTEXT_FIELDS.decision]);
      if (!draft.success) {
        throw new ContractViolation(`Trader "${this.traderName}" wrote a malformed decision`, [this.traderName]);
      }

      const decision: FinalDecision = {
        instrumentId: instrument,
        action: draft.data.action,
        rationale: draft.data.rationale,
        confidence: draft.data.confidence,
        status: outcome.state === 'accepted' ? 'accepted' : 'unverified',
        attempts: outcome.retry.attempt,
        verdicts: outcome.retry.history,
      };
      Object.freeze(decision);

      emit(scope, 'RunCompleted', {
        instrument,
        action: decision.action,
        status: decision.status,
        attempts: decision.attempts,
      });
      this.logger.info('Run completed', {
        runId: scope.runId,
        action: decision.action,
        status: decision.status,
        attempts: decision.attempts,
      });

      return { ok: true, decision, retry: outcome.retry, context: outcome.context };
    } catch (err) {
      return this.fail(scope, PipelineError.from(err, phase));
    }
  }

  private fail(scope: RunScope, error: PipelineError): RunResult {
    emit(scope, 'RunFailed', { phase: error.phase, stages: error.stages, message: error.message });
    this.logger.error('Run failed', {
      runId: scope.runId,
      phase: error.phase,
      stages: error.stages,
      error: error.message,
    });
    return { ok: false, error };
  }
}
