// Factory for desk stages and the standard trading-desk topology

import type { Stage } from '../types/stages.js';
import type { Reasoner } from '../types/reasoner.js';
import { ANALYST_FOCUSES, RISK_STANCES, type DeskRole } from '../config/desk-roles.js';
import type { BaseDeskStage, DeskStageOptions } from '../agents/base-desk-stage.js';
import { AnalystStage } from '../agents/analyst-stage.js';
import { DebaterStage } from '../agents/debater-stage.js';
import { DebateJudge } from '../agents/debate-judge.js';
import { ResearchSynthesizer } from '../agents/research-synthesizer.js';
import { RiskSynthesizer } from '../agents/risk-synthesizer.js';
import { TraderStage } from '../agents/trader.js';
import { ReflectionGate } from '../agents/reflection-gate.js';
import { ConfigurationError } from '../kernel/errors.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineConfig } from './coordinator.js';

export const DEFAULT_DEBATE_ROUNDS = 1;

const FACTORY: Record<DeskRole, (options: DeskStageOptions) => BaseDeskStage> = {
  'technical-analyst': (o) => new AnalystStage('technical', o),
  'sentiment-analyst': (o) => new AnalystStage('sentiment', o),
  'news-analyst': (o) => new AnalystStage('news', o),
  'fundamentals-analyst': (o) => new AnalystStage('fundamentals', o),
  'bull-researcher': (o) => new DebaterStage('bull-researcher', { ...o, opening: true }),
  'bear-researcher': (o) => new DebaterStage('bear-researcher', o),
  'debate-judge': (o) => new DebateJudge(o),
  'research-synthesizer': (o) => new ResearchSynthesizer(o),
  'aggressive-risk-analyst': (o) => new DebaterStage('aggressive-risk-analyst', { ...o, opening: true }),
  'conservative-risk-analyst': (o) => new DebaterStage('conservative-risk-analyst', o),
  'neutral-risk-analyst': (o) => new DebaterStage('neutral-risk-analyst', o),
  'risk-synthesizer': (o) => new RiskSynthesizer(o),
  'trader': (o) => new TraderStage(o),
  'reflection-gate': (o) => new ReflectionGate(o),
};

export function createDeskStage(role: DeskRole, options: DeskStageOptions): BaseDeskStage {
  return FACTORY[role](options);
}

export interface TradingDeskOptions {
  reasoner: Reasoner;
  /** Bull/bear exchanges before the judge; at least 1 */
  debateRounds?: number;
  maxAttempts?: number;
  stageTimeoutMs?: number;
  logger?: Logger;
  onEvent?: PipelineConfig['onEvent'];
}

/**
 * Standard desk: four analysts in parallel, then bull/bear rounds, judge,
 * research synthesis, the three risk stances and the risk synthesis, then
 * the trader under the reflection gate.
 */
export function createTradingDesk(options: TradingDeskOptions): PipelineConfig {
  const rounds = options.debateRounds ?? DEFAULT_DEBATE_ROUNDS;
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new ConfigurationError(`debateRounds must be a positive integer, got ${rounds}`);
  }

  const base: DeskStageOptions = { reasoner: options.reasoner };
  const analysts = ANALYST_FOCUSES.map(focus => createDeskStage(`${focus}-analyst`, base));

  const chain: Stage[] = [];
  for (let round = 1; round <= rounds; round++) {
    const suffix = round === 1 ? '' : `-r${round}`;
    chain.push(
      // Only the very first turn may see an empty transcript
      round === 1
        ? createDeskStage('bull-researcher', base)
        : new DebaterStage('bull-researcher', { ...base, name: `bull-researcher${suffix}` }),
      createDeskStage('bear-researcher', { ...base, name: `bear-researcher${suffix}` }),
    );
  }
  chain.push(
    createDeskStage('debate-judge', base),
    createDeskStage('research-synthesizer', base),
    ...RISK_STANCES.map(stance => createDeskStage(`${stance}-risk-analyst`, base)),
    createDeskStage('risk-synthesizer', base),
  );

  return {
    analysts,
    chain,
    trader: createDeskStage('trader', base),
    verdictGate: createDeskStage('reflection-gate', base),
    maxAttempts: options.maxAttempts,
    stageTimeoutMs: options.stageTimeoutMs,
    logger: options.logger,
    onEvent: options.onEvent,
  };
}
