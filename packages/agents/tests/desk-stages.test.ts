// Tests for the desk stages wired by createTradingDesk, driven by a scripted reasoner

import { describe, it, expect } from 'vitest';
import { createDeskStage, createTradingDesk } from '../orchestrator/desk-factory.js';
import { TradingPipeline, type RunResult } from '../orchestrator/coordinator.js';
import { ConfigurationError } from '../kernel/errors.js';
import { ROLE_INSTRUCTIONS, type DeskRole } from '../config/desk-roles.js';
import type { Reasoner, ReasonerRequest } from '../types/reasoner.js';
import { quietLogger } from './stage-fixtures.js';

type Script = string | ((call: number) => string);

const REPLIES: Record<DeskRole, Script> = {
  'technical-analyst': 'Price above the 50-day average with rising volume.',
  'sentiment-analyst': 'Retail sentiment turned positive this week.',
  'news-analyst': 'New product launch announced.',
  'fundamentals-analyst': 'Revenue grew 12% year over year.',
  'bull-researcher': 'Growth and momentum support owning it.',
  'bear-researcher': 'Valuation already prices in the launch.',
  'debate-judge': 'Bull\nGrowth evidence outweighs valuation concerns.',
  'research-synthesizer': 'Lean long with valuation caveats.',
  'aggressive-risk-analyst': 'Take a full position.',
  'conservative-risk-analyst': 'Size small given valuation.',
  'neutral-risk-analyst': 'Half position with a stop.',
  'risk-synthesizer': 'Moderate risk; half position.',
  'trader': 'Momentum and revenue growth support a long.\nConfidence: 0.8\nFINAL: BUY',
  'reflection-gate': 'NO HALLUCINATION',
};

function scripted(overrides: Partial<Record<DeskRole, Script>> = {}) {
  const script: Record<string, Script> = { ...REPLIES, ...overrides };
  const requests: ReasonerRequest[] = [];
  const calls = new Map<string, number>();

  const reasoner: Reasoner = async (request) => {
    requests.push(request);
    const call = (calls.get(request.role) ?? 0) + 1;
    calls.set(request.role, call);
    const reply = script[request.role];
    if (reply === undefined) throw new Error(`no script for ${request.role}`);
    return typeof reply === 'string' ? reply : reply(call);
  };
  return { reasoner, requests };
}

function decided(result: RunResult) {
  if (!result.ok) throw new Error(`expected a decision, got: ${result.error.message}`);
  return result;
}

function prompts(requests: ReasonerRequest[], role: DeskRole): string[] {
  return requests.filter(r => r.role === role).map(r => r.prompt);
}

describe('createTradingDesk', () => {
  it('runs every desk role once and returns the trader decision', async () => {
    const { reasoner, requests } = scripted();
    const pipeline = new TradingPipeline(createTradingDesk({ reasoner, logger: quietLogger }));

    const result = decided(await pipeline.run('AAPL'));

    expect(result.decision).toEqual({
      instrumentId: 'AAPL',
      action: 'BUY',
      rationale: 'Momentum and revenue growth support a long.\nConfidence: 0.8\nFINAL: BUY',
      confidence: 0.8,
      status: 'accepted',
      attempts: 1,
      verdicts: [{ outcome: 'accept', reasons: [] }],
    });

    expect(requests.slice(4).map(r => r.role)).toEqual([
      'bull-researcher', 'bear-researcher', 'debate-judge', 'research-synthesizer',
      'aggressive-risk-analyst', 'conservative-risk-analyst', 'neutral-risk-analyst', 'risk-synthesizer',
      'trader', 'reflection-gate',
    ]);
    const instructions: Record<string, string> = ROLE_INSTRUCTIONS;
    for (const request of requests) {
      expect(request.instructions).toBe(instructions[request.role]);
      expect(request.signal).toBeInstanceOf(AbortSignal);
    }
  });

  it('records the debate, judgement and risk stances in the context', async () => {
    const { reasoner } = scripted();
    const { context } = decided(await new TradingPipeline(createTradingDesk({ reasoner, logger: quietLogger })).run('AAPL'));

    expect(context['reports.fundamentals']).toBe('Revenue grew 12% year over year.');
    expect(context['debate.transcript']).toEqual([
      { role: 'bull-researcher', argument: 'Growth and momentum support owning it.' },
      { role: 'bear-researcher', argument: 'Valuation already prices in the launch.' },
    ]);
    expect(context['debate.judgement']).toEqual({
      winner: 'bull',
      justification: 'Bull\nGrowth evidence outweighs valuation concerns.',
    });
    expect(context['research.synthesis']).toBe('Lean long with valuation caveats.');
    expect(context['risk.transcript']).toEqual([
      { role: 'aggressive-risk-analyst', argument: 'Take a full position.' },
      { role: 'conservative-risk-analyst', argument: 'Size small given valuation.' },
      { role: 'neutral-risk-analyst', argument: 'Half position with a stop.' },
    ]);
    expect(context['risk.assessment']).toBe('Moderate risk; half position.');
  });

  it('shows each debater the turns before it', async () => {
    const { reasoner, requests } = scripted();
    await new TradingPipeline(createTradingDesk({ reasoner, logger: quietLogger })).run('AAPL');

    const [bullPrompt] = prompts(requests, 'bull-researcher');
    const [bearPrompt] = prompts(requests, 'bear-researcher');
    expect(bullPrompt).toContain('You open the debate.');
    expect(bullPrompt).toContain('## Technical report\nPrice above the 50-day average with rising volume.');
    expect(bearPrompt).toContain('## Debate so far\nbull-researcher: Growth and momentum support owning it.');
  });

  it('repeats the bull/bear exchange for each debate round', async () => {
    const { reasoner } = scripted({
      'bull-researcher': (n) => `bull turn ${n}`,
      'bear-researcher': (n) => `bear turn ${n}`,
    });
    const config = createTradingDesk({ reasoner, debateRounds: 2, logger: quietLogger });

    expect(config.chain.map(s => s.name)).toEqual([
      'bull-researcher', 'bear-researcher', 'bull-researcher-r2', 'bear-researcher-r2',
      'debate-judge', 'research-synthesizer',
      'aggressive-risk-analyst', 'conservative-risk-analyst', 'neutral-risk-analyst', 'risk-synthesizer',
    ]);

    const { context } = decided(await new TradingPipeline(config).run('AAPL'));
    expect(context['debate.transcript']).toEqual([
      { role: 'bull-researcher', argument: 'bull turn 1' },
      { role: 'bear-researcher', argument: 'bear turn 1' },
      { role: 'bull-researcher', argument: 'bull turn 2' },
      { role: 'bear-researcher', argument: 'bear turn 2' },
    ]);
  });

  it.each([0, -1, 1.5])('rejects debateRounds %s', (debateRounds) => {
    const { reasoner } = scripted();
    expect(() => createTradingDesk({ reasoner, debateRounds })).toThrow(ConfigurationError);
  });

  it('re-runs the trader with the reflection critique', async () => {
    const { reasoner, requests } = scripted({
      'reflection-gate': (n) => (n === 1 ? 'HALLUCINATION DETECTED\n- Invented revenue figure' : 'NO HALLUCINATION'),
    });

    const result = decided(await new TradingPipeline(createTradingDesk({ reasoner, logger: quietLogger })).run('AAPL'));

    expect(result.decision.status).toBe('accepted');
    expect(result.decision.attempts).toBe(2);
    expect(result.decision.verdicts).toEqual([
      { outcome: 'revise', reasons: ['Invented revenue figure'] },
      { outcome: 'accept', reasons: [] },
    ]);

    const [first, second] = prompts(requests, 'trader');
    expect(first).not.toContain('Critique of your previous recommendation');
    expect(second).toContain('Critique of your previous recommendation');
    expect(second).toContain('Invented revenue figure');
  });

  it('marks the decision unverified when reflection never accepts', async () => {
    const { reasoner, requests } = scripted({ 'reflection-gate': 'HALLUCINATION DETECTED: made-up buyback' });

    const result = decided(await new TradingPipeline(createTradingDesk({
      reasoner, maxAttempts: 2, logger: quietLogger,
    })).run('AAPL'));

    expect(result.decision.status).toBe('unverified');
    expect(result.decision.attempts).toBe(2);
    expect(prompts(requests, 'trader')).toHaveLength(2);
  });

  it('fails the decision phase when the trader gives no action', async () => {
    const { reasoner } = scripted({ trader: 'The picture is mixed.' });

    const result = await new TradingPipeline(createTradingDesk({ reasoner, logger: quietLogger })).run('AAPL');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.phase).toBe('decision');
    expect(result.error.stages).toEqual(['trader']);
    expect(result.error.message)
      .toBe('Stage "trader" failed (error): trader: reply contains no BUY, HOLD or SELL recommendation');
  });

  it('fails the analysis phase on an empty analyst reply', async () => {
    const { reasoner, requests } = scripted({ 'news-analyst': '   ' });

    const result = await new TradingPipeline(createTradingDesk({ reasoner, logger: quietLogger })).run('AAPL');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.phase).toBe('analysis');
    expect(result.error.stages).toEqual(['news-analyst']);
    expect(result.error.message).toContain('news-analyst: reasoner returned an empty reply');
    expect(prompts(requests, 'bull-researcher')).toHaveLength(0);
  });
});

describe('createDeskStage', () => {
  const { reasoner } = scripted();

  it('declares the critique as an optional read of the trader', () => {
    const trader = createDeskStage('trader', { reasoner });
    expect(trader.optionalReads).toEqual(['prior-critique']);
    expect(trader.writes).toEqual(['decision']);
    expect(trader.reads).not.toContain('prior-critique');
  });

  it('lets only the opening debater start without a transcript', () => {
    const bull = createDeskStage('bull-researcher', { reasoner });
    const bear = createDeskStage('bear-researcher', { reasoner });

    expect(bull.optionalReads).toEqual(['debate.transcript']);
    expect(bull.reads).not.toContain('debate.transcript');
    expect(bear.reads).toContain('debate.transcript');
  });

  it('leaves the bull/bear transcript to the judge alone downstream of the debate', () => {
    const config = createTradingDesk({ reasoner, logger: quietLogger });
    const stages = [...config.chain, config.trader, config.verdictGate];
    const consumers = stages
      .filter(s => s.reads.includes('debate.transcript') && !s.writes.includes('debate.transcript'))
      .map(s => s.name);

    expect(consumers).toEqual(['debate-judge']);
    expect(createDeskStage('research-synthesizer', { reasoner }).reads).toEqual([
      'reports.technical', 'reports.sentiment', 'reports.news', 'reports.fundamentals', 'debate.judgement',
    ]);
  });

  it('gives each analyst its own report field', () => {
    expect(createDeskStage('sentiment-analyst', { reasoner }).writes).toEqual(['reports.sentiment']);
    expect(createDeskStage('technical-analyst', { reasoner }).reads).toEqual(['instrument']);
  });

  it('uses a custom stage name when given one', () => {
    const stage = createDeskStage('bear-researcher', { reasoner, name: 'bear-researcher-r3' });
    expect(stage.name).toBe('bear-researcher-r3');
    expect(stage.role).toBe('bear-researcher');
  });
});
