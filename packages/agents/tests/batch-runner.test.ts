// Tests for BatchRunner: bounded concurrency and the comparative decision table

import { describe, it, expect, vi } from 'vitest';
import { BatchRunner, buildComparative, type BatchProgress } from '../orchestrator/batch-runner.js';
import type { PipelineRunner, RunResult } from '../orchestrator/coordinator.js';
import { PipelineError } from '../kernel/errors.js';
import type { ContextUpdate } from '../types/context.js';
import type { FinalDecision } from '../types/decision.js';

function decision(instrumentId: string, overrides: Partial<FinalDecision> = {}): FinalDecision {
  return {
    instrumentId,
    action: 'BUY',
    rationale: `${instrumentId} looks strong`,
    confidence: 0.8,
    status: 'accepted',
    attempts: 1,
    verdicts: [{ outcome: 'accept', reasons: [] }],
    ...overrides,
  };
}

function ok(d: FinalDecision): RunResult {
  return { ok: true, decision: d, retry: { attempt: d.attempts, maxAttempts: 3, history: d.verdicts }, context: {} };
}

describe('BatchRunner', () => {
  it('runs every instrument and tabulates the decisions', async () => {
    const pipeline: PipelineRunner = {
      run: vi.fn(async (instrument: string): Promise<RunResult> => {
        if (instrument === 'BAD') return { ok: false, error: new PipelineError('no data', 'analysis') };
        if (instrument === 'MSFT') {
          return ok(decision('MSFT', { action: 'HOLD', confidence: 0.55, status: 'unverified', attempts: 3 }));
        }
        return ok(decision(instrument));
      }),
    };

    const result = await new BatchRunner(pipeline).run(['AAPL', 'MSFT', 'BAD'], { concurrency: 2 });

    expect(result.instruments.map(r => r.instrument)).toEqual(['AAPL', 'MSFT', 'BAD']);
    expect(result.instruments[2]).toMatchObject({ instrument: 'BAD', error: 'no data', phase: 'analysis' });
    expect(result.comparative).toBe([
      '## Comparative Decisions',
      '',
      '**Instruments decided:** 2/3',
      '',
      '| Instrument | Action | Confidence | Status | Attempts |',
      '|------------|--------|------------|--------|----------|',
      '| AAPL | BUY | 0.80 | accepted | 1 |',
      '| MSFT | HOLD | 0.55 | unverified | 3 |',
      '',
      '### Failed Runs',
      '',
      '- **BAD** (analysis): no data',
      '',
    ].join('\n'));
  });

  it('never runs more than `concurrency` instruments at once', async () => {
    let inFlight = 0;
    let peak = 0;
    const pipeline: PipelineRunner = {
      async run(instrument) {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        inFlight--;
        return ok(decision(instrument));
      },
    };

    await new BatchRunner(pipeline).run(['A', 'B', 'C', 'D', 'E'], { concurrency: 2 });

    expect(peak).toBe(2);
  });

  it('passes the seed to every run and reports progress', async () => {
    const seeds: Array<ContextUpdate | undefined> = [];
    const pipeline: PipelineRunner = {
      async run(instrument, seed) {
        seeds.push(seed);
        return ok(decision(instrument));
      },
    };
    const progress: BatchProgress[] = [];

    await new BatchRunner(pipeline).run(['AAPL', 'MSFT'], {
      concurrency: 1,
      seed: { 'trade-date': '2024-05-10' },
      onProgress: (p) => progress.push({ ...p }),
    });

    expect(seeds).toEqual([{ 'trade-date': '2024-05-10' }, { 'trade-date': '2024-05-10' }]);
    expect(progress).toEqual([
      { completed: 0, total: 2, current: 'AAPL', status: 'running' },
      { completed: 1, total: 2, current: 'AAPL', status: 'completed' },
      { completed: 1, total: 2, current: 'MSFT', status: 'running' },
      { completed: 2, total: 2, current: 'MSFT', status: 'completed' },
    ]);
  });

  it('rejects a non-positive concurrency', async () => {
    const pipeline: PipelineRunner = { run: vi.fn() };
    await expect(new BatchRunner(pipeline).run(['AAPL'], { concurrency: 0 })).rejects.toThrow(RangeError);
    expect(pipeline.run).not.toHaveBeenCalled();
  });
});

describe('buildComparative', () => {
  it('says so when nothing was decided', () => {
    expect(buildComparative([{ instrument: 'BAD', error: 'boom', phase: 'decision', durationMs: 1 }]))
      .toBe('## Comparative Decisions\n\nNo instruments produced a decision.');
  });
});
