// Batch runs: one pipeline run per instrument, a bounded number at a time,
// plus a comparative markdown summary of the decisions

import type { ContextUpdate } from '../types/context.js';
import type { FinalDecision } from '../types/decision.js';
import type { PipelinePhase } from '../kernel/errors.js';
import type { PipelineRunner } from './coordinator.js';

export interface BatchOptions {
  /** Max concurrent runs (default: 3) */
  concurrency?: number;
  /** Seed merged into every run's initial context */
  seed?: ContextUpdate;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface InstrumentResult {
  instrument: string;
  decision?: FinalDecision;
  error?: string;
  phase?: PipelinePhase;
  durationMs: number;
}

export interface BatchResult {
  instruments: InstrumentResult[];
  comparative: string;
  totalDurationMs: number;
}

export class BatchRunner {
  constructor(private readonly pipeline: PipelineRunner) {}

  async run(instruments: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    const { concurrency = 3, seed = {}, onProgress } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const totalStart = Date.now();
    const results: InstrumentResult[] = [];
    let completed = 0;

    for (let i = 0; i < instruments.length; i += concurrency) {
      const batch = instruments.slice(i, i + concurrency);

      const batchResults = await Promise.all(batch.map(async (instrument): Promise<InstrumentResult> => {
        const start = Date.now();
        onProgress?.({ completed, total: instruments.length, current: instrument, status: 'running' });

        const outcome = await this.pipeline.run(instrument, seed);
        completed++;

        if (outcome.ok) {
          onProgress?.({ completed, total: instruments.length, current: instrument, status: 'completed' });
          return { instrument, decision: outcome.decision, durationMs: Date.now() - start };
        }

        onProgress?.({
          completed,
          total: instruments.length,
          current: instrument,
          status: 'failed',
          error: outcome.error.message,
        });
        return {
          instrument,
          error: outcome.error.message,
          phase: outcome.error.phase,
          durationMs: Date.now() - start,
        };
      }));

      results.push(...batchResults);
    }

    return {
      instruments: results,
      comparative: buildComparative(results),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

export function buildComparative(results: readonly InstrumentResult[]): string {
  const decided = results.filter(r => r.decision !== undefined);
  const failed = results.filter(r => r.error !== undefined);

  if (decided.length === 0) {
    return '## Comparative Decisions\n\nNo instruments produced a decision.';
  }

  const lines: string[] = [
    '## Comparative Decisions',
    '',
    `**Instruments decided:** ${decided.length}/${results.length}`,
    '',
    '| Instrument | Action | Confidence | Status | Attempts |',
    '|------------|--------|------------|--------|----------|',
  ];

  for (const { instrument, decision } of decided) {
    if (!decision) continue;
    lines.push(
      `| ${instrument} | ${decision.action} | ${decision.confidence.toFixed(2)} | ${decision.status} | ${decision.attempts} |`,
    );
  }
  lines.push('');

  if (failed.length > 0) {
    lines.push('### Failed Runs', '');
    for (const r of failed) {
      lines.push(`- **${r.instrument}** (${r.phase ?? 'unknown'}): ${r.error}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
