// Stage contracts and results
// A stage declares what it reads and writes before it ever runs

import type { Context, ContextUpdate } from './context.js';

export interface StageContract {
  /** Fields that must be present in the snapshot before the stage starts */
  readonly reads: readonly string[];
  /** Fields read when present; never checked */
  readonly optionalReads?: readonly string[];
  /** The only fields the stage may write */
  readonly writes: readonly string[];
}

export interface StageRunOptions {
  /** Aborted on timeout, or when a sibling in the same group fails */
  signal: AbortSignal;
}

export interface Stage extends StageContract {
  readonly name: string;
  /** Per-stage timeout; falls back to the pipeline default */
  readonly timeoutMs?: number;
  execute(view: Context, options: StageRunOptions): Promise<ContextUpdate>;
}

export type StageFailureKind = 'error' | 'timeout' | 'cancelled' | 'contract';

export interface StageFailureInfo {
  readonly stage: string;
  readonly kind: StageFailureKind;
  readonly message: string;
  readonly cause?: unknown;
}

export type StageResult =
  | { readonly ok: true; readonly stage: string; readonly writes: ContextUpdate; readonly durationMs: number }
  | { readonly ok: false; readonly stage: string; readonly failure: StageFailureInfo; readonly durationMs: number };
