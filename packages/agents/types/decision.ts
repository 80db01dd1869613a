// Verdicts, retry bookkeeping and the final decision

export const TRADE_ACTIONS = ['BUY', 'HOLD', 'SELL'] as const;

export type TradeAction = (typeof TRADE_ACTIONS)[number];

export type VerdictOutcome = 'accept' | 'revise';

export interface Verdict {
  readonly outcome: VerdictOutcome;
  readonly reasons: readonly string[];
}

export type ControllerState = 'running' | 'accepted' | 'exhausted';

export interface RetryState {
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly history: readonly Verdict[];
}

/** What the trader stage writes into the context */
export interface DecisionDraft {
  readonly action: TradeAction;
  readonly rationale: string;
  readonly confidence: number;
}

export type DecisionStatus = 'accepted' | 'unverified';

export interface FinalDecision extends DecisionDraft {
  readonly instrumentId: string;
  readonly status: DecisionStatus;
  readonly attempts: number;
  readonly verdicts: readonly Verdict[];
}

export type JudgeWinner = 'bull' | 'bear' | 'tie' | 'undecided';

export interface DebateJudgement {
  readonly winner: JudgeWinner;
  readonly justification: string;
}
