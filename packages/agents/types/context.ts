// Context: the versioned shared state threaded through one pipeline run
// Field names are plain strings; well-known desk fields live in CONTEXT_FIELDS

export type ContextValue = unknown;

export type Context = Readonly<Record<string, ContextValue>>;

export type ContextUpdate = Record<string, ContextValue>;

export const CONTEXT_FIELDS = {
  instrument: 'instrument',
  technicalReport: 'reports.technical',
  sentimentReport: 'reports.sentiment',
  newsReport: 'reports.news',
  fundamentalsReport: 'reports.fundamentals',
  debateTranscript: 'debate.transcript',
  debateJudgement: 'debate.judgement',
  researchSynthesis: 'research.synthesis',
  riskTranscript: 'risk.transcript',
  riskAssessment: 'risk.assessment',
  decision: 'decision',
  verdict: 'verdict',
  priorCritique: 'prior-critique',
} as const;

export type ContextField = (typeof CONTEXT_FIELDS)[keyof typeof CONTEXT_FIELDS];

export interface DebateEntry {
  readonly role: string;
  readonly argument: string;
}

export type DebateRecord = readonly DebateEntry[];

export interface PriorCritique {
  readonly attempt: number;
  readonly reasons: readonly string[];
}
