// Interpret free-text reasoner replies
// Handles "... end with HOLD", "Verdict: Bear", "HALLUCINATION DETECTED: <claim>"

import { TRADE_ACTIONS, type DebateJudgement, type JudgeWinner, type TradeAction, type Verdict } from '../types/decision.js';

export const DEFAULT_CONFIDENCE = 0.5;

export const DEFAULT_REVISION_REASON = 'Reflection flagged claims not supported by the reports';

const ACTIONS: Record<string, TradeAction> = Object.fromEntries(
  TRADE_ACTIONS.map((a): [string, TradeAction] => [a, a]),
);

const WINNERS: Record<string, JudgeWinner> = { bull: 'bull', bear: 'bear', tie: 'tie' };

/** The last BUY/HOLD/SELL token wins; upper-case tokens take precedence over prose */
export function parseTradeAction(reply: string): TradeAction | null {
  const strict = [...reply.matchAll(/\b(BUY|HOLD|SELL)\b/g)];
  const matches = strict.length > 0 ? strict : [...reply.matchAll(/\b(buy|hold|sell)\b/gi)];
  const last = matches.at(-1);
  if (!last) return null;
  return ACTIONS[last[1].toUpperCase()] ?? null;
}

/** "Confidence: 0.8" or "confidence = 80%"; values above 1 are read as percentages */
export function parseConfidence(reply: string): number {
  const match = /confidence\s*[:=]\s*(\d+(?:\.\d+)?)\s*(%)?/i.exec(reply);
  if (!match) return DEFAULT_CONFIDENCE;

  let value = Number(match[1]);
  if (match[2] === '%' || value > 1) value /= 100;
  return Math.min(1, Math.max(0, value));
}

export function parseJudgeVerdict(reply: string): DebateJudgement {
  const justification = reply.trim();
  const head = justification.toLowerCase().replace(/^[^a-z]*(?:verdict\s*[:-]\s*)?/, '');

  // "No" means neither side convinced the judge
  if (/^no\b/.test(head)) {
    return { winner: 'undecided', justification };
  }

  for (const line of justification.split('\n')) {
    const match = /\b(bull|bear|tie)\b/i.exec(line);
    if (match) {
      return { winner: WINNERS[match[1].toLowerCase()] ?? 'undecided', justification };
    }
  }
  return { winner: 'undecided', justification };
}

const FLAG = /(?<!\bno\s)\bhallucinations?\s+detected\b/i;
const FLAG_ALL = /(?<!\bno\s)\bhallucinations?\s+detected\b/gi;

export function parseReflection(reply: string): Verdict {
  if (!FLAG.test(reply)) {
    return { outcome: 'accept', reasons: [] };
  }

  const reasons = reply
    .split('\n')
    .map(line => line
      .replace(FLAG_ALL, '')
      .trim()
      .replace(/^[:.\-–]+\s*/, '')
      .replace(/^(?:[*•]|\d+[.)])\s+/, '')
      .trim())
    .filter(line => line.length > 0);

  return { outcome: 'revise', reasons: reasons.length > 0 ? reasons : [DEFAULT_REVISION_REASON] };
}
