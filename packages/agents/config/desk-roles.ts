// Desk roles: what each stage is for and the standing instructions its reasoner receives

export type AnalystFocus = 'technical' | 'sentiment' | 'news' | 'fundamentals';

export type ResearchSide = 'bull' | 'bear';

export type RiskStance = 'aggressive' | 'conservative' | 'neutral';

export type DeskRole =
  | `${AnalystFocus}-analyst`
  | `${ResearchSide}-researcher`
  | `${RiskStance}-risk-analyst`
  | 'debate-judge'
  | 'research-synthesizer'
  | 'risk-synthesizer'
  | 'trader'
  | 'reflection-gate';

export const ANALYST_FOCUSES: readonly AnalystFocus[] = ['technical', 'sentiment', 'news', 'fundamentals'];
export const RESEARCH_SIDES: readonly ResearchSide[] = ['bull', 'bear'];
export const RISK_STANCES: readonly RiskStance[] = ['aggressive', 'conservative', 'neutral'];

export const ROLE_DESCRIPTIONS: Record<DeskRole, string> = {
  'technical-analyst': 'Price action, trend, momentum and volume indicators',
  'sentiment-analyst': 'Social and market sentiment toward the instrument',
  'news-analyst': 'Recent company, sector and macro news flow',
  'fundamentals-analyst': 'Financial statements, valuation multiples and growth',
  'bull-researcher': 'Argues the long case from the analyst reports',
  'bear-researcher': 'Argues the short case from the analyst reports',
  'debate-judge': 'Decides which side of the bull/bear debate was more convincing',
  'research-synthesizer': 'Turns the debate and its judgement into an investment thesis',
  'aggressive-risk-analyst': 'Pushes for high-reward positioning',
  'conservative-risk-analyst': 'Pushes for capital preservation',
  'neutral-risk-analyst': 'Pushes for a balanced position',
  'risk-synthesizer': 'Reconciles the three risk stances into one risk assessment',
  'trader': 'Issues a BUY, HOLD or SELL recommendation with rationale',
  'reflection-gate': 'Checks the recommendation for claims the reports do not support',
};

export const ROLE_INSTRUCTIONS: Record<DeskRole, string> = {
  'technical-analyst':
    'You are a technical analyst. Assess trend, support and resistance, momentum (RSI, MACD) and volume. '
    + 'Report findings as plain prose with concrete levels where you have them.',
  'sentiment-analyst':
    'You are a sentiment analyst. Assess how investors and the public currently feel about the instrument '
    + 'and whether that mood is shifting. Report findings as plain prose.',
  'news-analyst':
    'You are a news analyst. Summarise the recent news that matters for the instrument and explain the likely '
    + 'price impact of each item.',
  'fundamentals-analyst':
    'You are a fundamentals analyst. Assess revenue and earnings growth, margins, balance sheet strength and '
    + 'valuation relative to peers.',
  'bull-researcher':
    'You are the bullish researcher in an investment debate. Build the strongest evidence-based case for '
    + 'owning the instrument and rebut the most recent bearish argument if there is one.',
  'bear-researcher':
    'You are the bearish researcher in an investment debate. Build the strongest evidence-based case against '
    + 'owning the instrument and rebut the most recent bullish argument if there is one.',
  'debate-judge':
    'You are a neutral investment debate judge. Start your reply with one word: Bull, Bear or Tie, or No if '
    + 'neither side was convincing. Follow it with a short justification.',
  'research-synthesizer':
    'You are the research manager. Combine the judged debate with the analyst reports into a concise investment '
    + 'thesis that names the strongest arguments on each side.',
  'aggressive-risk-analyst':
    'You are the aggressive risk analyst. Argue for the position that maximises upside and challenge excess caution.',
  'conservative-risk-analyst':
    'You are the conservative risk analyst. Argue for protecting capital and point out the downside scenarios.',
  'neutral-risk-analyst':
    'You are the neutral risk analyst. Weigh upside against downside and argue for a balanced position size.',
  'risk-synthesizer':
    'You are the risk synthesizer. Summarise each risk stance, note where they agree and disagree, and end '
    + 'with a single risk assessment.',
  'trader':
    'You are the trader. Using only the material provided, give a clear rationale, a line "Confidence: <0-1>", '
    + 'and end your reply with exactly one of BUY, HOLD or SELL.',
  'reflection-gate':
    'You check trade recommendations for hallucinations. If every claim in the rationale is supported by the '
    + 'reports, reply "NO HALLUCINATION". Otherwise reply "HALLUCINATION DETECTED" followed by one unsupported '
    + 'claim per line.',
};
