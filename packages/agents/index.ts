// Trading desk pipeline
// Analysts in parallel, a research and risk debate in order, then a trader under reflection

export {
  TradingPipeline,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_STAGE_TIMEOUT_MS,
  decisionDraftSchema,
  createDeskStage,
  createTradingDesk,
  DEFAULT_DEBATE_ROUNDS,
  BatchRunner,
  buildComparative,
} from './orchestrator/index.js';
export type {
  PipelineConfig,
  PipelineRunner,
  RunResult,
  TradingDeskOptions,
  BatchOptions,
  BatchProgress,
  BatchResult,
  InstrumentResult,
} from './orchestrator/index.js';

export * from './kernel/index.js';
export * from './types/index.js';

export { BaseDeskStage, type DeskStageOptions } from './agents/base-desk-stage.js';
export { AnalystStage } from './agents/analyst-stage.js';
export { DebaterStage, type DebaterRole } from './agents/debater-stage.js';
export { DebateJudge } from './agents/debate-judge.js';
export { ResearchSynthesizer } from './agents/research-synthesizer.js';
export { RiskSynthesizer } from './agents/risk-synthesizer.js';
export { TraderStage } from './agents/trader.js';
export { ReflectionGate } from './agents/reflection-gate.js';

export * from './config/index.js';
export { parseTradeAction, parseConfidence, parseJudgeVerdict, parseReflection } from './utils/reply-parser.js';
export { createLogger, errorMessage, type Logger, type LogLevel } from './utils/logger.js';

// Bridge: reason through a completion tool on an MCP server
export {
  McpBridge, createMcpReasoner, createReasonerBridge, extractToolText,
} from './bridge/index.js';
export type { McpBridgeConfig, ToolCaller, ToolCallOptions } from './bridge/index.js';
