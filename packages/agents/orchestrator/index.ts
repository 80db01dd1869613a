export {
  TradingPipeline,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_STAGE_TIMEOUT_MS,
  decisionDraftSchema,
  type PipelineConfig,
  type PipelineRunner,
  type RunResult,
} from './coordinator.js';
export {
  createDeskStage,
  createTradingDesk,
  DEFAULT_DEBATE_ROUNDS,
  type TradingDeskOptions,
} from './desk-factory.js';
export {
  BatchRunner,
  buildComparative,
  type BatchOptions,
  type BatchProgress,
  type BatchResult,
  type InstrumentResult,
} from './batch-runner.js';
