export { ContextStore } from './context-store.js';
export type { StageWrites } from './context-store.js';
export { runStage, missingReads, undeclaredWrites } from './stage-runner.js';
export { FanOutGroup } from './fan-out-group.js';
export { StageChain } from './stage-chain.js';
export { VerdictGate, parseVerdict, verdictSchema } from './verdict-gate.js';
export { FeedbackController, maxAttemptsSchema } from './feedback-controller.js';
export type { FeedbackOutcome } from './feedback-controller.js';
export {
  MAX_TIMEOUT_MS, assertDisjointWrites, assertNonEmpty, assertTimeouts, assertUniqueNames, isValidTimeout,
} from './composition.js';
export { emit } from './run-scope.js';
export type { RunScope } from './run-scope.js';
export {
  KernelError, ContractViolation, StageFailure, GroupFailure,
  ConfigurationError, PipelineError,
} from './errors.js';
export type { KernelErrorCode, PipelinePhase } from './errors.js';
