// Kernel error taxonomy
// RetryExhausted is deliberately absent: exhaustion is an outcome, not an error

import type { StageFailureInfo } from '../types/stages.js';

export type KernelErrorCode =
  | 'CONTRACT_VIOLATION'
  | 'STAGE_FAILURE'
  | 'GROUP_FAILURE'
  | 'CONFIGURATION_ERROR'
  | 'PIPELINE_ERROR';

export abstract class KernelError extends Error {
  abstract readonly code: KernelErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Overlapping write-sets, undeclared writes, malformed verdicts. Never retried. */
export class ContractViolation extends KernelError {
  readonly code = 'CONTRACT_VIOLATION' as const;

  constructor(message: string, readonly stages: readonly string[] = []) {
    super(message);
  }
}

export class StageFailure extends KernelError {
  readonly code = 'STAGE_FAILURE' as const;

  constructor(readonly failure: StageFailureInfo) {
    super(`Stage "${failure.stage}" failed (${failure.kind}): ${failure.message}`, { cause: failure.cause });
  }

  get stage(): string {
    return this.failure.stage;
  }
}

/** Every genuine failure of one fan-out group; aborted siblings are listed separately */
export class GroupFailure extends KernelError {
  readonly code = 'GROUP_FAILURE' as const;

  constructor(
    readonly group: string,
    readonly failures: readonly StageFailureInfo[],
    readonly cancelled: readonly string[] = [],
  ) {
    super(
      `Group "${group}" failed: ${failures.map(f => `${f.stage} (${f.kind}: ${f.message})`).join('; ')}`,
    );
  }
}

export class ConfigurationError extends KernelError {
  readonly code = 'CONFIGURATION_ERROR' as const;
}

export type PipelinePhase = 'input' | 'analysis' | 'deliberation' | 'decision';

export class PipelineError extends KernelError {
  readonly code = 'PIPELINE_ERROR' as const;

  constructor(
    message: string,
    readonly phase: PipelinePhase,
    readonly stages: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** Wrap whatever a pipeline phase threw, keeping the failing stage names */
  static from(err: unknown, phase: PipelinePhase): PipelineError {
    if (err instanceof PipelineError) return err;
    if (err instanceof GroupFailure) {
      return new PipelineError(err.message, phase, err.failures.map(f => f.stage), { cause: err });
    }
    if (err instanceof StageFailure) {
      return new PipelineError(err.message, phase, [err.stage], { cause: err });
    }
    if (err instanceof ContractViolation) {
      return new PipelineError(err.message, phase, err.stages, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new PipelineError(message, phase, [], { cause: err });
  }
}
