// Runs one stage under its contract: read check, timeout, cancellation, write check.
// Never throws; every outcome becomes a StageResult.

import type { Context, ContextUpdate } from '../types/context.js';
import type { Stage, StageFailureInfo, StageFailureKind, StageResult } from '../types/stages.js';
import { errorMessage } from '../utils/logger.js';
import { emit, type RunScope } from './run-scope.js';

class StageTimeout extends Error {
  constructor(stage: string, timeoutMs: number) {
    super(`Stage "${stage}" timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeout';
  }
}

function isUpdate(value: unknown): value is ContextUpdate {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function missingReads(stage: Stage, view: Context): string[] {
  return stage.reads.filter(field => !Object.prototype.hasOwnProperty.call(view, field));
}

export function undeclaredWrites(stage: Stage, writes: ContextUpdate): string[] {
  return Object.keys(writes).filter(key => !stage.writes.includes(key));
}

export async function runStage(
  stage: Stage,
  view: Context,
  scope: RunScope,
  parentSignal?: AbortSignal,
): Promise<StageResult> {
  const start = Date.now();
  const timeoutMs = stage.timeoutMs ?? scope.defaultTimeoutMs;

  const fail = (kind: StageFailureKind, message: string, cause?: unknown): StageResult => {
    const failure: StageFailureInfo = { stage: stage.name, kind, message, cause };
    const durationMs = Date.now() - start;
    emit(scope, 'StageFailed', { stage: stage.name, kind, message, durationMs });
    scope.logger.warn(`Stage ${stage.name} failed`, { kind, message, durationMs });
    return { ok: false, stage: stage.name, failure, durationMs };
  };

  emit(scope, 'StageStarted', { stage: stage.name, reads: stage.reads, writes: stage.writes });

  const missing = missingReads(stage, view);
  if (missing.length > 0) {
    return fail('contract', `Missing declared reads: ${missing.join(', ')}`);
  }
  if (parentSignal?.aborted) {
    return fail('cancelled', 'Cancelled before start');
  }

  const controller = new AbortController();
  let timedOut = false;

  let rejectOnAbort: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectOnAbort = reject;
  });
  const onAbort = (): void => {
    rejectOnAbort(controller.signal.reason);
  };
  let cancelled = false;
  const onParentAbort = (): void => {
    cancelled = true;
    controller.abort(parentSignal?.reason);
  };

  controller.signal.addEventListener('abort', onAbort, { once: true });
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new StageTimeout(stage.name, timeoutMs));
  }, timeoutMs);

  let writes: unknown;
  try {
    const running = Promise.resolve().then(() => stage.execute(view, { signal: controller.signal }));
    writes = await Promise.race([running, aborted]);
  } catch (err) {
    if (timedOut) return fail('timeout', `Timed out after ${timeoutMs}ms`, err);
    // A stage that failed on its own before the cancellation reached it keeps its error
    if (cancelled && err === controller.signal.reason) return fail('cancelled', 'Cancelled by a failing sibling', err);
    return fail('error', errorMessage(err), err);
  } finally {
    clearTimeout(timer);
    controller.signal.removeEventListener('abort', onAbort);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }

  if (!isUpdate(writes)) {
    return fail('contract', 'Stage must return an object of field updates');
  }
  const undeclared = undeclaredWrites(stage, writes);
  if (undeclared.length > 0) {
    return fail('contract', `Undeclared writes: ${undeclared.join(', ')}`);
  }

  const durationMs = Date.now() - start;
  emit(scope, 'StageSucceeded', { stage: stage.name, fields: Object.keys(writes), durationMs });
  scope.logger.debug(`Stage ${stage.name} succeeded`, { durationMs });
  return { ok: true, stage: stage.name, writes, durationMs };
}
