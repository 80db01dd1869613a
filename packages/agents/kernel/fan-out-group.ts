// Fan-out/fan-in group
// All members run against one snapshot; the group merges only when every member succeeded.

import type { Context } from '../types/context.js';
import type { Stage, StageFailureInfo, StageResult } from '../types/stages.js';
import type { ContextStore } from './context-store.js';
import { assertDisjointWrites, assertNonEmpty, assertTimeouts, assertUniqueNames } from './composition.js';
import { GroupFailure } from './errors.js';
import { emit, type RunScope } from './run-scope.js';
import { runStage } from './stage-runner.js';

export class FanOutGroup {
  readonly name: string;
  private readonly stages: readonly Stage[];

  constructor(name: string, stages: readonly Stage[]) {
    assertNonEmpty(`Group "${name}"`, stages);
    assertUniqueNames(`Group "${name}"`, stages);
    assertDisjointWrites(`Group "${name}"`, stages);
    assertTimeouts(`Group "${name}"`, stages);
    this.name = name;
    this.stages = [...stages];
  }

  get stageNames(): string[] {
    return this.stages.map(s => s.name);
  }

  get writes(): string[] {
    return this.stages.flatMap(s => s.writes);
  }

  async run(store: ContextStore, scope: RunScope): Promise<Context> {
    const view = store.snapshot();
    const siblings = new AbortController();

    const results: StageResult[] = await Promise.all(
      this.stages.map(async (stage) => {
        const result = await runStage(stage, view, scope, siblings.signal);
        if (!result.ok && result.failure.kind !== 'cancelled' && !siblings.signal.aborted) {
          siblings.abort(new Error(`Sibling "${stage.name}" failed`));
        }
        return result;
      }),
    );

    const failures: StageFailureInfo[] = [];
    const cancelled: string[] = [];
    for (const result of results) {
      if (result.ok) continue;
      if (result.failure.kind === 'cancelled') cancelled.push(result.stage);
      else failures.push(result.failure);
    }

    if (failures.length > 0) {
      scope.logger.error(`Group ${this.name} failed`, {
        failed: failures.map(f => f.stage),
        cancelled,
      });
      throw new GroupFailure(this.name, failures, cancelled);
    }

    // Promise.all keeps declaration order, so the merge never depends on completion order
    const merged = store.mergeAll(
      results.flatMap(r => (r.ok ? [{ stage: r.stage, writes: r.writes }] : [])),
    );

    emit(scope, 'GroupMerged', { group: this.name, stages: this.stageNames, version: store.version });
    return merged;
  }
}
