// Sequential stage chain: each stage sees the merge of everything before it.
// The first failure stops the chain.

import type { Context } from '../types/context.js';
import type { Stage } from '../types/stages.js';
import type { ContextStore } from './context-store.js';
import { assertNonEmpty, assertTimeouts, assertUniqueNames } from './composition.js';
import { StageFailure } from './errors.js';
import type { RunScope } from './run-scope.js';
import { runStage } from './stage-runner.js';

export class StageChain {
  readonly name: string;
  private readonly stages: readonly Stage[];

  constructor(name: string, stages: readonly Stage[]) {
    assertNonEmpty(`Chain "${name}"`, stages);
    assertUniqueNames(`Chain "${name}"`, stages);
    assertTimeouts(`Chain "${name}"`, stages);
    this.name = name;
    this.stages = [...stages];
  }

  get stageNames(): string[] {
    return this.stages.map(s => s.name);
  }

  get writes(): string[] {
    return [...new Set(this.stages.flatMap(s => s.writes))];
  }

  async run(store: ContextStore, scope: RunScope): Promise<Context> {
    for (const stage of this.stages) {
      const result = await runStage(stage, store.snapshot(), scope);
      if (!result.ok) {
        throw new StageFailure(result.failure);
      }
      store.merge(result.writes);
    }
    return store.snapshot();
  }
}
