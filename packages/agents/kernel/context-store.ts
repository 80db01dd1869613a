// Context store: every merge produces a new frozen version.
// Snapshots already handed out never change.

import type { Context, ContextUpdate } from '../types/context.js';
import { ContractViolation } from './errors.js';

export interface StageWrites {
  readonly stage: string;
  readonly writes: ContextUpdate;
}

export class ContextStore {
  private current: Context;
  private mergeCount = 0;

  constructor(seed: ContextUpdate = {}) {
    this.current = Object.freeze({ ...seed });
  }

  /** Number of merges applied so far */
  get version(): number {
    return this.mergeCount;
  }

  snapshot(): Context {
    return this.current;
  }

  /** Total overwrite per key */
  merge(updates: ContextUpdate): Context {
    this.current = Object.freeze({ ...this.current, ...updates });
    this.mergeCount++;
    return this.current;
  }

  /**
   * Merge the writes of one fan-out group as a single version.
   * Two stages writing the same key is a contract violation, whatever their order.
   */
  mergeAll(updates: readonly StageWrites[]): Context {
    const owners = new Map<string, string>();
    const combined: ContextUpdate = {};

    for (const { stage, writes } of updates) {
      for (const [key, value] of Object.entries(writes)) {
        const owner = owners.get(key);
        if (owner !== undefined) {
          throw new ContractViolation(
            `Field "${key}" written by both "${owner}" and "${stage}" in one group`,
            [owner, stage],
          );
        }
        owners.set(key, stage);
        combined[key] = value;
      }
    }

    return this.merge(combined);
  }
}
