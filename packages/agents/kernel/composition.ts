// Composition-time checks shared by groups, chains and the driver

import type { Stage } from '../types/stages.js';
import { ConfigurationError, ContractViolation } from './errors.js';

/** Largest delay a timer accepts; anything longer fires immediately */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function isValidTimeout(ms: number): boolean {
  return Number.isInteger(ms) && ms > 0 && ms <= MAX_TIMEOUT_MS;
}

export function assertTimeouts(unit: string, stages: readonly Stage[]): void {
  for (const stage of stages) {
    if (stage.timeoutMs !== undefined && !isValidTimeout(stage.timeoutMs)) {
      throw new ConfigurationError(
        `${unit}: stage "${stage.name}" timeout must be an integer between 1 and ${MAX_TIMEOUT_MS}ms, got ${stage.timeoutMs}`,
      );
    }
  }
}

export function assertNonEmpty(unit: string, stages: readonly Stage[]): void {
  if (stages.length === 0) {
    throw new ConfigurationError(`${unit} needs at least one stage`);
  }
}

export function assertUniqueNames(unit: string, stages: readonly Stage[]): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new ConfigurationError(`${unit} declares stage "${stage.name}" more than once`);
    }
    seen.add(stage.name);
  }
}

/** Stages that run concurrently must not share a single write field */
export function assertDisjointWrites(unit: string, stages: readonly Stage[]): void {
  const owners = new Map<string, string>();
  for (const stage of stages) {
    for (const field of stage.writes) {
      const owner = owners.get(field);
      if (owner !== undefined && owner !== stage.name) {
        throw new ContractViolation(
          `${unit}: stages "${owner}" and "${stage.name}" both declare write "${field}"`,
          [owner, stage.name],
        );
      }
      owners.set(field, stage.name);
    }
  }
}
