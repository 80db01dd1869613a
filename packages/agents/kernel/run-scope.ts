// Per-run scope shared by every kernel unit of one pipeline run

import { randomUUID } from 'node:crypto';
import type { DomainEventType, EventBus } from '../types/events.js';
import type { Logger } from '../utils/logger.js';

export interface RunScope {
  readonly runId: string;
  readonly events: EventBus;
  readonly logger: Logger;
  /** Applied to stages that do not declare their own timeoutMs */
  readonly defaultTimeoutMs: number;
}

export function emit(scope: RunScope, type: DomainEventType, payload: Record<string, unknown>): void {
  scope.events.emit({
    eventId: randomUUID(),
    type,
    timestamp: new Date(),
    runId: scope.runId,
    payload,
  });
}
