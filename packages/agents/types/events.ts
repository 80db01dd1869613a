// Pipeline domain events
// Emitted by the driver and kernel at run, stage, group and verdict boundaries

import { createLogger, errorMessage } from '../utils/logger.js';

export type DomainEventType =
  // Run lifecycle
  | 'RunStarted'
  | 'RunCompleted'
  | 'RunFailed'
  // Stage execution
  | 'StageStarted'
  | 'StageSucceeded'
  | 'StageFailed'
  | 'GroupMerged'
  // Feedback loop
  | 'VerdictIssued'
  | 'RevisionRequested';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'RunStarted', 'RunCompleted', 'RunFailed',
  'StageStarted', 'StageSucceeded', 'StageFailed', 'GroupMerged',
  'VerdictIssued', 'RevisionRequested',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  runId: string;
  payload: T;
}

export type DomainEventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: DomainEventHandler): void;
  off(type: DomainEventType, handler: DomainEventHandler): void;
}

export type HandlerErrorSink = (err: unknown, event: DomainEvent) => void;

const eventLog = createLogger('EventBus');

const logHandlerError: HandlerErrorSink = (err, event) => {
  eventLog.warn('Event handler threw', { type: event.type, runId: event.runId, error: errorMessage(err) });
};

// Simple in-process event bus implementation.
// A throwing handler is reported to the error sink and never reaches the emitter.
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<DomainEventHandler>>();

  constructor(private readonly onHandlerError: HandlerErrorSink = logHandlerError) {}

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers) return;
    for (const handler of typeHandlers) {
      try {
        handler(event);
      } catch (err) {
        this.onHandlerError(err, event);
      }
    }
  }

  on(type: DomainEventType, handler: DomainEventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: DomainEventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}
