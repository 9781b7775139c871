// Domain events emitted during orchestration runs

import type { AgentName } from './agents.js';
import type { SectionType } from './document.js';
import type { RunState, RunStatus } from './run.js';

export interface EventPayloads {
  RunStarted: { documentId: string; mode: 'full' | 'chunked' };
  RunStateChanged: { documentId: string; state: RunState };
  AgentStarted: { documentId: string; agent: AgentName };
  AgentSucceeded: { documentId: string; agent: AgentName; durationMs: number };
  AgentFailed: { documentId: string; agent: AgentName; error: string };
  ChunkProcessed: { documentId: string; sequence: number; sectionType: SectionType };
  RunCompleted: { documentId: string; mode: 'full' | 'chunked'; status: RunStatus; errorCount: number };
  RunCancelled: { documentId: string; skipped: AgentName[] };
  RecordsPersisted: { documentId: string; inserted: Record<string, number>; errorCount: number };
}

export type DomainEventType = keyof EventPayloads;

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'RunStarted', 'RunStateChanged', 'AgentStarted', 'AgentSucceeded', 'AgentFailed',
  'ChunkProcessed', 'RunCompleted', 'RunCancelled', 'RecordsPersisted',
];

export interface DomainEvent<T extends DomainEventType = DomainEventType> {
  eventId: string;
  type: T;
  timestamp: Date;
  sourceContext: string;
  payload: EventPayloads[T];
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}
