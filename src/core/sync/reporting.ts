import type { ReportingSink, SyncEvent, SyncEventKind } from './types';

export type EventCounts = Record<SyncEventKind, number>;

const emptyCounts = (): EventCounts => ({
  'remote-ref-created': 0,
  'remote-ref-updated': 0,
  'remote-ref-deleted': 0,
  'new-remote-branch': 0,
  updated: 0,
  deleted: 0,
  'switched-and-deleted': 0,
  skipped: 0,
  warning: 0,
  failed: 0,
});

/**
 * Counts events by kind and forwards them to another sink
 */
export class EventTally implements ReportingSink {
  readonly counts: EventCounts = emptyCounts();

  constructor(private readonly next: ReportingSink) {}

  emit(event: SyncEvent): void {
    this.counts[event.kind]++;
    this.next.emit(event);
  }
}

/**
 * Keeps every event; used by tests and by callers that render afterwards.
 */
export class CollectingSink implements ReportingSink {
  readonly events: SyncEvent[] = [];

  emit(event: SyncEvent): void {
    this.events.push(event);
  }

  ofKind<K extends SyncEventKind>(kind: K): Extract<SyncEvent, { kind: K }>[] {
    return this.events.filter((event): event is Extract<SyncEvent, { kind: K }> => event.kind === kind);
  }
}
