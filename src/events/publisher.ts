/**
 * Pipeline event publisher.
 *
 * Records lifecycle events per run and fans them out to in-process
 * subscribers (CLI progress output, the HTTP explorer). Publication is
 * observational: a failing subscriber is logged and skipped.
 */

import { v4 as uuid } from 'uuid';
import { PipelineEvent, PipelineEventType, EventSubscription } from '../domain/events';
import { Logger, logger as rootLogger } from '../logger';
import { EventStore } from '../storage/store';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export class EventPublisher {
  private subscriptions: EventSubscription[] = [];
  private log: Logger;

  constructor(private store: EventStore, log: Logger = rootLogger) {
    this.log = log.child({ component: 'events' });
  }

  /** Publish an event of the given type for a run. */
  async publish(
    runId: string,
    type: PipelineEventType,
    fields: { jobId?: string; variant?: string; version?: string; payload?: Record<string, unknown> } = {},
  ): Promise<PipelineEvent> {
    const event: PipelineEvent = {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId,
      jobId: fields.jobId,
      variant: fields.variant,
      version: fields.version,
      payload: fields.payload ?? {},
    };

    await this.store.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.log.warn('Event subscriber threw', { subscription: sub.id, eventType: event.type, error: String(err) });
      }
    }
    return event;
  }

  /** Subscribe to events; returns an unsubscribe function. */
  subscribe(subscription: Omit<EventSubscription, 'id'>): () => void {
    const entry: EventSubscription = { ...subscription, id: `sub_${uuid()}` };
    this.subscriptions.push(entry);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== entry.id);
    };
  }

  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    return this.store.listByRun(runId, { eventTypes, limit: Number.MAX_SAFE_INTEGER });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && sub.runId !== event.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
