/**
 * Run event publisher.
 *
 * Persists versioned run and branch events and delivers them to in-process
 * subscribers. Publishing is observational: `safePublish` never throws, so
 * a failing store or subscriber cannot change a run's outcome.
 */

import { v4 as uuid } from 'uuid';
import { Run } from '../domain/run';
import { EventSubscription, RunEvent, RunEventType } from '../domain/events';
import { EventStore, ListOptions } from '../storage/store';
import { Logger, errorContext, logger as rootLogger } from '../logger';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export class RunEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private log: Logger;
  private now: () => Date;

  constructor(
    private events: EventStore,
    options: { logger?: Logger; now?: () => Date } = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'event-publisher' });
    this.now = options.now ?? (() => new Date());
  }

  /** Build a run lifecycle event from the run's current snapshot. */
  runEvent(run: Run, type: RunEventType, extra: Record<string, unknown> = {}): RunEvent {
    return {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: this.now().toISOString(),
      runId: run.id,
      payload: {
        state: run.state,
        checkpointSeq: run.checkpointSeq,
        ...(run.failureReason ? { failureReason: run.failureReason } : {}),
        ...(run.lastError !== null ? { lastError: run.lastError } : {}),
        ...extra,
      },
    };
  }

  branchEvent(runId: string, gapId: string, type: RunEventType, payload: Record<string, unknown> = {}): RunEvent {
    return {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: this.now().toISOString(),
      runId,
      gapId,
      payload,
    };
  }

  /** Persist and deliver an event. Store failures propagate. */
  async publish(event: RunEvent): Promise<RunEvent> {
    await this.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.log.warn('Event subscriber threw', {
          subscriptionId: sub.id,
          eventType: event.type,
          runId: event.runId,
          ...errorContext(err),
        });
      }
    }

    return event;
  }

  /** Publish, logging instead of throwing on failure. */
  async safePublish(event: RunEvent): Promise<void> {
    try {
      await this.publish(event);
    } catch (err) {
      this.log.error('Failed to publish event', {
        eventType: event.type,
        runId: event.runId,
        gapId: event.gapId,
        ...errorContext(err),
      });
    }
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByRun(runId: string, options?: ListOptions): Promise<RunEvent[]> {
    return this.events.listByRun(runId, options);
  }

  private matchesSubscription(event: RunEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
