/**
 * Run event publisher.
 *
 * In-process observability sink: delivers run events to subscribers and
 * keeps a bounded history for inspection. Delivery is fire-and-forget.
 * A failing subscriber is logged and never affects the emitter or the
 * other subscribers.
 */

import { v4 as uuid } from 'uuid';
import {
  EventSubscription,
  ObservabilitySink,
  RunObservabilityEvent,
  RunObservabilityEventType,
} from '../domain/events';
import { errorMessage } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export interface RunEventPublisherOptions {
  /** Events retained for `recentEvents`. */
  historyLimit?: number;
  logger?: Logger;
}

export type SubscriptionInput = Omit<EventSubscription, 'id'> & { id?: string };

export interface EventQuery {
  runId?: string;
  jobId?: string;
  eventTypes?: RunObservabilityEventType[];
}

export class RunEventPublisher implements ObservabilitySink {
  private subscriptions: EventSubscription[] = [];
  private history: RunObservabilityEvent[] = [];
  private readonly historyLimit: number;
  private readonly log: Logger;

  constructor(options: RunEventPublisherOptions = {}) {
    this.historyLimit = options.historyLimit ?? 1000;
    this.log = (options.logger ?? rootLogger).child({ module: 'run-event-publisher' });
  }

  emit(event: RunObservabilityEvent): void {
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        const pending = sub.callback(event);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => this.reportSubscriberFailure(sub, event, err));
        }
      } catch (err) {
        this.reportSubscriberFailure(sub, event, err);
      }
    }
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(input: SubscriptionInput): () => void {
    const subscription: EventSubscription = { ...input, id: input.id ?? `sub_${uuid()}` };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Retained events, oldest first. */
  recentEvents(query: EventQuery = {}): RunObservabilityEvent[] {
    return this.history.filter(
      (event) =>
        (query.runId === undefined || event.runId === query.runId) &&
        (query.jobId === undefined || event.jobId === query.jobId) &&
        (!query.eventTypes?.length || query.eventTypes.includes(event.type)),
    );
  }

  private matchesSubscription(event: RunObservabilityEvent, sub: EventSubscription): boolean {
    if (sub.jobId && event.jobId !== sub.jobId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }

  private reportSubscriberFailure(sub: EventSubscription, event: RunObservabilityEvent, err: unknown): void {
    this.log.warn('Event subscriber failed', {
      subscriptionId: sub.id,
      eventType: event.type,
      runId: event.runId,
      error: errorMessage(err),
    });
  }
}

/**
 * Hand `event` to any sink without letting it fail the caller, whether
 * the sink throws or returns a rejected promise.
 */
export function emitSafely(sink: ObservabilitySink, event: RunObservabilityEvent, log: Logger = rootLogger): void {
  const report = (err: unknown) =>
    log.warn('Observability sink failed', { eventType: event.type, runId: event.runId, error: errorMessage(err) });
  try {
    const pending = sink.emit(event);
    if (pending instanceof Promise) pending.catch(report);
  } catch (err) {
    report(err);
  }
}
