// ---------------------------------------------------------------------------
// Mail2SMS — EventBus Implementation
// ---------------------------------------------------------------------------
// Async publish/subscribe. Handlers for one event run concurrently and a
// failing handler never prevents the others from running. Failures are
// logged, not re-thrown: a broken subscriber must not change the SMTP reply.
// ---------------------------------------------------------------------------

import {
  IEventBus,
  EventHandler,
  EventSubscription,
  GatewayEvent,
} from '../types/events';
import { ILogger } from '../types/module';
import { generateId } from '../../shared/utils';

interface Subscription {
  id: string;
  eventType: string;
  handler: EventHandler;
  once: boolean;
}

export class EventBus implements IEventBus {
  /** Event type → subscriptions, in subscription order. */
  private readonly subscriptions = new Map<string, Subscription[]>();
  private readonly logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger.child('EventBus');
  }

  // ── Publish ──────────────────────────────────────────────────────────────

  async publish<T>(event: GatewayEvent<T>): Promise<void> {
    const subs = this.subscriptions.get(event.type);
    if (!subs || subs.length === 0) {
      this.logger.debug('No subscribers for event', { type: event.type, source: event.source });
      return;
    }

    // Snapshot: handlers may subscribe or unsubscribe while we iterate
    const snapshot = [...subs];
    for (const sub of snapshot) {
      if (sub.once) this.removeSub(sub.id);
    }

    const results = await Promise.allSettled(
      snapshot.map(async (sub) => sub.handler(event)),
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(
          'Event handler failed',
          result.reason instanceof Error ? result.reason : new Error(String(result.reason)),
          { eventType: event.type, correlationId: event.correlationId },
        );
      }
    }
  }

  // ── Subscribe ────────────────────────────────────────────────────────────

  subscribe<T = unknown>(eventType: string, handler: EventHandler<T>): EventSubscription {
    return this.addSub(eventType, handler, false);
  }

  subscribeOnce<T = unknown>(eventType: string, handler: EventHandler<T>): EventSubscription {
    return this.addSub(eventType, handler, true);
  }

  // ── Unsubscribe ──────────────────────────────────────────────────────────

  unsubscribe(subscriptionId: string): void {
    this.removeSub(subscriptionId);
  }

  unsubscribeAll(eventType?: string): void {
    if (eventType) {
      this.subscriptions.delete(eventType);
    } else {
      this.subscriptions.clear();
    }
  }

  listenerCount(eventType?: string): number {
    if (eventType) {
      return this.subscriptions.get(eventType)?.length ?? 0;
    }
    let total = 0;
    for (const subs of this.subscriptions.values()) {
      total += subs.length;
    }
    return total;
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private addSub<T>(eventType: string, handler: EventHandler<T>, once: boolean): EventSubscription {
    const id = generateId();
    // Publishers and subscribers agree on T by event type name only
    const erased = (event: GatewayEvent): void | Promise<void> =>
      handler(event as GatewayEvent<T>);

    const list = this.subscriptions.get(eventType) ?? [];
    list.push({ id, eventType, handler: erased, once });
    this.subscriptions.set(eventType, list);

    return {
      id,
      eventType,
      unsubscribe: () => this.removeSub(id),
    };
  }

  private removeSub(subscriptionId: string): void {
    for (const [type, subs] of this.subscriptions) {
      const idx = subs.findIndex((s) => s.id === subscriptionId);
      if (idx === -1) continue;
      subs.splice(idx, 1);
      if (subs.length === 0) this.subscriptions.delete(type);
      return;
    }
  }
}
