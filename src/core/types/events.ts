// ---------------------------------------------------------------------------
// Mail2SMS — Core Event Types
// ---------------------------------------------------------------------------
// Modules report what happened to each transaction through typed events.
// Events are immutable records; nothing in the mail-to-SMS path waits on
// a subscriber.
// ---------------------------------------------------------------------------

/**
 * Canonical event envelope carried by the EventBus.
 *
 * @typeParam T  Payload shape. Defaults to `unknown` for untyped subscriptions.
 */
export interface GatewayEvent<T = unknown> {
  /** Dot-namespaced event type, e.g. `mail.received`, `sms.sent`. */
  readonly type: string;

  /** Module ID that produced this event. */
  readonly source: string;

  readonly timestamp: Date;

  /** SMTP session ID of the transaction this event belongs to, if any. */
  readonly correlationId?: string;

  readonly payload: T;
}

/**
 * Handler function invoked when a matching event arrives.
 * May return a Promise; the bus awaits all handlers before resolving.
 */
export type EventHandler<T = unknown> = (
  event: GatewayEvent<T>,
) => void | Promise<void>;

/**
 * Handle returned by `subscribe` / `subscribeOnce`.
 */
export interface EventSubscription {
  readonly id: string;
  readonly eventType: string;
  unsubscribe(): void;
}

/**
 * Public contract for the system event bus.
 */
export interface IEventBus {
  /**
   * Publish an event to all subscribers of the given type.
   * Returns after every handler has settled (resolved or rejected).
   */
  publish<T>(event: GatewayEvent<T>): Promise<void>;

  subscribe<T = unknown>(
    eventType: string,
    handler: EventHandler<T>,
  ): EventSubscription;

  /** Subscribe to the *next* occurrence of an event type, then auto-remove. */
  subscribeOnce<T = unknown>(
    eventType: string,
    handler: EventHandler<T>,
  ): EventSubscription;

  unsubscribe(subscriptionId: string): void;

  /**
   * Remove all subscriptions.
   * If `eventType` is supplied, only subscriptions for that type are removed.
   */
  unsubscribeAll(eventType?: string): void;

  listenerCount(eventType?: string): number;
}
