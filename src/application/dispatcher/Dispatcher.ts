/**
 * @fileoverview Dispatcher - top-level publish/subscribe facade
 *
 * @description
 * The dispatcher owns one {@link SubscriptionRegistry} per event name and
 * routes subscribe, dispatch and unsubscribe calls to it. A registry is
 * created on the first subscription to an event name and lives until the
 * event is unsubscribed as a whole (or `unsubscribeAll()` runs).
 *
 * @remarks
 * **Error policy:**
 *
 * - A subscriber throwing during dispatch is recorded on the returned
 *   notification; `dispatch()` itself never throws because of it
 * - Every other failure (duplicate subscription, unknown id, missing
 *   selector) propagates synchronously to the caller
 *
 * @module event-dispatcher/application/dispatcher
 */

import {
  InvalidArgumentException,
  SubscriptionNotFoundException,
} from '../../domain/exceptions';
import {
  DispatcherEvent,
  DispatcherEventFactory,
  EventReference,
  defaultEventFactory,
  resolveEvent,
} from '../../domain/events';
import {
  DispatcherNotification,
  NotificationBuilder,
  NotificationFactory,
  defaultNotificationFactory,
} from '../../domain/notifications';
import { ILogger, consoleLogger } from '../logging';
import {
  SubscribeOptions,
  SubscriberCallback,
  SubscriberInfo,
  SubscriptionRegistry,
  SubscriptionRegistryFactory,
  callbackName,
} from '../subscriptions';

/**
 * Dispatcher configuration options
 */
export interface DispatcherOptions {
  /** Dispatcher name, used in log messages */
  name?: string;

  /** Custom logger (default: consoleLogger) */
  logger?: ILogger;

  /** Time source for notification start/end and `lastNotified` */
  clock?: () => Date;

  /** Creates events for subscriptions given by bare name */
  eventFactory?: DispatcherEventFactory;

  /** Numbers the notifications returned by `dispatch` */
  notificationFactory?: NotificationFactory;

  /**
   * Creates per-event registries. When omitted, a factory sharing this
   * dispatcher's logger and clock is used.
   */
  registryFactory?: SubscriptionRegistryFactory;
}

/**
 * Exactly one field selects what to remove
 */
export interface UnsubscribeSelector {
  functionId?: string;
  event?: EventReference;
  callback?: SubscriberCallback;
  namespace?: string;
}

/**
 * Removals applied by `bulkUnsubscribe`, in this order
 */
export interface BulkUnsubscribeRequest {
  functionIds?: Iterable<string>;
  events?: Iterable<EventReference>;
  callbacks?: Iterable<SubscriberCallback>;
  namespaces?: Iterable<string>;
}

function eventNameOf(event: EventReference): string {
  return typeof event === 'string' ? event : event.name;
}

/**
 * Dispatcher - routes events to namespaced subscribers
 *
 * @example
 * ```typescript
 * const dispatcher = createDispatcher({ name: 'orders' });
 *
 * dispatcher.subscribe('OrderPlaced', function reserveStock(event) {
 *   return inventory.reserve(event.get('sku'));
 * }, GLOBAL, { persistent: true });
 *
 * const event = new DispatcherEventBuilder()
 *   .withName('OrderPlaced')
 *   .withData({ sku: 'sku-1' })
 *   .build();
 *
 * const notification = dispatcher.dispatch(event, GLOBAL);
 * notification.handle(); // throws if any subscriber failed
 * ```
 */
export class Dispatcher {
  readonly name: string;
  private readonly subscriptions: Map<string, SubscriptionRegistry> = new Map();
  private readonly logger: ILogger;
  private readonly clock: () => Date;
  private readonly eventFactory: DispatcherEventFactory;
  private readonly notificationFactory: NotificationFactory;
  private readonly registryFactory: SubscriptionRegistryFactory;

  constructor(options: DispatcherOptions = {}) {
    this.name = options.name ?? 'dispatcher';
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => new Date());
    this.eventFactory = options.eventFactory ?? defaultEventFactory;
    this.notificationFactory = options.notificationFactory ?? defaultNotificationFactory;
    this.registryFactory =
      options.registryFactory ??
      new SubscriptionRegistryFactory(undefined, {
        logger: this.logger,
        clock: this.clock,
      });
  }

  /**
   * Registries keyed by event name
   */
  get registries(): ReadonlyMap<string, SubscriptionRegistry> {
    return this.subscriptions;
  }

  /**
   * Registry for an event name, if any subscription was ever made to it
   */
  get(eventName: string): SubscriptionRegistry | undefined {
    return this.subscriptions.get(eventName);
  }

  /**
   * Subscribe `callback` to an event within a namespace.
   *
   * @param event - Event instance or bare event name
   * @returns The subscription's function id
   * @throws DuplicateSubscriptionException if `callback` is already
   * subscribed to this event and namespace
   */
  subscribe(
    event: EventReference,
    callback: SubscriberCallback,
    namespace: string,
    options: SubscribeOptions = {},
  ): string {
    const resolved = resolveEvent(event, this.eventFactory);

    let registry = this.subscriptions.get(resolved.name);
    if (!registry) {
      registry = this.registryFactory.create();
      this.subscriptions.set(resolved.name, registry);
      this.logger.debug(`[${this.name}] Created registry for event '${resolved.name}'`, {
        registryId: registry.id,
      });
    }

    return registry.subscribe(namespace, callback, options);
  }

  /**
   * Subscribe the same callback to several events, in order.
   */
  bulkSubscribe(
    events: Iterable<EventReference>,
    callback: SubscriberCallback,
    namespace: string,
    options: SubscribeOptions = {},
  ): string[] {
    const functionIds: string[] = [];
    for (const event of events) {
      functionIds.push(this.subscribe(event, callback, namespace, options));
    }
    return functionIds;
  }

  /**
   * Run every subscriber of `event` in `namespace`.
   *
   * @param args - Extra arguments passed to each subscriber after the event
   * @returns The notification for this pass; empty with Success status when
   * nothing is subscribed
   */
  dispatch(
    event: DispatcherEvent,
    namespace: string,
    ...args: unknown[]
  ): DispatcherNotification {
    const builder = new NotificationBuilder(this.notificationFactory)
      .withStart(this.clock())
      .withEvent(event)
      .withNamespace(namespace);

    const registry = this.subscriptions.get(event.name);
    if (registry) {
      registry.dispatch(event, builder, namespace, ...args);
    }

    return builder.withEnd(this.clock()).build();
  }

  /**
   * Dispatch each event independently, in order. A failing subscriber in
   * one dispatch does not affect the others.
   */
  bulkDispatch(
    events: Iterable<DispatcherEvent>,
    namespace: string,
    ...args: unknown[]
  ): DispatcherNotification[] {
    const notifications: DispatcherNotification[] = [];
    for (const event of events) {
      notifications.push(this.dispatch(event, namespace, ...args));
    }
    return notifications;
  }

  /**
   * Subscribers of `namespace` across every event, grouped by registry
   * creation order
   */
  getSubscribersForNamespace(namespace: string): SubscriberInfo[] {
    const subscribers: SubscriberInfo[] = [];
    for (const registry of this.subscriptions.values()) {
      subscribers.push(...registry.getSubscribersForNamespace(namespace));
    }
    return subscribers;
  }

  /**
   * Remove subscriptions by exactly one of id, event, callback or namespace.
   *
   * @throws InvalidArgumentException unless exactly one selector is given
   */
  unsubscribe(selector: UnsubscribeSelector): boolean {
    const given = [
      selector.functionId,
      selector.event,
      selector.callback,
      selector.namespace,
    ].filter((value) => value !== undefined).length;
    if (given !== 1) {
      throw new InvalidArgumentException(
        "Exactly one of 'functionId', 'event', 'callback' or 'namespace' must be provided",
        { given },
      );
    }

    if (selector.functionId !== undefined) {
      return this.unsubscribeByFunctionId(selector.functionId);
    }
    if (selector.event !== undefined) {
      return this.unsubscribeByEvent(selector.event);
    }
    if (selector.callback !== undefined) {
      return this.unsubscribeByCallback(selector.callback);
    }
    if (selector.namespace !== undefined) {
      return this.unsubscribeByNamespace(selector.namespace);
    }
    return false;
  }

  /**
   * Apply each kind of removal in turn: ids, events, callbacks, namespaces.
   * The first failure propagates; removals before it stay applied.
   *
   * @returns One result per removal performed
   */
  bulkUnsubscribe(request: BulkUnsubscribeRequest): boolean[] {
    const results: boolean[] = [];
    for (const functionId of request.functionIds ?? []) {
      results.push(this.unsubscribeByFunctionId(functionId));
    }
    for (const event of request.events ?? []) {
      results.push(this.unsubscribeByEvent(event));
    }
    for (const callback of request.callbacks ?? []) {
      results.push(this.unsubscribeByCallback(callback));
    }
    for (const namespace of request.namespaces ?? []) {
      results.push(this.unsubscribeByNamespace(namespace));
    }
    return results;
  }

  /**
   * @throws SubscriptionNotFoundException if no registry holds the id
   */
  unsubscribeByFunctionId(functionId: string): boolean {
    for (const registry of this.subscriptions.values()) {
      if (registry.contains({ functionId })) {
        return registry.unsubscribeByFunctionId(functionId);
      }
    }
    throw new SubscriptionNotFoundException('functionId', functionId);
  }

  /**
   * Drop the event's registry with all its subscriptions.
   *
   * @throws SubscriptionNotFoundException if the event has no registry
   */
  unsubscribeByEvent(event: EventReference): boolean {
    const eventName = eventNameOf(event);
    if (!this.subscriptions.delete(eventName)) {
      throw new SubscriptionNotFoundException('event', eventName);
    }
    this.logger.debug(`[${this.name}] Removed registry for event '${eventName}'`);
    return true;
  }

  /**
   * Remove `callback` from every registry and namespace it appears in.
   *
   * @throws SubscriptionNotFoundException only if no registry held it
   */
  unsubscribeByCallback(callback: SubscriberCallback): boolean {
    let found = false;
    for (const registry of this.subscriptions.values()) {
      if (registry.contains({ callback })) {
        registry.unsubscribeByCallback(callback);
        found = true;
      }
    }
    if (!found) {
      throw new SubscriptionNotFoundException('callback', callbackName(callback));
    }
    return true;
  }

  /**
   * Remove a namespace from every registry that has it.
   *
   * @returns Whether any registry held the namespace
   */
  unsubscribeByNamespace(namespace: string): boolean {
    let found = false;
    for (const registry of this.subscriptions.values()) {
      if (registry.contains({ namespace })) {
        registry.unsubscribeByNamespace(namespace);
        found = true;
      }
    }
    return found;
  }

  /**
   * Drop every registry
   */
  unsubscribeAll(): void {
    this.subscriptions.clear();
  }

  toString(): string {
    return `Dispatcher(name=${this.name}, events=[${Array.from(this.subscriptions.keys()).join(', ')}])`;
  }
}

/**
 * Create a new dispatcher
 */
export function createDispatcher(options: DispatcherOptions = {}): Dispatcher {
  return new Dispatcher(options);
}

/**
 * Process-wide dispatcher for convenience
 */
export const globalDispatcher = new Dispatcher({ name: 'global' });
