/**
 * @fileoverview Subscription Registry - per-event subscriber store and
 * dispatch engine
 *
 * @description
 * One registry exists per event name. It keeps two indexes:
 *
 * - `functionId → entry` for O(1) lookup and removal by subscription id
 * - `namespace → functionId[]` preserving registration order, which is the
 *   tie-breaker when two subscribers share a priority
 *
 * Every id listed under a namespace resolves to an entry, and an emptied
 * namespace is pruned from the index.
 *
 * @remarks
 * **Dispatch pass:**
 *
 * ```
 * 1. Snapshot the namespace's id list
 * 2. Resolve ids to entries (unknown ids are skipped)
 * 3. Stable-sort by priority, ascending
 * 4. Invoke each entry still registered; record result or error
 * 5. Retire non-persistent entries that ran
 * 6. Stamp event.lastNotified
 * ```
 *
 * Subscribers added during a pass do not run in that pass. Subscribers
 * removed during a pass (by themselves or by an earlier subscriber) are
 * skipped. A subscriber that throws never aborts the pass.
 *
 * @module event-dispatcher/application/subscriptions
 */

import {
  DuplicateSubscriptionException,
  InvalidArgumentException,
  SubscriptionNotFoundException,
} from '../../domain/exceptions';
import { DispatcherEvent } from '../../domain/events';
import {
  NotificationBuilder,
  NotificationError,
  NotificationStatus,
} from '../../domain/notifications';
import {
  CodeGenerator,
  IIdGenerator,
  SequentialIdGenerator,
  uuidCodeGenerator,
} from '../../domain/identity';
import { ILogger, consoleLogger } from '../logging';

/**
 * A subscriber function. Receives the event followed by any extra
 * arguments passed to `dispatch`.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type SubscriberCallback = (event: DispatcherEvent, ...args: any[]) => unknown;

/**
 * Subscription settings
 */
export interface SubscribeOptions {
  /** Keep the subscription after it fires (default: false, one-shot) */
  persistent?: boolean;

  /** Lower runs first (default: 0) */
  priority?: number;

  /**
   * Key for this subscriber's result in the notification content
   * (default: the function's own name, or `"anonymous"`)
   */
  name?: string;
}

/**
 * Read-only view of one subscription
 */
export interface SubscriberInfo {
  readonly functionId: string;
  readonly callback: SubscriberCallback;
  readonly persistent: boolean;
  readonly priority: number;
  readonly name: string;
}

/**
 * Pre-existing subscription used to seed a registry
 */
export interface SubscriberSeed extends SubscribeOptions {
  callback: SubscriberCallback;

  /** Reuse a known id instead of generating one */
  functionId?: string;
}

/**
 * Exactly one field selects what to remove
 */
export interface RegistryUnsubscribeSelector {
  functionId?: string;
  namespace?: string;
  callback?: SubscriberCallback;
}

/**
 * Exactly one field selects what to look for
 */
export interface RegistryContainsSelector {
  functionId?: string;
  namespace?: string;
  callback?: SubscriberCallback;
}

/**
 * Registry collaborators
 */
export interface SubscriptionRegistryOptions {
  /** Receives a warning for every subscriber failure (default: consoleLogger) */
  logger?: ILogger;

  /** Time source for `lastNotified` (default: `() => new Date()`) */
  clock?: () => Date;

  /** Generates subscription ids (default: UUID v4) */
  functionIds?: CodeGenerator;
}

interface SubscriberEntry extends SubscriberInfo {
  readonly namespace: string;
}

/**
 * Name a callback's result is stored under when no explicit name is given
 */
export function callbackName(callback: SubscriberCallback): string {
  return callback.name || 'anonymous';
}

function toNotificationError(
  error: unknown,
  entry: SubscriberEntry,
): NotificationError {
  return {
    functionId: entry.functionId,
    message: error instanceof Error ? error.message : String(error),
    callbackName: entry.name,
    namespace: entry.namespace,
    stack: error instanceof Error ? error.stack ?? '' : '',
  };
}

/**
 * SubscriptionRegistry - subscribers of one event name, grouped by namespace
 *
 * @example
 * ```typescript
 * const registry = new SubscriptionRegistryFactory().create();
 *
 * const id = registry.subscribe('billing', chargeCard, { priority: 1 });
 *
 * const builder = new NotificationBuilder()
 *   .withStart(new Date())
 *   .withEvent(event)
 *   .withNamespace('billing');
 * registry.dispatch(event, builder, 'billing');
 *
 * const notification = builder.withEnd(new Date()).build();
 * ```
 */
export class SubscriptionRegistry {
  private readonly entries: Map<string, SubscriberEntry> = new Map();
  private readonly namespaceIndex: Map<string, string[]> = new Map();
  private readonly logger: ILogger;
  private readonly clock: () => Date;
  private readonly functionIds: CodeGenerator;

  constructor(
    public readonly id: number,
    options: SubscriptionRegistryOptions = {},
    seeds: Record<string, SubscriberSeed[]> = {},
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => new Date());
    this.functionIds = options.functionIds ?? uuidCodeGenerator;

    for (const [namespace, namespaceSeeds] of Object.entries(seeds)) {
      for (const seed of namespaceSeeds) {
        this.register(namespace, seed.callback, seed, seed.functionId);
      }
    }
  }

  /**
   * Namespaces that currently hold at least one subscriber
   */
  get namespaces(): string[] {
    return Array.from(this.namespaceIndex.keys());
  }

  /**
   * Total number of subscriptions across all namespaces
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Register a callback under a namespace.
   *
   * @returns The new subscription's function id
   * @throws DuplicateSubscriptionException if `callback` is already
   * registered under `namespace`
   * @throws InvalidArgumentException if `priority` is not an integer
   */
  subscribe(
    namespace: string,
    callback: SubscriberCallback,
    options: SubscribeOptions = {},
  ): string {
    return this.register(namespace, callback, options);
  }

  /**
   * Invoke every subscriber of `namespace` and record the outcome on
   * `builder`.
   *
   * @returns The same builder, untouched when the namespace has no
   * subscribers
   */
  dispatch(
    event: DispatcherEvent,
    builder: NotificationBuilder,
    namespace: string,
    ...args: unknown[]
  ): NotificationBuilder {
    const ids = this.namespaceIndex.get(namespace);
    if (!ids) {
      return builder;
    }

    const snapshot: SubscriberEntry[] = [];
    for (const functionId of [...ids]) {
      const entry = this.entries.get(functionId);
      if (entry) {
        snapshot.push(entry);
      }
    }

    // Array.prototype.sort is stable, so equal priorities keep list order
    snapshot.sort((a, b) => a.priority - b.priority);

    const retired: string[] = [];

    for (const entry of snapshot) {
      // Removed by an earlier subscriber in this pass
      if (this.entries.get(entry.functionId) !== entry) {
        continue;
      }

      if (!entry.persistent) {
        retired.push(entry.functionId);
      }

      try {
        const result = entry.callback(event, ...args);
        builder.withContent({ [entry.name]: result });
        if (builder.status !== NotificationStatus.Failure) {
          builder.withStatus(NotificationStatus.Success);
        }
      } catch (error) {
        const failure = toNotificationError(error, entry);
        builder.withErrors(failure).withStatus(NotificationStatus.Failure);
        this.logger.warn(`Subscriber '${entry.name}' failed on event '${event.name}'`, {
          functionId: entry.functionId,
          namespace,
          error: failure.message,
        });
      }
    }

    for (const functionId of retired) {
      if (this.entries.has(functionId)) {
        this.removeEntry(functionId);
      }
    }

    event.markNotified(this.clock());
    return builder;
  }

  /**
   * Look up one subscription by id
   */
  getStatus(functionId: string): SubscriberInfo | undefined {
    const entry = this.entries.get(functionId);
    return entry ? toInfo(entry) : undefined;
  }

  /**
   * Subscribers of `namespace` in registration order; empty when the
   * namespace is unknown
   */
  getSubscribersForNamespace(namespace: string): SubscriberInfo[] {
    const ids = this.namespaceIndex.get(namespace) ?? [];
    const subscribers: SubscriberInfo[] = [];
    for (const functionId of ids) {
      const entry = this.entries.get(functionId);
      if (entry) {
        subscribers.push(toInfo(entry));
      }
    }
    return subscribers;
  }

  /**
   * @throws InvalidArgumentException if no selector is given
   */
  contains(selector: RegistryContainsSelector): boolean {
    if (selector.functionId !== undefined) {
      return this.entries.has(selector.functionId);
    }
    if (selector.namespace !== undefined) {
      return this.namespaceIndex.has(selector.namespace);
    }
    if (selector.callback !== undefined) {
      for (const entry of this.entries.values()) {
        if (entry.callback === selector.callback) {
          return true;
        }
      }
      return false;
    }
    throw new InvalidArgumentException(
      "At least one of 'functionId', 'namespace' or 'callback' must be provided",
    );
  }

  /**
   * Remove subscriptions by exactly one of id, namespace or callback.
   *
   * @throws InvalidArgumentException unless exactly one selector is given
   * @throws SubscriptionNotFoundException if nothing matches
   */
  unsubscribe(selector: RegistryUnsubscribeSelector): boolean {
    const given = [selector.functionId, selector.namespace, selector.callback].filter(
      (value) => value !== undefined,
    ).length;
    if (given !== 1) {
      throw new InvalidArgumentException(
        "Exactly one of 'functionId', 'namespace' or 'callback' must be provided",
        { given },
      );
    }

    if (selector.functionId !== undefined) {
      return this.unsubscribeByFunctionId(selector.functionId);
    }
    if (selector.namespace !== undefined) {
      return this.unsubscribeByNamespace(selector.namespace);
    }
    if (selector.callback !== undefined) {
      return this.unsubscribeByCallback(selector.callback);
    }
    return false;
  }

  /**
   * @throws SubscriptionNotFoundException if the id is unknown
   */
  unsubscribeByFunctionId(functionId: string): boolean {
    if (!this.entries.has(functionId)) {
      throw new SubscriptionNotFoundException('functionId', functionId);
    }
    this.removeEntry(functionId);
    return true;
  }

  /**
   * Remove every subscriber of a namespace.
   *
   * @throws SubscriptionNotFoundException if the namespace is unknown
   */
  unsubscribeByNamespace(namespace: string): boolean {
    const ids = this.namespaceIndex.get(namespace);
    if (!ids) {
      throw new SubscriptionNotFoundException('namespace', namespace);
    }
    this.namespaceIndex.delete(namespace);
    for (const functionId of ids) {
      this.entries.delete(functionId);
    }
    return true;
  }

  /**
   * Remove every subscription of `callback`, in all namespaces.
   *
   * @throws SubscriptionNotFoundException if the callback is not subscribed
   */
  unsubscribeByCallback(callback: SubscriberCallback): boolean {
    const matches: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.callback === callback) {
        matches.push(entry.functionId);
      }
    }
    if (matches.length === 0) {
      throw new SubscriptionNotFoundException('callback', callbackName(callback));
    }
    for (const functionId of matches) {
      this.removeEntry(functionId);
    }
    return true;
  }

  unsubscribeAll(): void {
    this.entries.clear();
    this.namespaceIndex.clear();
  }

  clear(): void {
    this.unsubscribeAll();
  }

  toString(): string {
    return `SubscriptionRegistry(id=${this.id}, namespaces=[${this.namespaces.join(', ')}], subscriptions=${this.size})`;
  }

  private register(
    namespace: string,
    callback: SubscriberCallback,
    options: SubscribeOptions,
    functionId: string = this.functionIds(),
  ): string {
    const priority = options.priority ?? 0;
    if (!Number.isInteger(priority)) {
      throw new InvalidArgumentException('Subscription priority must be an integer', {
        priority,
      });
    }
    // One id maps to one entry in one namespace
    if (this.entries.has(functionId)) {
      throw new InvalidArgumentException(`Function id '${functionId}' is already registered`, {
        functionId,
        namespace,
      });
    }

    const ids = this.namespaceIndex.get(namespace) ?? [];
    for (const existingId of ids) {
      if (this.entries.get(existingId)?.callback === callback) {
        throw new DuplicateSubscriptionException(
          namespace,
          options.name ?? callbackName(callback),
        );
      }
    }

    const entry: SubscriberEntry = {
      functionId,
      callback,
      namespace,
      persistent: options.persistent ?? false,
      priority,
      name: options.name ?? callbackName(callback),
    };

    ids.push(functionId);
    this.namespaceIndex.set(namespace, ids);
    this.entries.set(functionId, entry);
    return functionId;
  }

  private removeEntry(functionId: string): void {
    const entry = this.entries.get(functionId);
    if (!entry) {
      return;
    }
    this.entries.delete(functionId);

    const ids = this.namespaceIndex.get(entry.namespace);
    if (!ids) {
      return;
    }
    const index = ids.indexOf(functionId);
    if (index !== -1) {
      ids.splice(index, 1);
    }
    if (ids.length === 0) {
      this.namespaceIndex.delete(entry.namespace);
    }
  }
}

function toInfo(entry: SubscriberEntry): SubscriberInfo {
  return {
    functionId: entry.functionId,
    callback: entry.callback,
    persistent: entry.persistent,
    priority: entry.priority,
    name: entry.name,
  };
}

/**
 * Creates registries with fresh ids.
 */
export class SubscriptionRegistryFactory {
  constructor(
    private readonly ids: IIdGenerator = new SequentialIdGenerator(),
    private readonly options: SubscriptionRegistryOptions = {},
  ) {}

  create(seeds?: Record<string, SubscriberSeed[]>): SubscriptionRegistry {
    return new SubscriptionRegistry(this.ids.next(), this.options, seeds);
  }
}

/**
 * Builds a registry pre-populated with subscribers.
 *
 * @example
 * ```typescript
 * const registry = new SubscriptionRegistryBuilder()
 *   .withSubscribers('audit', [{ callback: writeAuditLog, persistent: true }])
 *   .build();
 * ```
 */
export class SubscriptionRegistryBuilder {
  private readonly seeds: Record<string, SubscriberSeed[]> = {};

  constructor(
    private readonly factory: SubscriptionRegistryFactory = new SubscriptionRegistryFactory(),
  ) {}

  withSubscribers(namespace: string, seeds: SubscriberSeed[]): this {
    this.seeds[namespace] = [...(this.seeds[namespace] ?? []), ...seeds];
    return this;
  }

  build(): SubscriptionRegistry {
    return this.factory.create(this.seeds);
  }
}
