/**
 * @fileoverview Dispatcher Event - the unit of work handed to subscribers
 *
 * @description
 * An event pairs an immutable identity (`code`, `id`, `name`) with a mutable
 * key/value payload. The `name` selects which subscription registry a
 * dispatch is routed to; the payload is free for subscribers to read and
 * write while the event travels through a dispatch pass.
 *
 * @remarks
 * Payload mutation is not atomic. Subscribers run one after another on the
 * same call stack, so a later subscriber sees every write made by an earlier
 * one in the same pass.
 *
 * @module event-dispatcher/domain/events
 */

import { ConfigurationException, KeyNotFoundException } from '../exceptions';
import {
  CodeGenerator,
  IIdGenerator,
  SequentialIdGenerator,
  uuidCodeGenerator,
} from '../identity';

/**
 * Event payload map
 */
export type EventData = Record<string, unknown>;

/**
 * DispatcherEvent - named event carrying a mutable payload
 *
 * @example
 * ```typescript
 * const event = new DispatcherEventBuilder()
 *   .withName('OrderPlaced')
 *   .withData({ orderId: 'order-1' })
 *   .build();
 *
 * event.get('orderId'); // 'order-1'
 * event.set('total', 42);
 * ```
 */
export class DispatcherEvent {
  private readonly _data: EventData;
  private _lastNotified?: Date;

  constructor(
    public readonly code: string,
    public readonly id: number,
    public readonly name: string,
    data: EventData = {},
  ) {
    this._data = { ...data };
  }

  /**
   * Live payload map. Writes through this object are visible to every
   * holder of the event.
   */
  get data(): EventData {
    return this._data;
  }

  /**
   * When the event was last dispatched, or `undefined` if never.
   */
  get lastNotified(): Date | undefined {
    return this._lastNotified;
  }

  /**
   * Stamp the event as dispatched. Called by the subscription registry at
   * the end of a dispatch pass.
   */
  markNotified(at: Date): void {
    this._lastNotified = at;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this._data, key);
  }

  /**
   * Read a payload value.
   *
   * @throws KeyNotFoundException if the key is absent
   */
  get(key: string): unknown {
    if (!this.has(key)) {
      throw new KeyNotFoundException(key, 'event data');
    }
    return this._data[key];
  }

  set(key: string, value: unknown): void {
    this._data[key] = value;
  }

  clear(): void {
    for (const key of Object.keys(this._data)) {
      delete this._data[key];
    }
  }

  isEmpty(): boolean {
    return Object.keys(this._data).length === 0;
  }

  /**
   * Two events are equal iff code, id and name all match. The payload and
   * `lastNotified` do not take part.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof DispatcherEvent)) {
      return false;
    }
    return (
      this.code === other.code && this.id === other.id && this.name === other.name
    );
  }

  compareTo(other: DispatcherEvent): boolean {
    return this.equals(other);
  }

  toString(): string {
    return `DispatcherEvent(code=${this.code}, id=${this.id}, name=${this.name}, data=${JSON.stringify(this._data)})`;
  }
}

/**
 * Creates events with fresh ids and codes.
 */
export class DispatcherEventFactory {
  constructor(
    private readonly ids: IIdGenerator = new SequentialIdGenerator(),
    private readonly codes: CodeGenerator = uuidCodeGenerator,
  ) {}

  create(name: string, data?: EventData): DispatcherEvent {
    return new DispatcherEvent(this.codes(), this.ids.next(), name, data);
  }
}

/**
 * Factory used by builders and by `Dispatcher.subscribe` when none is injected
 */
export const defaultEventFactory = new DispatcherEventFactory();

/**
 * Fluent builder for {@link DispatcherEvent}. `name` is required.
 */
export class DispatcherEventBuilder {
  private name?: string;
  private data: EventData = {};

  constructor(private readonly factory: DispatcherEventFactory = defaultEventFactory) {}

  /**
   * Merge entries into the payload
   */
  withData(data: EventData): this {
    this.data = { ...this.data, ...data };
    return this;
  }

  withName(value: string): this {
    this.name = value;
    return this;
  }

  /**
   * @throws ConfigurationException if no name was set
   */
  build(): DispatcherEvent {
    if (this.name === undefined) {
      throw new ConfigurationException(
        'Missing required attributes to build DispatcherEvent: name',
        ['name'],
      );
    }
    return this.factory.create(this.name, this.data);
  }
}
