/**
 * @fileoverview Dispatcher Notification - result record of one dispatch call
 *
 * @description
 * A notification aggregates what happened while an event was dispatched to
 * one namespace: the value each subscriber returned (keyed by subscriber
 * name), the error raised by each subscriber that failed, an overall status
 * and the wall-clock window of the pass.
 *
 * Notifications are assembled incrementally through a
 * {@link NotificationBuilder} while subscribers fire, then frozen by
 * `build()`.
 *
 * @module event-dispatcher/domain/notifications
 */

import {
  AmbiguousResultException,
  ConfigurationException,
  ImmutabilityException,
  KeyNotFoundException,
  NotificationFailedException,
} from '../exceptions';
import { DispatcherEvent } from '../events';
import { IIdGenerator, SequentialIdGenerator } from '../identity';

/**
 * Outcome of a dispatch pass
 */
export enum NotificationStatus {
  Success = 'success',
  Failure = 'failure',
}

/**
 * One subscriber failure recorded during dispatch
 */
export interface NotificationError {
  /** Subscription id of the failing subscriber */
  readonly functionId: string;

  /** Message of the thrown error */
  readonly message: string;

  /** Name the subscriber was registered under */
  readonly callbackName: string;

  /** Namespace being dispatched */
  readonly namespace: string;

  /** Stack trace of the thrown error, empty when it had none */
  readonly stack: string;
}

/**
 * Subscriber name → returned value
 */
export type NotificationContent = Readonly<Record<string, unknown>>;

/**
 * Fields a notification is constructed from
 */
export interface NotificationProps {
  id: number;
  event: DispatcherEvent;
  namespace: string;
  start: Date;
  end: Date;
  status: NotificationStatus;
  content?: Record<string, unknown>;
  errors?: NotificationError[];
}

/**
 * DispatcherNotification - immutable outcome of one dispatch call
 *
 * @example
 * ```typescript
 * const notification = dispatcher.dispatch(event, 'billing');
 *
 * if (notification.hasErrors()) {
 *   for (const error of notification.errors) {
 *     logger.error(`${error.callbackName} failed: ${error.message}`);
 *   }
 * }
 *
 * const total = notification.getOneAndOnlyResult();
 * ```
 */
export class DispatcherNotification {
  readonly id: number;
  readonly event: DispatcherEvent;
  readonly namespace: string;
  readonly start: Date;
  readonly end: Date;
  readonly status: NotificationStatus;
  readonly content: NotificationContent;
  readonly errors: readonly NotificationError[];

  constructor(props: NotificationProps) {
    this.id = props.id;
    this.event = props.event;
    this.namespace = props.namespace;
    this.start = props.start;
    this.end = props.end;
    this.status = props.status;
    this.content = Object.freeze({ ...(props.content ?? {}) });
    this.errors = Object.freeze((props.errors ?? []).map((error) => Object.freeze({ ...error })));
  }

  /**
   * Length of the dispatch pass in seconds
   */
  get duration(): number {
    return (this.end.getTime() - this.start.getTime()) / 1000;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.content, key);
  }

  /**
   * @throws KeyNotFoundException if no subscriber result is stored under `key`
   */
  get(key: string): unknown {
    if (!this.has(key)) {
      throw new KeyNotFoundException(key, 'notification content');
    }
    return this.content[key];
  }

  /**
   * Content is fixed at build time; this always throws.
   *
   * @throws ImmutabilityException
   */
  set(_key: string, _value: unknown): never {
    throw new ImmutabilityException('content', 'DispatcherNotification');
  }

  getFunctionNames(): string[] {
    return Object.keys(this.content);
  }

  getFunctionResults(): unknown[] {
    return Object.values(this.content);
  }

  /**
   * Result of the single subscriber that ran.
   *
   * @returns `undefined` when no subscriber produced a result
   * @throws AmbiguousResultException when more than one did
   */
  getOneAndOnlyResult(): unknown {
    const names = this.getFunctionNames();
    if (names.length === 0) {
      return undefined;
    }
    if (names.length === 1) {
      return this.content[names[0]];
    }
    throw new AmbiguousResultException(names);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /**
   * Assert that every subscriber succeeded.
   *
   * @throws NotificationFailedException carrying the recorded failures
   */
  handle(): true {
    if (this.hasErrors()) {
      throw new NotificationFailedException(this.id, this.errors);
    }
    return true;
  }

  toString(): string {
    return (
      `DispatcherNotification(id=${this.id}, event=${this.event.name}, namespace=${this.namespace}, ` +
      `status=${this.status}, content=${JSON.stringify(this.content)}, errors=${this.errors.length}, ` +
      `duration=${this.duration})`
    );
  }
}

/**
 * Creates notifications with fresh ids.
 */
export class NotificationFactory {
  constructor(private readonly ids: IIdGenerator = new SequentialIdGenerator()) {}

  create(props: Omit<NotificationProps, 'id'>): DispatcherNotification {
    return new DispatcherNotification({ ...props, id: this.ids.next() });
  }
}

export const defaultNotificationFactory = new NotificationFactory();

/**
 * Accumulates a notification while subscribers fire.
 *
 * @remarks
 * `end`, `event`, `namespace` and `start` are required; status defaults to
 * {@link NotificationStatus.Success}.
 */
export class NotificationBuilder {
  private content: Record<string, unknown> = {};
  private errors: NotificationError[] = [];
  private _status?: NotificationStatus;
  private event?: DispatcherEvent;
  private namespace?: string;
  private start?: Date;
  private end?: Date;

  constructor(
    private readonly factory: NotificationFactory = defaultNotificationFactory,
  ) {}

  /**
   * Status set so far, `undefined` until a subscriber has run
   */
  get status(): NotificationStatus | undefined {
    return this._status;
  }

  /**
   * Merge subscriber results into the content
   */
  withContent(content: Record<string, unknown>): this {
    Object.assign(this.content, content);
    return this;
  }

  /**
   * Append error records
   */
  withErrors(...errors: NotificationError[]): this {
    this.errors.push(...errors);
    return this;
  }

  withEnd(value: Date): this {
    this.end = value;
    return this;
  }

  withEvent(value: DispatcherEvent): this {
    this.event = value;
    return this;
  }

  withNamespace(value: string): this {
    this.namespace = value;
    return this;
  }

  withStart(value: Date): this {
    this.start = value;
    return this;
  }

  withStatus(value: NotificationStatus): this {
    this._status = value;
    return this;
  }

  /**
   * @throws ConfigurationException listing every missing required field
   */
  build(): DispatcherNotification {
    const { end, event, namespace, start } = this;
    if (end === undefined || event === undefined || namespace === undefined || start === undefined) {
      const missing = Object.entries({ end, event, namespace, start })
        .filter(([, value]) => value === undefined)
        .map(([key]) => key);
      throw new ConfigurationException(
        `Missing required attributes to build DispatcherNotification: ${missing.join(', ')}`,
        missing,
      );
    }

    return this.factory.create({
      end,
      event,
      namespace,
      start,
      status: this._status ?? NotificationStatus.Success,
      content: this.content,
      errors: this.errors,
    });
  }
}
