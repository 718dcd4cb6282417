/**
 * event-dispatcher - Exceptions
 *
 * Error taxonomy for the dispatcher. Every failure except a subscriber
 * callback throwing during dispatch surfaces as one of these classes.
 */

/**
 * Discriminator carried by every dispatcher exception
 */
export type DispatcherErrorCode =
  | 'CONFIGURATION'
  | 'DUPLICATE_SUBSCRIPTION'
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'IMMUTABLE'
  | 'AMBIGUOUS_RESULT'
  | 'NOTIFICATION_FAILED';

/**
 * Base dispatcher exception class
 */
export class DispatcherException extends Error {
  constructor(
    public readonly code: DispatcherErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DispatcherException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A builder was asked to build without its required fields
 */
export class ConfigurationException extends DispatcherException {
  constructor(
    message: string = 'Invalid Configuration',
    public readonly missingFields: string[] = [],
  ) {
    super('CONFIGURATION', message, { missingFields });
    this.name = 'ConfigurationException';
  }
}

/**
 * The same callback was subscribed twice to one namespace
 */
export class DuplicateSubscriptionException extends DispatcherException {
  constructor(
    public readonly namespace: string,
    public readonly callbackName: string,
  ) {
    super(
      'DUPLICATE_SUBSCRIPTION',
      `Function '${callbackName}' is already subscribed to namespace '${namespace}'`,
      { namespace, callbackName },
    );
    this.name = 'DuplicateSubscriptionException';
  }
}

/**
 * What an unsubscribe call was looking for
 */
export type SubscriptionSelectorKind =
  | 'functionId'
  | 'namespace'
  | 'event'
  | 'callback';

/**
 * An unsubscribe target does not exist
 */
export class SubscriptionNotFoundException extends DispatcherException {
  constructor(
    public readonly selector: SubscriptionSelectorKind,
    public readonly value: string,
  ) {
    super('NOT_FOUND', `No subscription found for ${selector} '${value}'`, {
      selector,
      value,
    });
    this.name = 'SubscriptionNotFoundException';
  }
}

/**
 * A payload or content key is missing
 */
export class KeyNotFoundException extends DispatcherException {
  constructor(
    public readonly key: string,
    source: string,
  ) {
    super('NOT_FOUND', `Key '${key}' not found in ${source}`, { key, source });
    this.name = 'KeyNotFoundException';
  }
}

/**
 * Caller supplied none (or more than one) of a set of exclusive selectors
 */
export class InvalidArgumentException extends DispatcherException {
  constructor(message: string = 'Invalid Argument', details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details);
    this.name = 'InvalidArgumentException';
  }
}

/**
 * Write attempted on a field that is immutable once built
 */
export class ImmutabilityException extends DispatcherException {
  constructor(public readonly field: string, owner: string) {
    super(
      'IMMUTABLE',
      `The '${field}' attribute of ${owner} is immutable. Use the builder to set it.`,
      { field, owner },
    );
    this.name = 'ImmutabilityException';
  }
}

/**
 * More than one result exists where exactly one was expected
 */
export class AmbiguousResultException extends DispatcherException {
  constructor(public readonly functionNames: string[]) {
    super(
      'AMBIGUOUS_RESULT',
      `Notification content has ${functionNames.length} results (${functionNames.join(', ')}). Expected exactly one result.`,
      { functionNames },
    );
    this.name = 'AmbiguousResultException';
  }
}

/**
 * Raised by `DispatcherNotification.handle()` when any subscriber failed
 */
export class NotificationFailedException extends DispatcherException {
  constructor(
    public readonly notificationId: number,
    public readonly failures: ReadonlyArray<{ callbackName: string; message: string }>,
  ) {
    super(
      'NOTIFICATION_FAILED',
      `Notification ${notificationId} has ${failures.length} error(s): ${failures
        .map((failure) => `${failure.callbackName}: ${failure.message}`)
        .join('; ')}`,
      { notificationId },
    );
    this.name = 'NotificationFailedException';
  }
}
