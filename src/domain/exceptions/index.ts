/**
 * event-dispatcher - Exception Module
 */

export {
  DispatcherException,
  ConfigurationException,
  DuplicateSubscriptionException,
  SubscriptionNotFoundException,
  KeyNotFoundException,
  InvalidArgumentException,
  ImmutabilityException,
  AmbiguousResultException,
  NotificationFailedException,
} from './exceptions';

export type { DispatcherErrorCode, SubscriptionSelectorKind } from './exceptions';
