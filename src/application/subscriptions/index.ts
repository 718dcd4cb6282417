/**
 * @module event-dispatcher/application/subscriptions
 */

export {
  SubscriptionRegistry,
  SubscriptionRegistryFactory,
  SubscriptionRegistryBuilder,
  callbackName,
} from './SubscriptionRegistry';

export type {
  SubscriberCallback,
  SubscribeOptions,
  SubscriberInfo,
  SubscriberSeed,
  RegistryUnsubscribeSelector,
  RegistryContainsSelector,
  SubscriptionRegistryOptions,
} from './SubscriptionRegistry';
