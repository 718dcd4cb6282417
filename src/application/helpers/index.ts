export { subscribeToEvents, unsubscribeFromEvents } from './subscriptions';
export type { SubscriptionRequest } from './subscriptions';
