/**
 * @module event-dispatcher/application
 * @description Subscription registries, the dispatcher facade and helpers
 */

export * from './logging';
export * from './subscriptions';
export * from './dispatcher';
export * from './helpers';
