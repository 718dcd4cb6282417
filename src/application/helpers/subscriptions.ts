/**
 * event-dispatcher - Subscription helpers
 *
 * Batch wrappers over a dispatcher. Both default to {@link globalDispatcher}.
 */

import { GLOBAL } from '../../domain/constants';
import { EventReference } from '../../domain/events';
import { Dispatcher, globalDispatcher } from '../dispatcher';
import { SubscribeOptions, SubscriberCallback } from '../subscriptions';

/**
 * One subscription to make
 */
export interface SubscriptionRequest extends SubscribeOptions {
  event: EventReference;
  callback: SubscriberCallback;

  /** Default: {@link GLOBAL} */
  namespace?: string;
}

/**
 * Subscribe every request in order.
 *
 * @returns Function ids, one per request
 * @throws The first subscription error; earlier subscriptions stay in place
 */
export function subscribeToEvents(
  requests: Iterable<SubscriptionRequest>,
  dispatcher: Dispatcher = globalDispatcher,
): string[] {
  const functionIds: string[] = [];
  for (const { event, callback, namespace, ...options } of requests) {
    functionIds.push(dispatcher.subscribe(event, callback, namespace ?? GLOBAL, options));
  }
  return functionIds;
}

/**
 * Remove every subscription by id, in order.
 *
 * @returns Number of subscriptions removed
 * @throws SubscriptionNotFoundException for the first unknown id
 */
export function unsubscribeFromEvents(
  functionIds: Iterable<string>,
  dispatcher: Dispatcher = globalDispatcher,
): number {
  let removed = 0;
  for (const functionId of functionIds) {
    dispatcher.unsubscribeByFunctionId(functionId);
    removed++;
  }
  return removed;
}
