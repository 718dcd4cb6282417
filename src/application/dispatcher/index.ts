/**
 * @module event-dispatcher/application/dispatcher
 */

export { Dispatcher, createDispatcher, globalDispatcher } from './Dispatcher';

export type {
  DispatcherOptions,
  UnsubscribeSelector,
  BulkUnsubscribeRequest,
} from './Dispatcher';
