/**
 * @module event-dispatcher/domain/events
 * @description Event value type, factory and builder
 */

export {
  DispatcherEvent,
  DispatcherEventFactory,
  DispatcherEventBuilder,
  defaultEventFactory,
} from './DispatcherEvent';

export type { EventData } from './DispatcherEvent';

export { resolveEvent } from './resolveEvent';
export type { EventReference } from './resolveEvent';
