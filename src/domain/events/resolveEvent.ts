import {
  DispatcherEvent,
  DispatcherEventFactory,
  defaultEventFactory,
} from './DispatcherEvent';

/**
 * An event given either by name or as an instance
 */
export type EventReference = string | DispatcherEvent;

/**
 * Turn an {@link EventReference} into a canonical event, creating one for a
 * bare name.
 */
export function resolveEvent(
  reference: EventReference,
  factory: DispatcherEventFactory = defaultEventFactory,
): DispatcherEvent {
  return typeof reference === 'string' ? factory.create(reference) : reference;
}
