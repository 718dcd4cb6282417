/**
 * @fileoverview Unit tests for the Dispatcher facade
 */

import {
  Dispatcher,
  DispatcherEvent,
  DispatcherEventFactory,
  DispatcherOptions,
  DuplicateSubscriptionException,
  InvalidArgumentException,
  NotificationFactory,
  NotificationStatus,
  SequentialIdGenerator,
  SubscriptionNotFoundException,
  createDispatcher,
} from '../../../src';

// ============================================================================
// Helpers
// ============================================================================

function createTestDispatcher(options: DispatcherOptions = {}): Dispatcher {
  let counter = 0;
  return createDispatcher({
    name: 'test',
    logger: createTestLogger(),
    eventFactory: new DispatcherEventFactory(new SequentialIdGenerator(), () => `code-${++counter}`),
    notificationFactory: new NotificationFactory(new SequentialIdGenerator()),
    ...options,
  });
}

function createEvent(name: string, id: number = 20000): DispatcherEvent {
  return new DispatcherEvent(`code-${name}`, id, name);
}

// ============================================================================
// Test Suite
// ============================================================================

describe('Dispatcher', () => {
  // ==========================================================================
  // SUBSCRIBE
  // ==========================================================================

  describe('subscribe', () => {
    it('should create a registry lazily per event name', () => {
      const logger = createTestLogger();
      const dispatcher = createTestDispatcher({ logger });

      expect(dispatcher.get('Ping')).toBeUndefined();

      dispatcher.subscribe('Ping', () => 1, 'test');
      dispatcher.subscribe(createEvent('Ping'), () => 2, 'test');

      expect(dispatcher.registries.size).toBe(1);
      expect(dispatcher.get('Ping')?.size).toBe(2);
      expect(logger.debug).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith("[test] Created registry for event 'Ping'", {
        registryId: 10000,
      });
    });

    it('should reject a duplicate within the same event and namespace', () => {
      const dispatcher = createTestDispatcher();
      const handler = () => 1;

      dispatcher.subscribe('Ping', handler, 'test');

      expect(() => dispatcher.subscribe('Ping', handler, 'test')).toThrow(
        DuplicateSubscriptionException,
      );
      expect(() => dispatcher.subscribe('Ping', handler, 'other')).not.toThrow();
      expect(() => dispatcher.subscribe('Pong', handler, 'test')).not.toThrow();
    });

    it('should subscribe one callback to many events', () => {
      const dispatcher = createTestDispatcher();
      const handler = () => 1;

      const functionIds = dispatcher.bulkSubscribe(['Ping', 'Pong', createEvent('Pang')], handler, 'test', {
        persistent: true,
      });

      expect(functionIds).toHaveLength(3);
      expect(new Set(functionIds).size).toBe(3);
      expect(Array.from(dispatcher.registries.keys())).toEqual(['Ping', 'Pong', 'Pang']);
      expect(dispatcher.get('Pong')?.getStatus(functionIds[1])?.persistent).toBe(true);
    });
  });

  // ==========================================================================
  // DISPATCH
  // ==========================================================================

  describe('dispatch', () => {
    it('should return an empty successful notification without subscribers', () => {
      const dispatcher = createTestDispatcher();
      const event = createEvent('Nobody');

      const notification = dispatcher.dispatch(event, 'test');

      expect(notification.content).toEqual({});
      expect(notification.errors).toEqual([]);
      expect(notification.status).toBe(NotificationStatus.Success);
      expect(notification.event).toBe(event);
      expect(notification.namespace).toBe('test');
      expect(notification.end.getTime()).toBeGreaterThanOrEqual(notification.start.getTime());
    });

    it('should stamp start and end from the clock', () => {
      const times = [new Date(1000), new Date(1250)];
      const dispatcher = createTestDispatcher({ clock: () => times.shift() ?? new Date(9999) });

      const notification = dispatcher.dispatch(createEvent('Nobody'), 'test');

      expect(notification.start.getTime()).toBe(1000);
      expect(notification.end.getTime()).toBe(1250);
      expect(notification.duration).toBe(0.25);
    });

    it('should route by event name and namespace', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', function ping() {
        return 'ping';
      }, 'test', { persistent: true });
      dispatcher.subscribe('Ping', function elsewhere() {
        return 'elsewhere';
      }, 'other', { persistent: true });
      dispatcher.subscribe('Pong', function pong() {
        return 'pong';
      }, 'test', { persistent: true });

      const notification = dispatcher.dispatch(createEvent('Ping'), 'test');

      expect(notification.content).toEqual({ ping: 'ping' });
    });

    it('should forward extra arguments', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Add', function add(_event: DispatcherEvent, a: number, b: number) {
        return a + b;
      }, 'test');

      const notification = dispatcher.dispatch(createEvent('Add'), 'test', 2, 3);

      expect(notification.getOneAndOnlyResult()).toBe(5);
    });

    it('should number notifications from its factory', () => {
      const dispatcher = createTestDispatcher();

      const first = dispatcher.dispatch(createEvent('Ping'), 'test');
      const second = dispatcher.dispatch(createEvent('Ping'), 'test');

      expect([first.id, second.id]).toEqual([10000, 10001]);
    });

    it('should dispatch a batch independently', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', function fails() {
        throw new Error('ping failed');
      }, 'test', { persistent: true });
      dispatcher.subscribe('Pong', function works() {
        return 'pong';
      }, 'test', { persistent: true });

      const notifications = dispatcher.bulkDispatch([createEvent('Ping'), createEvent('Pong')], 'test');

      expect(notifications.map((notification) => notification.status)).toEqual([
        NotificationStatus.Failure,
        NotificationStatus.Success,
      ]);
      expect(notifications[1].content).toEqual({ works: 'pong' });
    });

    it('should list subscribers of a namespace across events', () => {
      const dispatcher = createTestDispatcher();
      const a = () => 'a';
      const b = () => 'b';
      dispatcher.subscribe('Ping', a, 'test');
      dispatcher.subscribe('Pong', b, 'test');
      dispatcher.subscribe('Pong', () => 'c', 'other');

      const subscribers = dispatcher.getSubscribersForNamespace('test');

      expect(subscribers.map((subscriber) => subscriber.callback)).toEqual([a, b]);
    });
  });

  // ==========================================================================
  // UNSUBSCRIBE
  // ==========================================================================

  describe('unsubscribe', () => {
    it('should require exactly one selector', () => {
      const dispatcher = createTestDispatcher();

      expect(() => dispatcher.unsubscribe({})).toThrow(InvalidArgumentException);
      expect(() => dispatcher.unsubscribe({ event: 'Ping', namespace: 'test' })).toThrow(
        InvalidArgumentException,
      );
    });

    it('should remove by function id from whichever registry holds it', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');
      const functionId = dispatcher.subscribe('Pong', () => 2, 'test');

      expect(dispatcher.unsubscribe({ functionId })).toBe(true);
      expect(dispatcher.get('Pong')?.size).toBe(0);
      expect(dispatcher.get('Ping')?.size).toBe(1);
    });

    it('should fail to remove an unknown function id', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');

      expect(() => dispatcher.unsubscribeByFunctionId('missing')).toThrow(
        SubscriptionNotFoundException,
      );
    });

    it('should drop an event registry', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');

      expect(dispatcher.unsubscribe({ event: createEvent('Ping') })).toBe(true);
      expect(dispatcher.get('Ping')).toBeUndefined();
      expect(() => dispatcher.unsubscribeByEvent('Ping')).toThrow(
        "No subscription found for event 'Ping'",
      );
    });

    it('should remove a callback from every registry', () => {
      const dispatcher = createTestDispatcher();
      const shared = () => 'shared';
      dispatcher.subscribe('Ping', shared, 'test');
      dispatcher.subscribe('Pong', shared, 'other');
      dispatcher.subscribe('Pang', () => 'unrelated', 'test');

      expect(dispatcher.unsubscribe({ callback: shared })).toBe(true);
      expect(dispatcher.get('Ping')?.size).toBe(0);
      expect(dispatcher.get('Pong')?.size).toBe(0);
      expect(dispatcher.get('Pang')?.size).toBe(1);
    });

    it('should fail to remove a callback found nowhere', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');
      function stranger() {}

      expect(() => dispatcher.unsubscribeByCallback(stranger)).toThrow(
        "No subscription found for callback 'stranger'",
      );
    });

    it('should remove a namespace and keep the others', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');
      dispatcher.subscribe('Ping', function kept() {
        return 'kept';
      }, 'other', { persistent: true });
      dispatcher.subscribe('Pong', () => 2, 'test');

      expect(dispatcher.unsubscribe({ namespace: 'test' })).toBe(true);

      expect(dispatcher.getSubscribersForNamespace('test')).toEqual([]);
      expect(dispatcher.dispatch(createEvent('Ping'), 'other').content).toEqual({ kept: 'kept' });
    });

    it('should report a namespace held by no registry', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');

      expect(dispatcher.unsubscribeByNamespace('missing')).toBe(false);
    });

    it('should apply bulk removals in order', () => {
      const dispatcher = createTestDispatcher();
      const shared = () => 'shared';
      const byId = dispatcher.subscribe('Ping', () => 1, 'test');
      dispatcher.subscribe('Pong', () => 2, 'test');
      dispatcher.subscribe('Pang', shared, 'test');
      dispatcher.subscribe('Pang', () => 3, 'other');

      const results = dispatcher.bulkUnsubscribe({
        functionIds: [byId],
        events: ['Pong'],
        callbacks: [shared],
        namespaces: ['other', 'missing'],
      });

      expect(results).toEqual([true, true, true, true, false]);
      expect(Array.from(dispatcher.registries.keys())).toEqual(['Ping', 'Pang']);
      expect(dispatcher.get('Pang')?.size).toBe(0);
    });

    it('should propagate the first bulk removal failure', () => {
      const dispatcher = createTestDispatcher();
      const first = dispatcher.subscribe('Ping', () => 1, 'test');

      expect(() =>
        dispatcher.bulkUnsubscribe({ functionIds: [first, 'missing'], events: ['Ping'] }),
      ).toThrow(SubscriptionNotFoundException);
      expect(dispatcher.get('Ping')?.size).toBe(0);
      expect(dispatcher.get('Ping')).toBeDefined();
    });

    it('should drop everything', () => {
      const dispatcher = createTestDispatcher();
      dispatcher.subscribe('Ping', () => 1, 'test');
      dispatcher.subscribe('Pong', () => 1, 'test');

      dispatcher.unsubscribeAll();

      expect(dispatcher.registries.size).toBe(0);
      expect(dispatcher.toString()).toBe('Dispatcher(name=test, events=[])');
    });
  });

  it('should default its name', () => {
    expect(new Dispatcher({ logger: createTestLogger() }).name).toBe('dispatcher');
  });
});
