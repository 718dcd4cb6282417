/**
 * @fileoverview Unit tests for the package entry point
 */

import * as domain from '../../src/domain';
import * as application from '../../src/application';
import EventDispatcher, {
  Dispatcher,
  DispatcherEvent,
  GLOBAL,
  SubscriptionRegistry,
  VERSION,
  subscribeToEvents,
} from '../../src';

describe('package entry point', () => {
  it('should re-export the domain layer', () => {
    expect(DispatcherEvent).toBe(domain.DispatcherEvent);
    expect(GLOBAL).toBe(domain.GLOBAL);
  });

  it('should re-export the application layer', () => {
    expect(Dispatcher).toBe(application.Dispatcher);
    expect(SubscriptionRegistry).toBe(application.SubscriptionRegistry);
    expect(subscribeToEvents).toBe(application.subscribeToEvents);
  });

  it('should export the dispatcher as default', () => {
    expect(EventDispatcher).toBe(Dispatcher);
  });

  it('should expose the package version', () => {
    expect(VERSION).toBe('0.1.0');
  });
});
