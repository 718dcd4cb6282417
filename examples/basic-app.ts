/**
 * event-dispatcher v0.1.0 - Basic Example
 *
 * Demonstrates the core concepts:
 * - Building events with a payload
 * - Persistent and one-shot subscriptions with priorities
 * - Reading results and failures from a notification
 * - Unsubscribing by id and by namespace
 */

import {
  Dispatcher,
  DispatcherEvent,
  DispatcherEventBuilder,
  DispatcherException,
  GLOBAL,
  LOCAL,
  NotificationStatus,
  createDispatcher,
} from '../src/index';

// ==================== Subscribers ====================

function validateOrder(event: DispatcherEvent): boolean {
  const quantity = event.get('quantity');
  if (typeof quantity !== 'number' || quantity <= 0) {
    throw new Error(`Invalid quantity: ${String(quantity)}`);
  }
  return true;
}

function priceOrder(event: DispatcherEvent, unitPrice: number): number {
  const quantity = Number(event.get('quantity'));
  const total = quantity * unitPrice;
  event.set('total', total);
  return total;
}

function sendWelcomeCoupon(event: DispatcherEvent): string {
  return `coupon-for-${String(event.get('customerId'))}`;
}

// ==================== Main ====================

function report(label: string, dispatcher: Dispatcher, event: DispatcherEvent, namespace: string, ...args: unknown[]) {
  const notification = dispatcher.dispatch(event, namespace, ...args);
  console.log(`--- ${label} ---`);
  console.log('Status:', notification.status);
  console.log('Content:', JSON.stringify(notification.content));
  if (notification.status === NotificationStatus.Failure) {
    for (const error of notification.errors) {
      console.log(`  ${error.callbackName} failed: ${error.message}`);
    }
  }
  console.log();
}

function main() {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  event-dispatcher v0.1.0 - Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const dispatcher = createDispatcher({ name: 'orders' });

  // Validation runs before pricing regardless of subscription order
  dispatcher.subscribe('OrderPlaced', priceOrder, GLOBAL, { persistent: true, priority: 10 });
  dispatcher.subscribe('OrderPlaced', validateOrder, GLOBAL, { persistent: true, priority: 0 });

  // One-shot: fires on the first order only
  const couponId = dispatcher.subscribe('OrderPlaced', sendWelcomeCoupon, LOCAL);

  const order = new DispatcherEventBuilder()
    .withName('OrderPlaced')
    .withData({ customerId: 'customer-1', quantity: 3 })
    .build();

  console.log('Event created:', order.toString(), '\n');

  report('Dispatch 1: global', dispatcher, order, GLOBAL, 5);
  report('Dispatch 2: local (coupon fires)', dispatcher, order, LOCAL);
  report('Dispatch 3: local (coupon already retired)', dispatcher, order, LOCAL);

  order.set('quantity', 0);
  report('Dispatch 4: global (validation fails)', dispatcher, order, GLOBAL, 5);

  try {
    dispatcher.unsubscribeByFunctionId(couponId);
  } catch (error) {
    if (error instanceof DispatcherException) {
      console.log(`Expected failure (${error.code}): ${error.message}\n`);
    } else {
      throw error;
    }
  }

  dispatcher.unsubscribeByNamespace(GLOBAL);
  console.log('Remaining:', dispatcher.toString());

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

main();
