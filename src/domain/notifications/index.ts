/**
 * @module event-dispatcher/domain/notifications
 */

export {
  NotificationStatus,
  DispatcherNotification,
  NotificationFactory,
  NotificationBuilder,
  defaultNotificationFactory,
} from './Notification';

export type {
  NotificationError,
  NotificationContent,
  NotificationProps,
} from './Notification';
