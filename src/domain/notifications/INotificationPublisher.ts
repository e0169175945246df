import { Notification, NotificationPayload, NotificationType } from './Notification';

/**
 * Producer side of the notification path: appends to the pending list.
 */
export interface INotificationPublisher {
  publish<T extends NotificationType>(type: T, payload: NotificationPayload<T>): Promise<Notification>;
}
