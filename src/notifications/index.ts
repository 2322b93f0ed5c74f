/**
 * Notification records.
 *
 * @packageDocumentation
 */

export type { Notification, NotificationChanges, NotificationInput } from './types.js';
export {
  applyChanges,
  assertNotificationInputValid,
  materializeNotification,
  prepareNotification,
  renderDelivery,
  validateNotificationInput,
  type PendingNotification,
} from './model.js';
