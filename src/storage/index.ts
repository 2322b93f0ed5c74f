/**
 * Local notification storage.
 *
 * @packageDocumentation
 */

export { InMemoryNotificationRepository, type NotificationRepository } from './repository.js';
export {
  JsonFileNotificationRepository,
  STORAGE_FORMAT_VERSION,
  parseStoredNotifications,
  type StoredNotifications,
} from './json-file.js';
