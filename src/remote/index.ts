/**
 * Remote telemetry platform client.
 *
 * @packageDocumentation
 */

export {
  HttpTransport,
  REMOTE_ERROR_CODES,
  readRemoteError,
  type HttpTransportOptions,
  type RemoteTransport,
} from './transport.js';
export {
  SessionFactory,
  StaticCredentialStore,
  withRemoteSession,
  type CredentialStore,
  type RemoteSession,
} from './session.js';
export {
  expectShape,
  formatSchemaErrors,
  type CreateItemResponse,
  type LoginResponse,
  type MutationResponse,
  type NotificationDataResponse,
  type RemoteItem,
  type SearchItemsResponse,
} from './schemas.js';
export {
  GET_NOTIFICATION_DATA_SVC,
  UPDATE_NOTIFICATION_SVC,
  notificationExists,
  sendNotificationEnable,
  sendNotificationMutation,
} from './notifications-api.js';
export {
  BASE_DATA_FLAG,
  RemoteUnitDirectory,
  StaticUnitDirectory,
  ensureNotificationResource,
  searchItems,
  type DirectoryItem,
  type RemoteItemType,
  type UnitDirectory,
} from './resources.js';
