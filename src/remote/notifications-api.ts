/**
 * Notification calls against the remote platform.
 *
 * @packageDocumentation
 */

import { RemoteApiError } from '../errors.js';
import type { NotificationEnableRequest, NotificationMutationRequest } from '../wire/encoder.js';
import {
  expectShape,
  validateMutationResponse,
  validateNotificationDataResponse,
} from './schemas.js';
import type { RemoteSession } from './session.js';

/** Service that creates, updates, deletes and enables notifications. */
export const UPDATE_NOTIFICATION_SVC = 'resource/update_notification';

/** Service that reads notifications of a resource. */
export const GET_NOTIFICATION_DATA_SVC = 'resource/get_notification_data';

/**
 * Sends a create, update or delete request.
 *
 * @param session - Open session.
 * @param request - Request built by the wire encoder.
 * @returns The notification id reported by the platform.
 * @throws RemoteApiError on failure or when a create yields no usable id.
 */
export async function sendNotificationMutation(
  session: RemoteSession,
  request: NotificationMutationRequest
): Promise<number> {
  const body = await session.call(UPDATE_NOTIFICATION_SVC, request);
  const [id] = expectShape(UPDATE_NOTIFICATION_SVC, body, validateMutationResponse);
  if (request.callMode === 'create' && id <= 0) {
    throw new RemoteApiError(
      `Remote create returned invalid notification id ${String(id)}`,
      'malformed_response',
      UPDATE_NOTIFICATION_SVC
    );
  }
  return id;
}

/**
 * Sends an enable or disable request.
 *
 * @param session - Open session.
 * @param request - Request built by the wire encoder.
 */
export async function sendNotificationEnable(
  session: RemoteSession,
  request: NotificationEnableRequest
): Promise<void> {
  const body = await session.call(UPDATE_NOTIFICATION_SVC, request);
  expectShape(UPDATE_NOTIFICATION_SVC, body, validateMutationResponse);
}

/**
 * Asks the platform whether a notification still exists.
 *
 * @param session - Open session.
 * @param resourceId - Resource holding the notification.
 * @param remoteId - Notification id on the platform.
 */
export async function notificationExists(
  session: RemoteSession,
  resourceId: number,
  remoteId: number
): Promise<boolean> {
  const body = await session.call(GET_NOTIFICATION_DATA_SVC, {
    itemId: resourceId,
    col: [remoteId],
    flags: 0,
  });
  const items = expectShape(GET_NOTIFICATION_DATA_SVC, body, validateNotificationDataResponse);
  return items.some((item) => item.id === remoteId);
}
