/**
 * Notification synchronizer.
 *
 * Keeps local notification records and their remote counterparts in step.
 * Every mutation is an explicit two-phase sequence: the remote call goes
 * first and gates the local write; when the local write then fails, a
 * compensating remote call undoes the first phase. Remote failures are
 * surfaced to the caller and never retried.
 *
 * @packageDocumentation
 */

import { NotificationNotFoundError, RemoteApiError, errorMessage } from '../errors.js';
import {
  applyChanges,
  assertNotificationInputValid,
  materializeNotification,
  prepareNotification,
} from '../notifications/model.js';
import type { Notification, NotificationChanges, NotificationInput } from '../notifications/types.js';
import {
  notificationExists,
  sendNotificationEnable,
  sendNotificationMutation,
} from '../remote/notifications-api.js';
import { ensureNotificationResource } from '../remote/resources.js';
import type { SessionFactory } from '../remote/session.js';
import type { NotificationRepository } from '../storage/repository.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import type { DeliveryEndpoints } from '../wire/delivery.js';
import {
  buildCreateRequest,
  buildDeleteRequest,
  buildEnableRequest,
  buildUpdateRequest,
  encodeNotificationParams,
  type EncodableNotification,
} from '../wire/encoder.js';

/**
 * Options for {@link NotificationSynchronizer}.
 */
export interface NotificationSynchronizerOptions {
  readonly sessions: SessionFactory;
  readonly repository: NotificationRepository;
  /** Callback endpoints used to render delivery actions. */
  readonly endpoints: DeliveryEndpoints;
  /** Name of the remote resource that holds notifications (default: `Fleet Notify Alerts`). */
  readonly resourceName?: string;
  readonly logger?: Logger;
  /** Time source for record timestamps. */
  readonly clock?: () => Date;
}

/**
 * Tells whether two notifications encode to the same remote payload.
 *
 * @param a - First notification.
 * @param b - Second notification.
 */
export function sameRemoteState(a: EncodableNotification, b: EncodableNotification): boolean {
  return (
    a.resourceId === b.resourceId &&
    JSON.stringify(encodeNotificationParams(a)) === JSON.stringify(encodeNotificationParams(b))
  );
}

/**
 * Creates, updates, deletes and toggles notifications on the remote platform
 * and in the local repository.
 *
 * @example
 * ```typescript
 * const synchronizer = new NotificationSynchronizer({ sessions, repository, endpoints });
 * const notification = await synchronizer.create(input);
 * await synchronizer.disable(notification.customerId, notification.id);
 * ```
 */
export class NotificationSynchronizer {
  private readonly sessions: SessionFactory;
  private readonly repository: NotificationRepository;
  private readonly endpoints: DeliveryEndpoints;
  private readonly resourceName: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  /**
   * Creates a new NotificationSynchronizer.
   *
   * @param options - Collaborators and settings.
   */
  constructor(options: NotificationSynchronizerOptions) {
    this.sessions = options.sessions;
    this.repository = options.repository;
    this.endpoints = options.endpoints;
    this.resourceName = options.resourceName ?? 'Fleet Notify Alerts';
    this.logger = options.logger ?? new SilentLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Returns a customer's notification.
   *
   * @throws NotificationNotFoundError if it does not exist for the customer.
   */
  async get(customerId: number, id: string): Promise<Notification> {
    const notification = await this.repository.get(customerId, id);
    if (notification === null) {
      throw new NotificationNotFoundError(id);
    }
    return notification;
  }

  /**
   * Lists a customer's notifications.
   */
  async list(customerId: number): Promise<readonly Notification[]> {
    return this.repository.listByCustomer(customerId);
  }

  /**
   * Returns the notification a workflow submission created, or null when it
   * has not been committed.
   */
  async findByDraft(customerId: number, draftId: string): Promise<Notification | null> {
    return this.repository.findByDraftId(customerId, draftId);
  }

  /**
   * Finds the customer's notification resource on the platform, creating it
   * when it does not exist yet.
   *
   * @param customerId - The customer.
   * @returns The resource id.
   */
  async ensureNotificationResource(customerId: number): Promise<number> {
    const resourceId = await this.sessions.run(customerId, (session) =>
      ensureNotificationResource(session, this.resourceName)
    );
    this.logger.info('notification_resource_resolved', { customerId, resourceId });
    return resourceId;
  }

  /**
   * Creates a notification remotely, then stores it locally.
   *
   * Nothing is stored when the remote create fails. When the local insert
   * fails, the remote notification is deleted again and the insert error is
   * rethrown.
   *
   * @param input - The notification to create.
   * @returns The stored record, carrying the remote id.
   * @throws InvalidNotificationError before any remote call if the input is invalid.
   * @throws MissingCredentialError before any remote call if the customer has no token.
   * @throws RemoteApiError if the remote create fails.
   */
  async create(input: NotificationInput): Promise<Notification> {
    assertNotificationInputValid(input);
    const pending = prepareNotification(input, this.endpoints);

    const remoteId = await this.sessions.run(input.customerId, (session) =>
      sendNotificationMutation(session, buildCreateRequest(pending))
    );
    const notification = materializeNotification(pending, remoteId, this.clock());
    this.logger.info('remote_create_succeeded', { customerId: input.customerId, remoteId });

    try {
      await this.repository.insert(notification);
    } catch (error) {
      this.logger.error('local_insert_failed', { customerId: input.customerId, remoteId, error: errorMessage(error) });
      await this.compensate(notification.customerId, 'delete', remoteId, () =>
        this.sessions.run(notification.customerId, (session) =>
          sendNotificationMutation(session, buildDeleteRequest(remoteId, notification))
        )
      );
      throw error;
    }

    this.logger.info('notification_created', { customerId: input.customerId, id: notification.id, remoteId });
    return notification;
  }

  /**
   * Applies edits. The remote update is sent only when the encoded payload
   * changes; local-only edits such as the label never reach the platform.
   *
   * @param customerId - Owner of the notification.
   * @param id - Local id.
   * @param changes - Edits to apply.
   * @returns The updated record.
   * @throws NotificationNotFoundError if it does not exist for the customer.
   * @throws InvalidNotificationError if the edited notification is invalid.
   * @throws RemoteApiError if the remote update fails; the local record is then unchanged.
   */
  async update(customerId: number, id: string, changes: NotificationChanges): Promise<Notification> {
    const current = await this.get(customerId, id);
    const next = applyChanges(current, changes, this.endpoints, this.clock());
    assertNotificationInputValid(next);

    if (sameRemoteState(current, next)) {
      await this.repository.update(next);
      this.logger.debug('local_only_update', { customerId, id });
      return next;
    }

    await this.sessions.run(customerId, (session) =>
      sendNotificationMutation(session, buildUpdateRequest(current.remoteId, next))
    );

    try {
      await this.repository.update(next);
    } catch (error) {
      this.logger.error('local_update_failed', { customerId, id, error: errorMessage(error) });
      await this.compensate(customerId, 'update', current.remoteId, () =>
        this.sessions.run(customerId, (session) =>
          sendNotificationMutation(session, buildUpdateRequest(current.remoteId, current))
        )
      );
      throw error;
    }

    this.logger.info('notification_updated', { customerId, id, remoteId: current.remoteId });
    return next;
  }

  /**
   * Deletes a notification remotely, then locally.
   *
   * When the remote delete fails, the platform is asked whether the
   * notification still exists; the local record is removed only when it is
   * confirmed absent. Otherwise the error propagates and the record is kept.
   *
   * @param customerId - Owner of the notification.
   * @param id - Local id.
   * @throws NotificationNotFoundError if it does not exist for the customer.
   * @throws RemoteApiError if the remote delete fails and the notification may still exist.
   */
  async delete(customerId: number, id: string): Promise<void> {
    const current = await this.get(customerId, id);

    await this.sessions.run(customerId, async (session) => {
      try {
        await sendNotificationMutation(session, buildDeleteRequest(current.remoteId, current));
      } catch (error) {
        if (!(error instanceof RemoteApiError)) {
          throw error;
        }
        const stillExists = await notificationExists(session, current.resourceId, current.remoteId).catch(
          (checkError: unknown) => {
            this.logger.warn('existence_check_failed', { customerId, id, error: errorMessage(checkError) });
            return true;
          }
        );
        if (stillExists) {
          throw error;
        }
        this.logger.warn('remote_notification_already_absent', { customerId, id, remoteId: current.remoteId });
      }
    });

    await this.repository.delete(customerId, id);
    this.logger.info('notification_deleted', { customerId, id, remoteId: current.remoteId });
  }

  /**
   * Enables a notification. No remote call is made when it is already enabled.
   *
   * @returns The record in its new state.
   */
  async enable(customerId: number, id: string): Promise<Notification> {
    return this.setEnabled(customerId, id, true);
  }

  /**
   * Disables a notification. No remote call is made when it is already disabled.
   *
   * @returns The record in its new state.
   */
  async disable(customerId: number, id: string): Promise<Notification> {
    return this.setEnabled(customerId, id, false);
  }

  private async setEnabled(customerId: number, id: string, enabled: boolean): Promise<Notification> {
    const current = await this.get(customerId, id);
    if (current.enabled === enabled) {
      return current;
    }

    await this.sessions.run(customerId, (session) =>
      sendNotificationEnable(session, buildEnableRequest(current.resourceId, current.remoteId, enabled))
    );
    const next: Notification = { ...current, enabled, updatedAt: this.clock().toISOString() };

    try {
      await this.repository.update(next);
    } catch (error) {
      this.logger.error('local_update_failed', { customerId, id, error: errorMessage(error) });
      await this.compensate(customerId, 'enable', current.remoteId, () =>
        this.sessions.run(customerId, (session) =>
          sendNotificationEnable(session, buildEnableRequest(current.resourceId, current.remoteId, current.enabled))
        )
      );
      throw error;
    }

    this.logger.info(enabled ? 'notification_enabled' : 'notification_disabled', { customerId, id });
    return next;
  }

  /**
   * Runs a compensating remote call. Its failure is logged and does not
   * replace the error that triggered it.
   */
  private async compensate(
    customerId: number,
    action: 'delete' | 'update' | 'enable',
    remoteId: number,
    run: () => Promise<unknown>
  ): Promise<void> {
    try {
      await run();
      this.logger.warn('compensation_succeeded', { customerId, action, remoteId });
    } catch (error) {
      this.logger.error('compensation_failed', { customerId, action, remoteId, error: errorMessage(error) });
    }
  }
}
