/**
 * Local notification repository.
 *
 * @packageDocumentation
 */

import { RepositoryError } from '../errors.js';
import type { Notification } from '../notifications/types.js';

/**
 * Storage of notification records, scoped by customer.
 */
export interface NotificationRepository {
  /**
   * Returns a customer's notification, or null when it does not exist or
   * belongs to another customer.
   */
  get(customerId: number, id: string): Promise<Notification | null>;

  /** Lists a customer's notifications, oldest first. */
  listByCustomer(customerId: number): Promise<readonly Notification[]>;

  /** Returns the customer's record created by a workflow submission, or null. */
  findByDraftId(customerId: number, draftId: string): Promise<Notification | null>;

  /**
   * Stores a new record.
   *
   * @throws RepositoryError with code `duplicate` if the id is taken.
   */
  insert(notification: Notification): Promise<void>;

  /**
   * Replaces an existing record.
   *
   * @throws RepositoryError with code `not_found` if it does not exist.
   */
  update(notification: Notification): Promise<void>;

  /**
   * Removes a record.
   *
   * @throws RepositoryError with code `not_found` if it does not exist.
   */
  delete(customerId: number, id: string): Promise<void>;
}

/**
 * Applies an insert to a list of records.
 *
 * @internal
 */
export function withInserted(records: readonly Notification[], notification: Notification): Notification[] {
  if (records.some((r) => r.id === notification.id)) {
    throw new RepositoryError(`Notification '${notification.id}' already exists`, 'duplicate');
  }
  return [...records, notification];
}

/**
 * Applies an update to a list of records.
 *
 * @internal
 */
export function withUpdated(records: readonly Notification[], notification: Notification): Notification[] {
  const index = records.findIndex((r) => r.id === notification.id && r.customerId === notification.customerId);
  if (index === -1) {
    throw new RepositoryError(`Notification '${notification.id}' does not exist`, 'not_found');
  }
  return records.map((r, i) => (i === index ? notification : r));
}

/**
 * Applies a delete to a list of records.
 *
 * @internal
 */
export function withDeleted(records: readonly Notification[], customerId: number, id: string): Notification[] {
  const remaining = records.filter((r) => !(r.id === id && r.customerId === customerId));
  if (remaining.length === records.length) {
    throw new RepositoryError(`Notification '${id}' does not exist`, 'not_found');
  }
  return remaining;
}

/**
 * Repository held in memory.
 */
export class InMemoryNotificationRepository implements NotificationRepository {
  private records: Notification[] = [];

  async get(customerId: number, id: string): Promise<Notification | null> {
    return this.records.find((r) => r.id === id && r.customerId === customerId) ?? null;
  }

  async listByCustomer(customerId: number): Promise<readonly Notification[]> {
    return this.records.filter((r) => r.customerId === customerId);
  }

  async findByDraftId(customerId: number, draftId: string): Promise<Notification | null> {
    return this.records.find((r) => r.draftId === draftId && r.customerId === customerId) ?? null;
  }

  async insert(notification: Notification): Promise<void> {
    this.records = withInserted(this.records, notification);
  }

  async update(notification: Notification): Promise<void> {
    this.records = withUpdated(this.records, notification);
  }

  async delete(customerId: number, id: string): Promise<void> {
    this.records = withDeleted(this.records, customerId, id);
  }
}
