/**
 * Persisted notification types.
 *
 * @packageDocumentation
 */

import type { TriggerConfig } from '../triggers/types.js';
import type { WireAction } from '../wire/delivery.js';
import type { NotificationSettings } from '../wire/settings.js';

/**
 * A notification that exists both locally and on the remote platform.
 *
 * A record is only ever written after the remote create succeeded, so
 * `remoteId` is always set and never changes afterwards.
 */
export interface Notification {
  /** Local id. */
  readonly id: string;
  readonly customerId: number;
  /** Remote resource holding the notification. */
  readonly resourceId: number;
  /** Id assigned by the platform at creation. */
  readonly remoteId: number;
  readonly trigger: TriggerConfig;
  /** Unit and unit group ids the trigger watches. */
  readonly units: readonly number[];
  readonly settings: NotificationSettings;
  /** Delivery text rendered from the message template. */
  readonly text: string;
  /** Delivery actions rendered from the method. */
  readonly actions: readonly WireAction[];
  readonly enabled: boolean;
  /** Local-only display label; never sent to the platform. */
  readonly label: string | null;
  /** Workflow submission that created the record, or null outside the workflow. */
  readonly draftId: string | null;
  /** ISO 8601. */
  readonly createdAt: string;
  /** ISO 8601. */
  readonly updatedAt: string;
}

/**
 * Input for creating a notification.
 */
export interface NotificationInput {
  readonly customerId: number;
  readonly resourceId: number;
  readonly units: readonly number[];
  readonly trigger: TriggerConfig;
  readonly settings: NotificationSettings;
  /** Defaults to true. */
  readonly enabled?: boolean;
  readonly label?: string | null;
  readonly draftId?: string | null;
}

/**
 * Edits to an existing notification. Absent fields stay unchanged.
 */
export interface NotificationChanges {
  readonly units?: readonly number[];
  readonly trigger?: TriggerConfig;
  readonly settings?: Partial<NotificationSettings>;
  readonly label?: string | null;
}
