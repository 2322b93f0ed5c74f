/**
 * Building, validating and editing notification records.
 *
 * Delivery text and actions are derived from the message template and the
 * delivery method. They are rendered here, and re-rendered on every edit, so
 * a stored record never carries text that disagrees with its settings.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { InvalidNotificationError, ValidationError } from '../errors.js';
import type { TriggerConfig } from '../triggers/types.js';
import { validateTriggerParameters } from '../triggers/validator.js';
import { renderActions, renderText, type DeliveryEndpoints, type WireAction } from '../wire/delivery.js';
import { validateNotificationSettings, withSettingsChanges, type NotificationSettings } from '../wire/settings.js';
import type { Notification, NotificationChanges, NotificationInput } from './types.js';

/**
 * Renders delivery text and actions.
 *
 * @param customerId - Customer; identifies the recipient to the callback service.
 * @param settings - Settings carrying the template and method.
 * @param endpoints - Callback endpoints.
 */
export function renderDelivery(
  customerId: number,
  settings: Pick<NotificationSettings, 'message' | 'method'>,
  endpoints: DeliveryEndpoints
): { text: string; actions: WireAction[] } {
  return {
    text: renderText(customerId, settings.message),
    actions: renderActions(settings.method, endpoints),
  };
}

function validateUnits(units: readonly number[]): ValidationError[] {
  if (units.length === 0) {
    return [new ValidationError('units', 'required', 'at least one unit must be selected')];
  }
  const bad = units.find((id) => !Number.isSafeInteger(id) || id <= 0);
  if (bad !== undefined) {
    return [new ValidationError('units', 'invalid', `unit ids must be positive integers, got ${String(bad)}`)];
  }
  if (new Set(units).size !== units.length) {
    return [new ValidationError('units', 'invalid', 'unit ids must not repeat')];
  }
  return [];
}

function validateTrigger(trigger: TriggerConfig): readonly ValidationError[] {
  const result = validateTriggerParameters(trigger.kind, trigger.parameters);
  return result.valid ? [] : result.errors;
}

/**
 * Validates everything that will be sent to the platform.
 *
 * @param notification - Units, trigger and settings.
 * @returns Errors, empty when valid.
 */
export function validateNotificationInput(
  notification: Pick<NotificationInput, 'resourceId' | 'units' | 'trigger' | 'settings'>
): ValidationError[] {
  const errors: ValidationError[] = [];
  if (!Number.isSafeInteger(notification.resourceId) || notification.resourceId <= 0) {
    errors.push(new ValidationError('resourceId', 'invalid', 'resourceId must be a positive integer'));
  }
  errors.push(...validateUnits(notification.units));
  errors.push(...validateTrigger(notification.trigger));
  errors.push(...validateNotificationSettings(notification.settings));
  return errors;
}

/**
 * Throws when {@link validateNotificationInput} reports errors.
 *
 * @throws InvalidNotificationError listing every failure.
 */
export function assertNotificationInputValid(
  notification: Pick<NotificationInput, 'resourceId' | 'units' | 'trigger' | 'settings'>
): void {
  const errors = validateNotificationInput(notification);
  if (errors.length > 0) {
    throw new InvalidNotificationError('Notification is invalid', errors);
  }
}

/**
 * A notification about to be created: everything but the local id, the
 * remote id and the timestamps.
 */
export type PendingNotification = Omit<Notification, 'id' | 'remoteId' | 'createdAt' | 'updatedAt'>;

/**
 * Prepares a notification for the remote create.
 *
 * @param input - Creation input.
 * @param endpoints - Callback endpoints.
 */
export function prepareNotification(input: NotificationInput, endpoints: DeliveryEndpoints): PendingNotification {
  return {
    customerId: input.customerId,
    resourceId: input.resourceId,
    units: [...input.units],
    trigger: input.trigger,
    settings: input.settings,
    ...renderDelivery(input.customerId, input.settings, endpoints),
    enabled: input.enabled ?? true,
    label: input.label ?? null,
    draftId: input.draftId ?? null,
  };
}

/**
 * Completes a pending notification once the platform assigned its id.
 *
 * @param pending - The prepared notification.
 * @param remoteId - Id returned by the remote create.
 * @param now - Creation time.
 */
export function materializeNotification(pending: PendingNotification, remoteId: number, now: Date): Notification {
  const timestamp = now.toISOString();
  return {
    ...pending,
    id: randomUUID(),
    remoteId,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Applies edits and re-renders delivery text and actions.
 *
 * @param notification - Current record.
 * @param changes - Edits.
 * @param endpoints - Callback endpoints.
 * @param now - Edit time.
 */
export function applyChanges(
  notification: Notification,
  changes: NotificationChanges,
  endpoints: DeliveryEndpoints,
  now: Date
): Notification {
  const settings = withSettingsChanges(notification.settings, changes.settings ?? {});
  return {
    ...notification,
    units: changes.units !== undefined ? [...changes.units] : notification.units,
    trigger: changes.trigger ?? notification.trigger,
    settings,
    ...renderDelivery(notification.customerId, settings, endpoints),
    label: changes.label !== undefined ? changes.label : notification.label,
    updatedAt: now.toISOString(),
  };
}
