/**
 * Shared test data.
 */

import type { Notification, NotificationInput } from '../../src/notifications/types.js';
import { defaultTrigger, validateTriggerParameters } from '../../src/triggers/validator.js';
import type { TriggerConfig } from '../../src/triggers/types.js';
import type { DeliveryEndpoints } from '../../src/wire/delivery.js';
import { createNotificationSettings } from '../../src/wire/settings.js';

export const TEST_ENDPOINTS: DeliveryEndpoints = {
  callbackBaseUrl: 'https://alerts.example.com',
  smsPath: '/sms',
  voicePath: '/voice',
};

export const TEST_SECRET = 'test-secret-0123456789';

export function ignitionTrigger(): TriggerConfig {
  const result = validateTriggerParameters('sensor-value', {
    lower_bound: -1,
    upper_bound: 1,
    sensor_name_mask: '*IGN*',
    type: 0,
  });
  if (!result.valid) {
    throw new Error('fixture trigger is invalid');
  }
  return result.trigger;
}

export function makeInput(overrides: Partial<NotificationInput> = {}): NotificationInput {
  return {
    customerId: 7,
    resourceId: 10,
    units: [1001, 1002],
    trigger: ignitionTrigger(),
    settings: createNotificationSettings({ name: 'Ignition', message: '%UNIT% ignition', method: 'sms' }),
    ...overrides,
  };
}

export function makeNotification(overrides: Partial<Notification> = {}): Notification {
  return {
    id: 'n-1',
    customerId: 7,
    resourceId: 10,
    remoteId: 31,
    trigger: defaultTrigger('alarm'),
    units: [1001],
    settings: createNotificationSettings({ name: 'Panic', message: 'Panic on %UNIT%', method: 'sms' }),
    text: 'unit_id=%UNIT_ID%&user_id=7&msg_time_int=%MSG_TIME_INT%&message=Panic%20on%20%UNIT%',
    actions: [{ t: 'push_messages', p: { url: 'https://alerts.example.com/sms', get: 0 } }],
    enabled: true,
    label: null,
    draftId: null,
    createdAt: '2026-03-01T12:00:00.000Z',
    updatedAt: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}
