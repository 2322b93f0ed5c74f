/**
 * Wire protocol: trigger, schedule and delivery encoding, and request builders.
 *
 * @packageDocumentation
 */

export {
  ALL_DAYS_OF_MONTH,
  ALL_MONTHS,
  ALL_WEEKDAYS,
  ALWAYS,
  MINUTES_PER_DAY,
  decodeSchedule,
  encodeSchedule,
  maskOf,
  positionsOf,
  validateSchedule,
  type Schedule,
  type TimeInterval,
  type WireSchedule,
} from './schedule.js';
export {
  DELIVERY_METHODS,
  MESSAGE_TIME_MACRO,
  UNIT_ID_MACRO,
  callbackUrl,
  encodeMessageTemplate,
  isDeliveryMethod,
  renderActions,
  renderText,
  type DeliveryEndpoints,
  type DeliveryMethod,
  type WireAction,
} from './delivery.js';
export {
  MAX_ALARM_TIMEOUT,
  MAX_FLAGS,
  MAX_STATE_DURATION,
  NOTIFICATION_FLAGS,
  createNotificationSettings,
  withSettingsChanges,
  validateNotificationSettings,
  type NotificationSettings,
} from './settings.js';
export {
  buildCreateRequest,
  buildDeleteRequest,
  buildEnableRequest,
  buildUpdateRequest,
  decodeTrigger,
  encodeFlags,
  encodeNotificationParams,
  encodeTrigger,
  type CallMode,
  type EncodableNotification,
  type NotificationEnableRequest,
  type NotificationMutationRequest,
  type NotificationParams,
  type NotificationRequest,
  type WireTrigger,
} from './encoder.js';
