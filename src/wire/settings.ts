/**
 * Notification settings supplied at the review step, and their validation.
 *
 * @packageDocumentation
 */

import { BoundOrderError, ValidationError } from '../errors.js';
import { isDeliveryMethod, type DeliveryMethod } from './delivery.js';
import { ALWAYS, validateSchedule, type Schedule } from './schedule.js';

/** Upper limit of the alarm timeout, in seconds. */
export const MAX_ALARM_TIMEOUT = 1800;

/** Upper limit of the minimum alarm and previous-state durations, in seconds. */
export const MAX_STATE_DURATION = 86400;

/** Largest `flags` value; the mask is combined bitwise, which keeps 31 bits. */
export const MAX_FLAGS = 0x7fffffff;

/**
 * Bits of the wire `fl` field.
 */
export const NOTIFICATION_FLAGS = {
  /** Trigger on every matching message instead of only the first. */
  EVERY_MESSAGE: 0x1,
  /** Notification is disabled on the platform. */
  DISABLED: 0x2,
} as const;

/**
 * Every notification field that is neither the trigger nor the unit list.
 */
export interface NotificationSettings {
  readonly name: string;
  /** Message template; may contain platform macros such as `%UNIT%`. */
  readonly message: string;
  readonly method: DeliveryMethod;
  /** UNIX timestamp from which the notification is active, or null. */
  readonly activationTime: number | null;
  /** UNIX timestamp after which the notification is inactive, or null for never. */
  readonly deactivationTime: number | null;
  /** 0 means unlimited. */
  readonly maxAlarms: number;
  /** Seconds; 0 means any interval. */
  readonly maxMessageInterval: number;
  /** Seconds, at most {@link MAX_ALARM_TIMEOUT}. */
  readonly alarmTimeout: number;
  /** Seconds, at most {@link MAX_STATE_DURATION}. */
  readonly minAlarmDuration: number;
  /** Seconds, at most {@link MAX_STATE_DURATION}. */
  readonly minPreviousDuration: number;
  /** Seconds. */
  readonly controlPeriod: number;
  /** Wire flag bits other than {@link NOTIFICATION_FLAGS.DISABLED}. */
  readonly flags: number;
  /** Two-letter language code. */
  readonly language: string;
  /** Timezone offset as the platform expects it. */
  readonly timezone: number;
  readonly schedule: Schedule;
  readonly controlSchedule: Schedule;
}

/**
 * Returns `base` with every field of `changes` that is not `undefined`.
 * An explicit `undefined` leaves the base value in place; `null` is a value.
 *
 * @param base - Current settings.
 * @param changes - Fields to replace.
 */
export function withSettingsChanges(
  base: NotificationSettings,
  changes: Partial<NotificationSettings>
): NotificationSettings {
  return {
    name: orBase(changes.name, base.name),
    message: orBase(changes.message, base.message),
    method: orBase(changes.method, base.method),
    activationTime: orBase(changes.activationTime, base.activationTime),
    deactivationTime: orBase(changes.deactivationTime, base.deactivationTime),
    maxAlarms: orBase(changes.maxAlarms, base.maxAlarms),
    maxMessageInterval: orBase(changes.maxMessageInterval, base.maxMessageInterval),
    alarmTimeout: orBase(changes.alarmTimeout, base.alarmTimeout),
    minAlarmDuration: orBase(changes.minAlarmDuration, base.minAlarmDuration),
    minPreviousDuration: orBase(changes.minPreviousDuration, base.minPreviousDuration),
    controlPeriod: orBase(changes.controlPeriod, base.controlPeriod),
    flags: orBase(changes.flags, base.flags),
    language: orBase(changes.language, base.language),
    timezone: orBase(changes.timezone, base.timezone),
    schedule: orBase(changes.schedule, base.schedule),
    controlSchedule: orBase(changes.controlSchedule, base.controlSchedule),
  };
}

function orBase<T>(value: T | undefined, base: T): T {
  return value === undefined ? base : value;
}

/**
 * Builds settings with every optional field at its default.
 *
 * @param required - Name, message and delivery method.
 * @param defaults - Language and timezone defaults from configuration.
 */
export function createNotificationSettings(
  required: Pick<NotificationSettings, 'name' | 'message' | 'method'> &
    Partial<NotificationSettings>,
  defaults: { readonly language: string; readonly timezone: number } = { language: 'en', timezone: 0 }
): NotificationSettings {
  const base: NotificationSettings = {
    name: required.name,
    message: required.message,
    method: required.method,
    activationTime: null,
    deactivationTime: null,
    maxAlarms: 0,
    maxMessageInterval: 0,
    alarmTimeout: 0,
    minAlarmDuration: 0,
    minPreviousDuration: 0,
    controlPeriod: 3600,
    flags: 0,
    language: defaults.language,
    timezone: defaults.timezone,
    schedule: ALWAYS,
    controlSchedule: ALWAYS,
  };
  return withSettingsChanges(base, required);
}

function checkSeconds(
  value: number,
  field: string,
  max: number,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value)) {
    errors.push(new ValidationError(field, 'invalid', `${field} must be a whole number of seconds`));
  } else if (value < 0 || value > max) {
    errors.push(
      new ValidationError(
        field,
        'out_of_range',
        `${field} must be between 0 and ${String(max)}, got ${String(value)}`
      )
    );
  }
}

function checkTimestamp(value: number | null, field: string, errors: ValidationError[]): void {
  if (value !== null && (!Number.isInteger(value) || value < 0)) {
    errors.push(new ValidationError(field, 'invalid', `${field} must be a UNIX timestamp`));
  }
}

/**
 * Validates notification settings.
 *
 * @param settings - Settings to check.
 * @returns Errors, empty when valid.
 */
export function validateNotificationSettings(settings: NotificationSettings): ValidationError[] {
  const errors: ValidationError[] = [];

  if (settings.name.trim() === '') {
    errors.push(new ValidationError('name', 'required', 'name is required'));
  } else if (settings.name.length > 255) {
    errors.push(new ValidationError('name', 'out_of_range', 'name must be at most 255 characters'));
  }
  if (settings.message.trim() === '') {
    errors.push(new ValidationError('message', 'required', 'message is required'));
  }
  if (!isDeliveryMethod(settings.method)) {
    errors.push(
      new ValidationError('method', 'invalid_choice', `method must be 'sms' or 'voice', got '${String(settings.method)}'`)
    );
  }

  const beforeTimes = errors.length;
  checkTimestamp(settings.activationTime, 'activationTime', errors);
  checkTimestamp(settings.deactivationTime, 'deactivationTime', errors);
  if (
    errors.length === beforeTimes &&
    settings.activationTime !== null &&
    settings.deactivationTime !== null &&
    settings.activationTime > settings.deactivationTime
  ) {
    errors.push(
      new BoundOrderError('activationTime', 'deactivationTime', 'activationTime is after deactivationTime'),
      new BoundOrderError('deactivationTime', 'activationTime', 'deactivationTime is before activationTime')
    );
  }

  checkSeconds(settings.maxAlarms, 'maxAlarms', Number.MAX_SAFE_INTEGER, errors);
  checkSeconds(settings.maxMessageInterval, 'maxMessageInterval', Number.MAX_SAFE_INTEGER, errors);
  checkSeconds(settings.alarmTimeout, 'alarmTimeout', MAX_ALARM_TIMEOUT, errors);
  checkSeconds(settings.minAlarmDuration, 'minAlarmDuration', MAX_STATE_DURATION, errors);
  checkSeconds(settings.minPreviousDuration, 'minPreviousDuration', MAX_STATE_DURATION, errors);
  checkSeconds(settings.controlPeriod, 'controlPeriod', Number.MAX_SAFE_INTEGER, errors);

  if (!Number.isInteger(settings.flags) || settings.flags < 0 || settings.flags > MAX_FLAGS) {
    errors.push(
      new ValidationError('flags', 'invalid', `flags must be a whole number between 0 and ${String(MAX_FLAGS)}`)
    );
  }
  if (!/^[a-z]{2}$/.test(settings.language)) {
    errors.push(
      new ValidationError('language', 'invalid', `language must be a two-letter code, got '${settings.language}'`)
    );
  }
  if (!Number.isInteger(settings.timezone)) {
    errors.push(new ValidationError('timezone', 'invalid', 'timezone must be a whole number'));
  }

  errors.push(...validateSchedule(settings.schedule, 'schedule'));
  errors.push(...validateSchedule(settings.controlSchedule, 'controlSchedule'));

  return errors;
}
