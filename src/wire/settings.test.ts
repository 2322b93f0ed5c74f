import { describe, it, expect } from 'vitest';
import { ALWAYS } from './schedule.js';
import {
  createNotificationSettings,
  validateNotificationSettings,
  withSettingsChanges,
  type NotificationSettings,
} from './settings.js';

function settings(overrides: Partial<NotificationSettings> = {}): NotificationSettings {
  return createNotificationSettings({ name: 'Ignition', message: '%UNIT% ignition', method: 'sms', ...overrides });
}

function fields(value: NotificationSettings): string[] {
  return validateNotificationSettings(value).map((e) => e.field);
}

describe('createNotificationSettings', () => {
  it('should fill every optional field with its default', () => {
    expect(settings()).toEqual({
      name: 'Ignition',
      message: '%UNIT% ignition',
      method: 'sms',
      activationTime: null,
      deactivationTime: null,
      maxAlarms: 0,
      maxMessageInterval: 0,
      alarmTimeout: 0,
      minAlarmDuration: 0,
      minPreviousDuration: 0,
      controlPeriod: 3600,
      flags: 0,
      language: 'en',
      timezone: 0,
      schedule: ALWAYS,
      controlSchedule: ALWAYS,
    });
  });

  it('should take language and timezone from configured defaults', () => {
    const value = createNotificationSettings(
      { name: 'n', message: 'm', method: 'voice' },
      { language: 'de', timezone: 3600 }
    );

    expect(value.language).toBe('de');
    expect(value.timezone).toBe(3600);
  });

  it('should keep defaults for fields passed as undefined', () => {
    const value = createNotificationSettings(
      { name: 'n', message: 'm', method: 'sms', schedule: undefined, language: undefined, flags: undefined },
      { language: 'de', timezone: 0 }
    );

    expect(value.schedule).toEqual(ALWAYS);
    expect(value.language).toBe('de');
    expect(value.flags).toBe(0);
    expect(validateNotificationSettings(value)).toEqual([]);
  });
});

describe('withSettingsChanges', () => {
  it('should replace defined fields and keep the rest', () => {
    const base = settings({ activationTime: 1000, maxAlarms: 3 });

    const value = withSettingsChanges(base, { activationTime: null, maxAlarms: undefined, name: 'Renamed' });

    expect(value).toEqual({ ...base, activationTime: null, name: 'Renamed' });
  });
});

describe('validateNotificationSettings', () => {
  it('should accept the defaults', () => {
    expect(validateNotificationSettings(settings())).toEqual([]);
  });

  it('should require a name and a message', () => {
    const errors = validateNotificationSettings(settings({ name: '  ', message: '' }));

    expect(errors.map((e) => [e.field, e.message])).toEqual([
      ['name', 'name is required'],
      ['message', 'message is required'],
    ]);
  });

  it('should limit the alarm timeout', () => {
    const [error] = validateNotificationSettings(settings({ alarmTimeout: 5000 }));

    expect(error?.message).toBe('alarmTimeout must be between 0 and 1800, got 5000');
    expect(fields(settings({ alarmTimeout: 1800 }))).toEqual([]);
  });

  it('should reject negative and fractional durations', () => {
    expect(fields(settings({ maxAlarms: -1, minAlarmDuration: 1.5 }))).toEqual(['maxAlarms', 'minAlarmDuration']);
  });

  it('should check the activation window in both directions', () => {
    expect(fields(settings({ activationTime: 2000, deactivationTime: 1000 }))).toEqual([
      'activationTime',
      'deactivationTime',
    ]);
    expect(fields(settings({ activationTime: 1000, deactivationTime: null }))).toEqual([]);
  });

  it('should validate language, timezone and flags', () => {
    const errors = validateNotificationSettings(settings({ language: 'x', timezone: 0.5, flags: -1 }));

    expect(errors.map((e) => e.message)).toEqual([
      'flags must be a whole number between 0 and 2147483647',
      "language must be a two-letter code, got 'x'",
      'timezone must be a whole number',
    ]);
  });

  it('should limit flags to 31 bits', () => {
    expect(fields(settings({ flags: 0x7fffffff }))).toEqual([]);
    expect(fields(settings({ flags: 2 ** 31 }))).toEqual(['flags']);
  });

  it('should prefix schedule errors with the schedule name', () => {
    expect(fields(settings({ controlSchedule: { ...ALWAYS, months: 4096 } }))).toEqual(['controlSchedule.months']);
  });
});
