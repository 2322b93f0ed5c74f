/**
 * Schedule masks and their wire form.
 *
 * A schedule holds two time-of-day intervals (minutes from midnight) and
 * bitmasks for days of month, months and weekdays. The all-zero schedule
 * means "always".
 *
 * @packageDocumentation
 */

import { BoundOrderError, ValidationError } from '../errors.js';

/** Minutes in a day; the upper limit of a time-of-day value. */
export const MINUTES_PER_DAY = 1440;

/** All 31 day-of-month bits. */
export const ALL_DAYS_OF_MONTH = 2 ** 31 - 1;

/** All 12 month bits. */
export const ALL_MONTHS = 2 ** 12 - 1;

/** All 7 weekday bits (Monday is bit 0). */
export const ALL_WEEKDAYS = 2 ** 7 - 1;

/**
 * A time-of-day window in minutes from midnight. `0..0` is unset.
 */
export interface TimeInterval {
  readonly from: number;
  readonly to: number;
}

/**
 * Recurrence mask gating when a notification is active.
 */
export interface Schedule {
  readonly first: TimeInterval;
  readonly second: TimeInterval;
  /** Bit `d - 1` set for day-of-month `d`; 0 means every day. */
  readonly daysOfMonth: number;
  /** Bit `m - 1` set for month `m`; 0 means every month. */
  readonly months: number;
  /** Bit 0 Monday through bit 6 Sunday; 0 means every weekday. */
  readonly weekdays: number;
  readonly flags: number;
}

/**
 * Schedule as the remote platform writes it.
 */
export interface WireSchedule {
  readonly f1: number;
  readonly f2: number;
  readonly t1: number;
  readonly t2: number;
  readonly m: number;
  readonly y: number;
  readonly w: number;
  readonly f: number;
}

export const ALWAYS: Schedule = {
  first: { from: 0, to: 0 },
  second: { from: 0, to: 0 },
  daysOfMonth: 0,
  months: 0,
  weekdays: 0,
  flags: 0,
};

/**
 * Builds a bitmask from 1-based positions (days of month, months or weekdays).
 *
 * @param positions - 1-based positions to set.
 *
 * @example
 * ```typescript
 * maskOf([1, 2, 3, 4, 5]); // Monday to Friday: 31
 * ```
 */
export function maskOf(positions: readonly number[]): number {
  let mask = 0;
  for (const position of new Set(positions)) {
    if (!Number.isInteger(position) || position < 1 || position > 31) {
      throw new RangeError(`Mask position must be between 1 and 31, got ${String(position)}`);
    }
    mask += 2 ** (position - 1);
  }
  return mask;
}

/**
 * Lists the 1-based positions set in a mask.
 *
 * @param mask - The bitmask.
 */
export function positionsOf(mask: number): number[] {
  const positions: number[] = [];
  for (let position = 1; position <= 31; position++) {
    if (Math.floor(mask / 2 ** (position - 1)) % 2 === 1) {
      positions.push(position);
    }
  }
  return positions;
}

function checkInteger(
  value: number,
  field: string,
  max: number,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    errors.push(
      new ValidationError(
        field,
        Number.isInteger(value) ? 'out_of_range' : 'invalid',
        `${field} must be a whole number between 0 and ${String(max)}, got ${String(value)}`
      )
    );
  }
}

function checkInterval(interval: TimeInterval, field: string, errors: ValidationError[]): void {
  const before = errors.length;
  checkInteger(interval.from, `${field}.from`, MINUTES_PER_DAY, errors);
  checkInteger(interval.to, `${field}.to`, MINUTES_PER_DAY, errors);
  if (errors.length === before && interval.from > interval.to) {
    errors.push(
      new BoundOrderError(`${field}.from`, `${field}.to`, `${field} starts after it ends`),
      new BoundOrderError(`${field}.to`, `${field}.from`, `${field} ends before it starts`)
    );
  }
}

/**
 * Validates a schedule.
 *
 * @param schedule - The schedule to check.
 * @param field - Field name used as the error prefix.
 * @returns Errors, empty when valid.
 */
export function validateSchedule(schedule: Schedule, field: string): ValidationError[] {
  const errors: ValidationError[] = [];
  checkInterval(schedule.first, `${field}.first`, errors);
  checkInterval(schedule.second, `${field}.second`, errors);
  checkInteger(schedule.daysOfMonth, `${field}.daysOfMonth`, ALL_DAYS_OF_MONTH, errors);
  checkInteger(schedule.months, `${field}.months`, ALL_MONTHS, errors);
  checkInteger(schedule.weekdays, `${field}.weekdays`, ALL_WEEKDAYS, errors);
  checkInteger(schedule.flags, `${field}.flags`, Number.MAX_SAFE_INTEGER, errors);
  return errors;
}

/**
 * Writes a schedule in wire form. Key order is fixed.
 *
 * @param schedule - The schedule to encode.
 */
export function encodeSchedule(schedule: Schedule): WireSchedule {
  return {
    f1: schedule.first.from,
    f2: schedule.second.from,
    t1: schedule.first.to,
    t2: schedule.second.to,
    m: schedule.daysOfMonth,
    y: schedule.months,
    w: schedule.weekdays,
    f: schedule.flags,
  };
}

/**
 * Reads a schedule from wire form.
 *
 * @param wire - The wire schedule.
 */
export function decodeSchedule(wire: WireSchedule): Schedule {
  return {
    first: { from: wire.f1, to: wire.t1 },
    second: { from: wire.f2, to: wire.t2 },
    daysOfMonth: wire.m,
    months: wire.y,
    weekdays: wire.w,
    flags: wire.f,
  };
}
