import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { BoundOrderError, UnknownTriggerKindError } from '../errors.js';
import { defaultTrigger, errorsByField, validateTriggerParameters } from './validator.js';
import type { TriggerValidationResult } from './validator.js';
import { TRIGGER_KINDS } from './types.js';

function errorsOf(result: TriggerValidationResult): Readonly<Record<string, string[]>> {
  if (result.valid) {
    throw new Error('expected validation to fail');
  }
  return errorsByField(result.errors);
}

describe('validateTriggerParameters', () => {
  it('should normalize sensor-value input', () => {
    const result = validateTriggerParameters('sensor-value', {
      lower_bound: '-1.0',
      upper_bound: '1.0',
      sensor_name_mask: '*IGN*',
      type: '0',
    });

    expect(result).toEqual({
      valid: true,
      trigger: {
        kind: 'sensor-value',
        parameters: {
          sensor_type: '',
          sensor_name_mask: '*IGN*',
          lower_bound: -1,
          upper_bound: 1,
          prev_msg_diff: 0,
          merge: 0,
          type: 0,
        },
      },
    });
  });

  it('should report reversed bounds on both fields', () => {
    const result = validateTriggerParameters('sensor-value', { lower_bound: '5', upper_bound: '1' });

    expect(errorsOf(result)).toEqual({
      lower_bound: ['lower_bound (5) must not be greater than upper_bound (1)'],
      upper_bound: ['upper_bound (1) must not be less than lower_bound (5)'],
    });
    if (!result.valid) {
      expect(result.errors.every((e) => e instanceof BoundOrderError)).toBe(true);
    }
  });

  it.each(['geofence', 'address', 'speed', 'message-parameter', 'sensor-value', 'interposition'])(
    'should check the value band of %s in both directions',
    (kind) => {
      const result = validateTriggerParameters(kind, { lower_bound: 5, upper_bound: 1 });

      expect(errorsOf(result)).toEqual({
        lower_bound: ['lower_bound (5) must not be greater than upper_bound (1)'],
        upper_bound: ['upper_bound (1) must not be less than lower_bound (5)'],
      });
    }
  );

  it.each(['geofence', 'address', 'speed', 'interposition'])('should check the speed window of %s', (kind) => {
    const result = validateTriggerParameters(kind, { min_speed: 90, max_speed: 60 });

    expect(errorsOf(result)).toEqual({
      min_speed: ['min_speed (90) must not be greater than max_speed (60)'],
      max_speed: ['max_speed (60) must not be less than min_speed (90)'],
    });
  });

  it('should accept equal bounds', () => {
    const result = validateTriggerParameters('sensor-value', { lower_bound: 3, upper_bound: 3 });
    expect(result.valid).toBe(true);
  });

  it('should treat a zero maximum speed as unbounded', () => {
    const result = validateTriggerParameters('speed', { min_speed: 50, max_speed: 0 });

    expect(result.valid).toBe(true);
  });

  it('should reject a speed window whose minimum exceeds its maximum', () => {
    const result = validateTriggerParameters('speed', { min_speed: 90, max_speed: 60 });

    expect(Object.keys(errorsOf(result))).toEqual(['min_speed', 'max_speed']);
  });

  it('should skip the order check when a bound failed to parse', () => {
    const result = validateTriggerParameters('sensor-value', { lower_bound: 'high', upper_bound: '1' });

    expect(errorsOf(result)).toEqual({
      lower_bound: ["Lower bound must be a number, got 'high'"],
    });
  });

  it('should report every failing field at once', () => {
    const result = validateTriggerParameters('digital-input', { input_index: 40, type: 3 });

    expect(errorsOf(result)).toEqual({
      input_index: ['Input number must be between 1 and 32, got 40'],
      type: ['Trigger on must be one of 0, 1, got 3'],
    });
  });

  it('should fill defaults for a kind without input', () => {
    const result = validateTriggerParameters('connection-outage', {});

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.trigger.kind).toBe('connection-outage');
      expect(result.trigger.parameters).toMatchObject({ time: 300 });
    }
  });

  it('should throw for unknown kinds', () => {
    expect(() => validateTriggerParameters('teleport', {})).toThrow(UnknownTriggerKindError);
  });

  it('should accept any ordered pair of bounds', () => {
    fc.assert(
      fc.property(
        fc.double({ min: -1e6, max: 1e6, noNaN: true }),
        fc.double({ min: 0, max: 1e6, noNaN: true }),
        (lower, width) => {
          const upper = lower + width;
          const result = validateTriggerParameters('sensor-value', { lower_bound: lower, upper_bound: upper });
          expect(result.valid).toBe(true);
        }
      )
    );
  });
});

describe('defaultTrigger', () => {
  it('should validate for every kind', () => {
    for (const kind of TRIGGER_KINDS) {
      const trigger = defaultTrigger(kind);
      expect(trigger.kind).toBe(kind);
      expect(validateTriggerParameters(kind, {}).valid).toBe(true);
    }
  });
});

describe('errorsByField', () => {
  it('should keep messages in order under their field', () => {
    const errors = [
      new BoundOrderError('a', 'b', 'first'),
      new BoundOrderError('b', 'a', 'second'),
      new BoundOrderError('a', 'b', 'third'),
    ];

    expect(errorsByField(errors)).toEqual({ a: ['first', 'third'], b: ['second'] });
  });
});
