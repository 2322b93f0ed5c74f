/**
 * Field specifications: the primitive building blocks of every trigger
 * parameter schema.
 *
 * A field knows its default, its bounds or choices, how to parse raw input
 * and how to write its value to the wire. Absent input takes the default, so
 * an empty parameter set always validates.
 *
 * @packageDocumentation
 */

import { ValidationError, type ValidationErrorCode } from '../errors.js';
import type { LogicOperator, ParamValue, RawParameters } from './types.js';

/**
 * Input control used to capture a field.
 */
export type FieldControl = 'decimal' | 'integer' | 'choice' | 'text' | 'id-list';

/**
 * One selectable option of a choice field.
 */
export interface FieldChoice<V extends ParamValue = ParamValue> {
  readonly value: V;
  readonly label: string;
}

/**
 * Outcome of parsing one raw field value.
 */
export type FieldParseResult<V extends ParamValue> =
  | { readonly ok: true; readonly value: V }
  | { readonly ok: false; readonly code: ValidationErrorCode; readonly message: string };

/**
 * Schema of one trigger parameter.
 */
export interface FieldSpec<V extends ParamValue = ParamValue> {
  /** Parameter name, identical on the wire. */
  readonly name: string;
  readonly label: string;
  readonly control: FieldControl;
  readonly defaultValue: V;
  /** Inclusive lower limit for numeric fields. */
  readonly min?: number;
  /** Inclusive upper limit for numeric fields. */
  readonly max?: number;
  readonly choices?: readonly FieldChoice<V>[];
  /** When true the wire encoder leaves the field out while it holds its default. */
  readonly omitWhenDefault: boolean;
  parse(raw: unknown): FieldParseResult<V>;
  toWire(value: V): number | string;
}

/**
 * Plain description of a field for rendering an input form.
 */
export interface FieldDescriptor {
  readonly name: string;
  readonly label: string;
  readonly control: FieldControl;
  readonly defaultValue: ParamValue;
  readonly min?: number;
  readonly max?: number;
  readonly choices?: readonly FieldChoice[];
}

function ok<V extends ParamValue>(value: V): FieldParseResult<V> {
  return { ok: true, value };
}

function fail<V extends ParamValue>(code: ValidationErrorCode, message: string): FieldParseResult<V> {
  return { ok: false, code, message };
}

function parseNumber(raw: unknown, label: string): FieldParseResult<number> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? ok(raw) : fail('invalid', `${label} must be a finite number`);
  }
  if (typeof raw !== 'string') {
    return fail('invalid', `${label} must be a number`);
  }
  const trimmed = raw.trim();
  if (trimmed === '') {
    return fail('required', `${label} is required`);
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return fail('invalid', `${label} must be a number, got '${raw}'`);
  }
  return ok(value);
}

function checkRange(
  value: number,
  label: string,
  min: number | undefined,
  max: number | undefined
): FieldParseResult<number> {
  if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
    const lo = min === undefined ? '-∞' : String(min);
    const hi = max === undefined ? '∞' : String(max);
    return fail('out_of_range', `${label} must be between ${lo} and ${hi}, got ${String(value)}`);
  }
  return ok(value);
}

/**
 * Options shared by the numeric field factories.
 */
export interface NumericFieldOptions {
  readonly defaultValue?: number;
  readonly min?: number;
  readonly max?: number;
}

/**
 * Creates a decimal field.
 *
 * @param name - Parameter name.
 * @param label - Display label.
 * @param options - Default and inclusive limits.
 */
export function decimalField(
  name: string,
  label: string,
  options: NumericFieldOptions = {}
): FieldSpec<number> {
  const { defaultValue = 0, min, max } = options;
  return {
    name,
    label,
    control: 'decimal',
    defaultValue,
    min,
    max,
    omitWhenDefault: false,
    parse(raw) {
      if (raw === undefined) {
        return ok(defaultValue);
      }
      const parsed = parseNumber(raw, label);
      return parsed.ok ? checkRange(parsed.value, label, min, max) : parsed;
    },
    toWire: (value) => value,
  };
}

/**
 * Creates an integer field.
 *
 * @param name - Parameter name.
 * @param label - Display label.
 * @param options - Default and inclusive limits.
 */
export function integerField(
  name: string,
  label: string,
  options: NumericFieldOptions = {}
): FieldSpec<number> {
  const { defaultValue = 0, min, max } = options;
  return {
    name,
    label,
    control: 'integer',
    defaultValue,
    min,
    max,
    omitWhenDefault: false,
    parse(raw) {
      if (raw === undefined) {
        return ok(defaultValue);
      }
      const parsed = parseNumber(raw, label);
      if (!parsed.ok) {
        return parsed;
      }
      if (!Number.isInteger(parsed.value)) {
        return fail('invalid', `${label} must be a whole number, got ${String(parsed.value)}`);
      }
      return checkRange(parsed.value, label, min, max);
    },
    toWire: (value) => value,
  };
}

/**
 * Creates a field restricted to a closed list of integer codes.
 *
 * @param name - Parameter name.
 * @param label - Display label.
 * @param choices - Allowed codes with labels.
 * @param defaultValue - Code used when the field is absent.
 */
export function choiceField(
  name: string,
  label: string,
  choices: readonly FieldChoice<number>[],
  defaultValue = 0
): FieldSpec<number> {
  return {
    name,
    label,
    control: 'choice',
    defaultValue,
    choices,
    omitWhenDefault: false,
    parse(raw) {
      if (raw === undefined) {
        return ok(defaultValue);
      }
      const parsed = parseNumber(raw, label);
      if (!parsed.ok) {
        return parsed;
      }
      const match = choices.find((choice) => choice.value === parsed.value);
      if (match === undefined) {
        const allowed = choices.map((choice) => String(choice.value)).join(', ');
        return fail('invalid_choice', `${label} must be one of ${allowed}, got ${String(parsed.value)}`);
      }
      return ok(match.value);
    },
    toWire: (value) => value,
  };
}

/**
 * Creates a field restricted to a closed list of string codes.
 *
 * @param name - Parameter name.
 * @param label - Display label.
 * @param choices - Allowed codes with labels.
 * @param defaultValue - Code used when the field is absent or empty.
 */
export function textChoiceField<T extends string>(
  name: string,
  label: string,
  choices: readonly FieldChoice<T>[],
  defaultValue: T
): FieldSpec<T> {
  return {
    name,
    label,
    control: 'choice',
    defaultValue,
    choices,
    omitWhenDefault: false,
    parse(raw) {
      if (raw === undefined) {
        return ok(defaultValue);
      }
      if (typeof raw !== 'string') {
        return fail('invalid', `${label} must be text`);
      }
      const match = choices.find((choice) => choice.value === raw);
      if (match === undefined) {
        const allowed = choices.map((choice) => `'${choice.value}'`).join(', ');
        return fail('invalid_choice', `${label} must be one of ${allowed}, got '${raw}'`);
      }
      return ok(match.value);
    },
    toWire: (value) => value,
  };
}

/**
 * Creates an opaque text field. Masks are not checked for wildcard syntax;
 * empty input takes the default.
 *
 * @param name - Parameter name.
 * @param label - Display label.
 * @param defaultValue - Value used when the field is absent or empty.
 */
export function textField(name: string, label: string, defaultValue = '*'): FieldSpec<string> {
  return {
    name,
    label,
    control: 'text',
    defaultValue,
    omitWhenDefault: false,
    parse(raw) {
      if (raw === undefined || raw === '') {
        return ok(defaultValue);
      }
      if (typeof raw === 'number') {
        return ok(String(raw));
      }
      if (typeof raw !== 'string') {
        return fail('invalid', `${label} must be text`);
      }
      return ok(raw);
    },
    toWire: (value) => value,
  };
}

/**
 * Creates a list of positive integer ids, written to the wire as a
 * comma-separated string.
 *
 * @param name - Parameter name.
 * @param label - Display label.
 */
export function idListField(name: string, label: string): FieldSpec<readonly number[]> {
  const empty: readonly number[] = [];
  return {
    name,
    label,
    control: 'id-list',
    defaultValue: empty,
    omitWhenDefault: false,
    parse(raw) {
      if (raw === undefined || raw === '') {
        return ok(empty);
      }
      let parts: readonly unknown[];
      if (typeof raw === 'string') {
        parts = raw.split(',').map((part) => part.trim());
      } else if (typeof raw === 'number') {
        parts = [raw];
      } else if (Array.isArray(raw)) {
        parts = raw;
      } else {
        return fail('invalid', `${label} must be a list of ids`);
      }
      const ids: number[] = [];
      for (const part of parts) {
        const id = typeof part === 'string' && part !== '' ? Number(part) : part;
        if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
          return fail('invalid', `${label} must contain positive whole numbers, got '${String(part)}'`);
        }
        ids.push(id);
      }
      return ok(ids);
    },
    toWire: (value) => value.join(','),
  };
}

/**
 * Marks a field as compact: the encoder omits it while it holds its default.
 *
 * @param spec - The field to mark.
 */
export function compact<V extends ParamValue>(spec: FieldSpec<V>): FieldSpec<V> {
  return { ...spec, omitWhenDefault: true };
}

/**
 * Compares two parameter values structurally.
 *
 * @param a - First value.
 * @param b - Second value.
 */
export function sameParamValue(a: ParamValue, b: ParamValue): boolean {
  if (typeof a === 'object' && typeof b === 'object') {
    return a.length === b.length && a.every((value, index) => value === b[index]);
  }
  return a === b;
}

/**
 * Reduces a field spec to a plain serializable descriptor.
 *
 * @param spec - The field to describe.
 */
export function describeField(spec: FieldSpec): FieldDescriptor {
  return {
    name: spec.name,
    label: spec.label,
    control: spec.control,
    defaultValue: spec.defaultValue,
    ...(spec.min !== undefined ? { min: spec.min } : {}),
    ...(spec.max !== undefined ? { max: spec.max } : {}),
    ...(spec.choices !== undefined ? { choices: spec.choices } : {}),
  };
}

/**
 * Reads fields from raw input, collecting one error per failing field.
 *
 * A failing field yields its default so that parameter construction can
 * continue and every error of a submission is reported at once.
 */
export class FieldReader {
  private readonly raw: RawParameters;
  private readonly errors: ValidationError[] = [];
  private readonly failed = new Set<string>();

  /**
   * Creates a reader over raw input.
   *
   * @param raw - Unvalidated values keyed by field name.
   */
  constructor(raw: RawParameters) {
    this.raw = raw;
  }

  /**
   * Parses one field.
   *
   * @param spec - The field to read.
   * @returns The parsed value, or the default when parsing failed.
   */
  read<V extends ParamValue>(spec: FieldSpec<V>): V {
    const raw = Object.hasOwn(this.raw, spec.name) ? this.raw[spec.name] : undefined;
    const result = spec.parse(raw);
    if (result.ok) {
      return result.value;
    }
    this.failed.add(spec.name);
    this.errors.push(new ValidationError(spec.name, result.code, result.message));
    return spec.defaultValue;
  }

  /**
   * Whether a field has already failed to parse.
   *
   * @param name - Field name.
   */
  hasFailed(name: string): boolean {
    return this.failed.has(name);
  }

  /**
   * Records an additional error, e.g. from a cross-field check.
   *
   * @param error - The error to record.
   */
  addError(error: ValidationError): void {
    this.failed.add(error.field);
    this.errors.push(error);
  }

  /** All errors recorded so far, in field order. */
  getErrors(): readonly ValidationError[] {
    return [...this.errors];
  }
}

// ============================================================================
// Shared fields
// ============================================================================

/** Maximum speed accepted by speed fields, in km/h. */
export const MAX_SPEED_KMH = 256;

export const lowerBoundField = decimalField('lower_bound', 'Lower bound');
export const upperBoundField = decimalField('upper_bound', 'Upper bound');
export const sensorNameMaskField = textField('sensor_name_mask', 'Sensor name mask');
export const minSpeedField = integerField('min_speed', 'Minimum speed (km/h)', {
  min: 0,
  max: MAX_SPEED_KMH,
});
export const maxSpeedField = integerField('max_speed', 'Maximum speed (km/h)', {
  min: 0,
  max: MAX_SPEED_KMH,
});

export const prevMsgDiffField = choiceField('prev_msg_diff', 'Form bounds relative to', [
  { value: 0, label: 'Absolute value' },
  { value: 1, label: 'Previous value' },
]);

export const mergeField = choiceField('merge', 'Similar sensors', [
  { value: 0, label: 'Calculate separately' },
  { value: 1, label: 'Sum up values' },
]);

export const reversedField = choiceField('reversed', 'Sensor value', [
  { value: 0, label: 'In the specified range' },
  { value: 1, label: 'Out of the specified range' },
]);

export const includeLbsField = choiceField('include_lbs', 'Location source', [
  { value: 0, label: 'Satellite positions only' },
  { value: 1, label: 'Include cell tower (LBS) positions' },
]);

export const logicOperatorField = textChoiceField<LogicOperator>(
  'lo',
  'Combine conditions with',
  [
    { value: 'AND', label: 'Logical AND' },
    { value: 'OR', label: 'Logical OR' },
  ],
  'AND'
);

export const rangePolarityField = choiceField('type', 'Trigger when', [
  { value: 0, label: 'In range' },
  { value: 1, label: 'Out of range' },
]);

export const geozonesTypeField = choiceField('geozones_type', 'Geofence filter', [
  { value: 0, label: 'Disabled / outside geofence' },
  { value: 1, label: 'Inside geofence' },
]);

export const geozonesListField = idListField('geozones_list', 'Geofences');

export const realtimeOnlyField = choiceField('realtime_only', 'Messages', [
  { value: 0, label: 'All messages' },
  { value: 1, label: 'Real-time messages only' },
]);
