/**
 * Parameter validation for all trigger kinds.
 *
 * @packageDocumentation
 */

import { BoundOrderError, type ValidationError } from '../errors.js';
import type { BoundPair, TriggerDefinition } from './definition.js';
import { FieldReader } from './fields.js';
import { getTriggerDefinition } from './registry.js';
import type { ParamValue, RawParameters, TriggerConfig, TriggerKind } from './types.js';

/**
 * Result of validating raw trigger parameters.
 */
export type TriggerValidationResult =
  | { readonly valid: true; readonly trigger: TriggerConfig }
  | { readonly valid: false; readonly errors: readonly ValidationError[] };

function checkBoundPair(
  pair: BoundPair,
  values: Readonly<Record<string, ParamValue>>,
  reader: FieldReader
): void {
  if (reader.hasFailed(pair.lower) || reader.hasFailed(pair.upper)) {
    return;
  }
  const lower = values[pair.lower];
  const upper = values[pair.upper];
  if (typeof lower !== 'number' || typeof upper !== 'number') {
    return;
  }
  if (pair.zeroUpperIsUnbounded && upper === 0) {
    return;
  }
  if (lower > upper) {
    reader.addError(
      new BoundOrderError(
        pair.lower,
        pair.upper,
        `${pair.lower} (${String(lower)}) must not be greater than ${pair.upper} (${String(upper)})`
      )
    );
  }
  if (upper < lower) {
    reader.addError(
      new BoundOrderError(
        pair.upper,
        pair.lower,
        `${pair.upper} (${String(upper)}) must not be less than ${pair.lower} (${String(lower)})`
      )
    );
  }
}

function buildTrigger<K extends TriggerKind>(
  definition: TriggerDefinition<K>,
  reader: FieldReader
): TriggerConfig<K> {
  return { kind: definition.kind, parameters: definition.build(reader) };
}

/**
 * Validates raw parameters for a trigger kind.
 *
 * Every field is parsed (absent fields take their defaults), then each bound
 * pair is checked in both directions. All failures are returned together.
 * Pure: performs no I/O.
 *
 * @param kind - Untrusted trigger kind.
 * @param raw - Unvalidated parameter values.
 * @returns The normalized trigger or the field-level errors.
 * @throws UnknownTriggerKindError if `kind` is not a trigger kind.
 *
 * @example
 * ```typescript
 * const result = validateTriggerParameters('sensor-value', { lower_bound: '5', upper_bound: '1' });
 * // result.valid === false; BoundOrderError on lower_bound and on upper_bound
 * ```
 */
export function validateTriggerParameters(kind: string, raw: RawParameters): TriggerValidationResult {
  const definition = getTriggerDefinition(kind);
  const reader = new FieldReader(raw);
  const trigger = buildTrigger(definition, reader);

  const values: Readonly<Record<string, ParamValue>> = trigger.parameters;
  for (const pair of definition.boundPairs) {
    checkBoundPair(pair, values, reader);
  }

  const errors = reader.getErrors();
  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, trigger };
}

/**
 * Returns the all-defaults trigger of a kind.
 *
 * @param kind - Untrusted trigger kind.
 * @throws UnknownTriggerKindError if `kind` is not a trigger kind.
 */
export function defaultTrigger(kind: string): TriggerConfig {
  return buildTrigger(getTriggerDefinition(kind), new FieldReader({}));
}

/**
 * Groups validation errors by field name.
 *
 * @param errors - Errors from {@link validateTriggerParameters}.
 */
export function errorsByField(errors: readonly ValidationError[]): Readonly<Record<string, string[]>> {
  const grouped: Record<string, string[]> = {};
  for (const error of errors) {
    (grouped[error.field] ??= []).push(error.message);
  }
  return grouped;
}
