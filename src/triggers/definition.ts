/**
 * The shape every trigger kind's definition follows.
 *
 * @packageDocumentation
 */

import type { FieldReader, FieldSpec } from './fields.js';
import type { TriggerKind, TriggerParametersMap, TriggerWireCode } from './types.js';

/**
 * A pair of fields whose values must be ordered (`lower ≤ upper`).
 */
export interface BoundPair {
  readonly lower: string;
  readonly upper: string;
  /** When true an upper value of 0 means "no upper limit" and skips the check. */
  readonly zeroUpperIsUnbounded: boolean;
}

/** The lower/upper bound pair of sensor and parameter bands. */
export const VALUE_BOUNDS: BoundPair = {
  lower: 'lower_bound',
  upper: 'upper_bound',
  zeroUpperIsUnbounded: false,
};

/** The min/max speed window. */
export const SPEED_BOUNDS: BoundPair = {
  lower: 'min_speed',
  upper: 'max_speed',
  zeroUpperIsUnbounded: true,
};

/**
 * Parameter schema and constructor for one trigger kind.
 */
export interface TriggerDefinition<K extends TriggerKind = TriggerKind> {
  readonly kind: K;
  readonly wireCode: TriggerWireCode;
  readonly label: string;
  readonly description: string;
  /** Fields in display order; also the wire key order. */
  readonly fields: readonly FieldSpec[];
  readonly boundPairs: readonly BoundPair[];
  /**
   * Reads every field from `reader` and assembles the typed parameters.
   * Parse failures are recorded on the reader.
   */
  build(reader: FieldReader): TriggerParametersMap[K];
}
