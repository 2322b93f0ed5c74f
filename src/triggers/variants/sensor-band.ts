/**
 * The sensor band and speed window shared by the location and motion triggers.
 *
 * @packageDocumentation
 */

import {
  compact,
  lowerBoundField,
  maxSpeedField,
  mergeField,
  minSpeedField,
  prevMsgDiffField,
  reversedField,
  sensorNameMaskField,
  textChoiceField,
  upperBoundField,
  type FieldReader,
  type FieldSpec,
} from '../fields.js';
import { SENSOR_TYPES } from '../sensor-types.js';
import type { SensorBandParameters, SpeedWindowParameters } from '../types.js';

export const sensorTypeField = textChoiceField('sensor_type', 'Sensor type', SENSOR_TYPES, '');

const optionalSensorType = compact(sensorTypeField);
const optionalMask = compact(sensorNameMaskField);
const optionalLower = compact(lowerBoundField);
const optionalUpper = compact(upperBoundField);
const optionalPrevMsgDiff = compact(prevMsgDiffField);
const optionalMerge = compact(mergeField);
const optionalReversed = compact(reversedField);

/** Sensor band fields, all compact: the band is an optional refinement. */
export const SENSOR_BAND_FIELDS: readonly FieldSpec[] = [
  optionalSensorType,
  optionalMask,
  optionalLower,
  optionalUpper,
  optionalPrevMsgDiff,
  optionalMerge,
  optionalReversed,
];

/**
 * Reads the sensor band.
 *
 * @param reader - Reader over the raw input.
 */
export function readSensorBand(reader: FieldReader): SensorBandParameters {
  return {
    sensor_type: reader.read(optionalSensorType),
    sensor_name_mask: reader.read(optionalMask),
    lower_bound: reader.read(optionalLower),
    upper_bound: reader.read(optionalUpper),
    prev_msg_diff: reader.read(optionalPrevMsgDiff),
    merge: reader.read(optionalMerge),
    reversed: reader.read(optionalReversed),
  };
}

/**
 * Speed window fields.
 *
 * @param omitWhenDefault - Whether the window is an optional refinement.
 */
export function speedWindowFields(omitWhenDefault: boolean): readonly [FieldSpec<number>, FieldSpec<number>] {
  return omitWhenDefault
    ? [compact(minSpeedField), compact(maxSpeedField)]
    : [minSpeedField, maxSpeedField];
}

/**
 * Reads a speed window.
 *
 * @param reader - Reader over the raw input.
 * @param fields - The pair returned by {@link speedWindowFields}.
 */
export function readSpeedWindow(
  reader: FieldReader,
  fields: readonly [FieldSpec<number>, FieldSpec<number>]
): SpeedWindowParameters {
  const [min, max] = fields;
  return {
    min_speed: reader.read(min),
    max_speed: reader.read(max),
  };
}
