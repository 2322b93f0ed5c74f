/**
 * Sensor and message-content triggers: sensor value, parameter in a message,
 * digital input, and fuel filling / drain.
 *
 * @packageDocumentation
 */

import {
  choiceField,
  compact,
  geozonesListField,
  geozonesTypeField,
  integerField,
  lowerBoundField,
  mergeField,
  prevMsgDiffField,
  rangePolarityField,
  realtimeOnlyField,
  sensorNameMaskField,
  textField,
  upperBoundField,
  type FieldReader,
  type FieldSpec,
} from '../fields.js';
import { VALUE_BOUNDS, type TriggerDefinition } from '../definition.js';
import type { FuelEventParameters } from '../types.js';
import { sensorTypeField } from './sensor-band.js';

const optionalSensorType = compact(sensorTypeField);
const optionalPrevMsgDiff = compact(prevMsgDiffField);
const optionalMerge = compact(mergeField);

export const sensorValueTrigger: TriggerDefinition<'sensor-value'> = {
  kind: 'sensor-value',
  wireCode: 'sensor_value',
  label: 'Sensor value',
  description: 'Value of the matching sensors is inside or outside a band.',
  fields: [
    optionalSensorType,
    sensorNameMaskField,
    lowerBoundField,
    upperBoundField,
    optionalPrevMsgDiff,
    optionalMerge,
    rangePolarityField,
  ],
  boundPairs: [VALUE_BOUNDS],
  build(reader) {
    return {
      sensor_type: reader.read(optionalSensorType),
      sensor_name_mask: reader.read(sensorNameMaskField),
      lower_bound: reader.read(lowerBoundField),
      upper_bound: reader.read(upperBoundField),
      prev_msg_diff: reader.read(optionalPrevMsgDiff),
      merge: reader.read(optionalMerge),
      type: reader.read(rangePolarityField),
    };
  },
};

const paramNameField = textField('param', 'Parameter name', '');
const paramKindField = choiceField('kind', 'Check', [
  { value: 0, label: 'Value range' },
  { value: 1, label: 'Text mask' },
  { value: 2, label: 'Parameter availability' },
  { value: 3, label: 'Parameter lack' },
]);
const textMaskField = compact(textField('text_mask', 'Text mask'));

export const messageParameterTrigger: TriggerDefinition<'message-parameter'> = {
  kind: 'message-parameter',
  wireCode: 'msg_param',
  label: 'Parameter in a message',
  description: 'A raw message parameter is in a range, matches a mask, or is present or absent.',
  fields: [
    paramNameField,
    paramKindField,
    textMaskField,
    lowerBoundField,
    upperBoundField,
    rangePolarityField,
  ],
  boundPairs: [VALUE_BOUNDS],
  build(reader) {
    return {
      param: reader.read(paramNameField),
      kind: reader.read(paramKindField),
      text_mask: reader.read(textMaskField),
      lower_bound: reader.read(lowerBoundField),
      upper_bound: reader.read(upperBoundField),
      type: reader.read(rangePolarityField),
    };
  },
};

const inputIndexField = integerField('input_index', 'Input number', {
  defaultValue: 1,
  min: 1,
  max: 32,
});
const inputEdgeField = choiceField('type', 'Trigger on', [
  { value: 0, label: 'Activation' },
  { value: 1, label: 'Deactivation' },
]);

export const digitalInputTrigger: TriggerDefinition<'digital-input'> = {
  kind: 'digital-input',
  wireCode: 'digital_input',
  label: 'Digital input',
  description: 'A numbered digital input is activated or deactivated.',
  fields: [inputIndexField, inputEdgeField],
  boundPairs: [],
  build(reader) {
    return {
      input_index: reader.read(inputIndexField),
      type: reader.read(inputEdgeField),
    };
  },
};

const fuelFields: readonly FieldSpec[] = [
  sensorNameMaskField,
  geozonesTypeField,
  geozonesListField,
  realtimeOnlyField,
];

function readFuelEvent(reader: FieldReader): FuelEventParameters {
  return {
    sensor_name_mask: reader.read(sensorNameMaskField),
    geozones_type: reader.read(geozonesTypeField),
    geozones_list: reader.read(geozonesListField),
    realtime_only: reader.read(realtimeOnlyField),
  };
}

export const fuelFillTrigger: TriggerDefinition<'fuel-fill'> = {
  kind: 'fuel-fill',
  wireCode: 'fuel_filling',
  label: 'Fuel filling / battery charge',
  description: 'A fuel filling or battery charge is detected.',
  fields: fuelFields,
  boundPairs: [],
  build: readFuelEvent,
};

export const fuelDrainTrigger: TriggerDefinition<'fuel-drain'> = {
  kind: 'fuel-drain',
  wireCode: 'fuel_theft',
  label: 'Fuel drain / theft',
  description: 'A fuel drain is detected.',
  fields: fuelFields,
  boundPairs: [],
  build: readFuelEvent,
};
