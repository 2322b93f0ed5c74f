/**
 * Device and connectivity triggers: alarm, connection outage, excess of
 * messages and health check.
 *
 * @packageDocumentation
 */

import {
  choiceField,
  compact,
  geozonesListField,
  geozonesTypeField,
  includeLbsField,
  integerField,
  type FieldSpec,
} from '../fields.js';
import type { TriggerDefinition } from '../definition.js';

export const alarmTrigger: TriggerDefinition<'alarm'> = {
  kind: 'alarm',
  wireCode: 'alarm',
  label: 'Alarm',
  description: 'The device raises its alarm (panic button).',
  fields: [],
  boundPairs: [],
  build() {
    return {};
  },
};

const outageTimeField = integerField('time', 'Outage duration (s)', {
  defaultValue: 300,
  min: 1,
  max: 86400,
});
const outageTypeField = choiceField('type', 'Lost', [
  { value: 0, label: 'Coordinates' },
  { value: 1, label: 'Connection' },
]);
const checkRestoreField = choiceField('check_restore', 'Trigger when connection is', [
  { value: 0, label: 'Lost' },
  { value: 1, label: 'Lost and restored' },
  { value: 2, label: 'Restored' },
]);
const optionalGeozonesType = compact(geozonesTypeField);
const optionalGeozonesList = compact(geozonesListField);
const optionalIncludeLbs = compact(includeLbsField);

export const connectionOutageTrigger: TriggerDefinition<'connection-outage'> = {
  kind: 'connection-outage',
  wireCode: 'outage',
  label: 'Connection loss',
  description: 'No data or no coordinates arrive from the unit for a period.',
  fields: [
    outageTimeField,
    outageTypeField,
    checkRestoreField,
    optionalGeozonesType,
    optionalGeozonesList,
    optionalIncludeLbs,
  ],
  boundPairs: [],
  build(reader) {
    return {
      time: reader.read(outageTimeField),
      type: reader.read(outageTypeField),
      check_restore: reader.read(checkRestoreField),
      geozones_type: reader.read(optionalGeozonesType),
      geozones_list: reader.read(optionalGeozonesList),
      include_lbs: reader.read(optionalIncludeLbs),
    };
  },
};

const excessFlagsField = choiceField(
  'flags',
  'Count',
  [
    { value: 1, label: 'Data messages' },
    { value: 2, label: 'SMS messages' },
  ],
  1
);
const msgsLimitField = integerField('msgs_limit', 'Message limit', {
  defaultValue: 100,
  min: 1,
});
const timeOffsetField = integerField('time_offset', 'Counting window (s)', {
  defaultValue: 3600,
  min: 1,
  max: 86400,
});

export const messageExcessTrigger: TriggerDefinition<'message-excess'> = {
  kind: 'message-excess',
  wireCode: 'msgs_counter',
  label: 'Excess of messages',
  description: 'More messages than the limit arrive within the counting window.',
  fields: [excessFlagsField, msgsLimitField, timeOffsetField],
  boundPairs: [],
  build(reader) {
    return {
      flags: reader.read(excessFlagsField),
      msgs_limit: reader.read(msgsLimitField),
      time_offset: reader.read(timeOffsetField),
    };
  },
};

function healthToggle(name: string, condition: string): FieldSpec<number> {
  return choiceField(name, condition, [
    { value: 0, label: `Don't trigger ${condition}` },
    { value: 1, label: `Trigger ${condition}` },
  ]);
}

const healthyField = healthToggle('healthy', 'when the device is healthy');
const unhealthyField = healthToggle('unhealthy', 'when the device is unhealthy');
const needAttentionField = healthToggle('needAttention', 'when the device needs attention');
const perIncidentField = healthToggle('triggerForEachIncident', 'for each incident');

export const healthCheckTrigger: TriggerDefinition<'health-check'> = {
  kind: 'health-check',
  wireCode: 'health_check',
  label: 'Health check',
  description: 'The device health state changes.',
  fields: [healthyField, unhealthyField, needAttentionField, perIncidentField],
  boundPairs: [],
  build(reader) {
    return {
      healthy: reader.read(healthyField),
      unhealthy: reader.read(unhealthyField),
      needAttention: reader.read(needAttentionField),
      triggerForEachIncident: reader.read(perIncidentField),
    };
  },
};
