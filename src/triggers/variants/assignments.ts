/**
 * Assignment and progress triggers: route, driver, trailer and maintenance.
 *
 * @packageDocumentation
 */

import { choiceField, idListField, integerField, textField } from '../fields.js';
import type { TriggerDefinition } from '../definition.js';

const routeMaskField = textField('mask', 'Route name mask');
const roundMaskField = textField('round_mask', 'Round name mask');
const scheduleMaskField = textField('schedule_mask', 'Schedule name mask');
const routeEventsField = idListField('types', 'Route events');

export const routeTrigger: TriggerDefinition<'route'> = {
  kind: 'route',
  wireCode: 'route_control',
  label: 'Route progress',
  description: 'A matching route round reports one of the selected progress events.',
  fields: [routeMaskField, roundMaskField, scheduleMaskField, routeEventsField],
  boundPairs: [],
  build(reader) {
    return {
      mask: reader.read(routeMaskField),
      round_mask: reader.read(roundMaskField),
      schedule_mask: reader.read(scheduleMaskField),
      types: reader.read(routeEventsField),
    };
  },
};

const driverCodeMaskField = textField('driver_code_mask', 'Code mask');
const driverFlagsField = choiceField(
  'flags',
  'Trigger on',
  [
    { value: 1, label: 'Assignment' },
    { value: 2, label: 'Separation' },
  ],
  1
);

export const driverTrigger: TriggerDefinition<'driver'> = {
  kind: 'driver',
  wireCode: 'driver',
  label: 'Driver',
  description: 'A driver whose code matches the mask is assigned or separated.',
  fields: [driverCodeMaskField, driverFlagsField],
  boundPairs: [],
  build(reader) {
    return {
      driver_code_mask: reader.read(driverCodeMaskField),
      flags: reader.read(driverFlagsField),
    };
  },
};

export const trailerTrigger: TriggerDefinition<'trailer'> = {
  kind: 'trailer',
  wireCode: 'trailer',
  label: 'Trailer',
  description: 'A trailer whose code matches the mask is assigned or separated.',
  fields: [driverCodeMaskField, driverFlagsField],
  boundPairs: [],
  build(reader) {
    return {
      driver_code_mask: reader.read(driverCodeMaskField),
      flags: reader.read(driverFlagsField),
    };
  },
};

const serviceMaskField = textField('mask', 'Service interval name mask');
const serviceFlagsField = choiceField('flags', 'Intervals', [
  { value: 0, label: 'All service intervals' },
  { value: 1, label: 'Mileage interval' },
  { value: 2, label: 'Engine hours interval' },
  { value: 4, label: 'Days interval' },
]);
const mileageField = integerField('mileage', 'Mileage (km)', { min: 0 });
const engineHoursField = integerField('engine_hours', 'Engine hours', { min: 0 });
const daysField = integerField('days', 'Days', { min: 0 });
const termField = choiceField(
  'val',
  'Notify when service term',
  [
    { value: 1, label: 'Approaches' },
    { value: -1, label: 'Is expired' },
  ],
  1
);

export const maintenanceTrigger: TriggerDefinition<'maintenance'> = {
  kind: 'maintenance',
  wireCode: 'service_intervals',
  label: 'Maintenance',
  description: 'A service interval approaches or passes its term.',
  fields: [serviceMaskField, serviceFlagsField, mileageField, engineHoursField, daysField, termField],
  boundPairs: [],
  build(reader) {
    return {
      mask: reader.read(serviceMaskField),
      flags: reader.read(serviceFlagsField),
      mileage: reader.read(mileageField),
      engine_hours: reader.read(engineHoursField),
      days: reader.read(daysField),
      val: reader.read(termField),
    };
  },
};
