/**
 * Location triggers: geofence, address and interposition of units.
 *
 * @packageDocumentation
 */

import {
  choiceField,
  compact,
  idListField,
  includeLbsField,
  integerField,
  logicOperatorField,
  textField,
} from '../fields.js';
import { SPEED_BOUNDS, VALUE_BOUNDS, type TriggerDefinition } from '../definition.js';
import {
  SENSOR_BAND_FIELDS,
  readSensorBand,
  readSpeedWindow,
  speedWindowFields,
} from './sensor-band.js';

const optionalIncludeLbs = compact(includeLbsField);
const optionalLogicOperator = compact(logicOperatorField);
const optionalSpeedWindow = speedWindowFields(true);

const geozoneIdsField = idListField('geozone_ids', 'Geofences');
const geofencePolarityField = choiceField('type', 'Trigger when unit is', [
  { value: 0, label: 'Inside geofence' },
  { value: 1, label: 'Outside geofence' },
]);

export const geofenceTrigger: TriggerDefinition<'geofence'> = {
  kind: 'geofence',
  wireCode: 'geozone',
  label: 'Geofence',
  description: 'Unit enters, leaves or stays inside one of the listed geofences.',
  fields: [
    geozoneIdsField,
    geofencePolarityField,
    ...optionalSpeedWindow,
    optionalIncludeLbs,
    optionalLogicOperator,
    ...SENSOR_BAND_FIELDS,
  ],
  boundPairs: [VALUE_BOUNDS, SPEED_BOUNDS],
  build(reader) {
    return {
      geozone_ids: reader.read(geozoneIdsField),
      type: reader.read(geofencePolarityField),
      ...readSpeedWindow(reader, optionalSpeedWindow),
      include_lbs: reader.read(optionalIncludeLbs),
      lo: reader.read(optionalLogicOperator),
      ...readSensorBand(reader),
    };
  },
};

const countryField = textField('country', 'Country', '');
const regionField = textField('region', 'Region', '');
const cityField = textField('city', 'City', '');
const streetField = textField('street', 'Street', '');
const houseField = textField('house', 'House', '');
const addressRadiusField = integerField('radius', 'Radius (m)', {
  defaultValue: 100,
  min: 1,
  max: 100000,
});
const addressPolarityField = choiceField('type', 'Trigger when unit is', [
  { value: 0, label: 'Within the radius' },
  { value: 1, label: 'Outside the radius' },
]);

export const addressTrigger: TriggerDefinition<'address'> = {
  kind: 'address',
  wireCode: 'address',
  label: 'Address',
  description: 'Unit is within or outside a radius around a street address.',
  fields: [
    countryField,
    regionField,
    cityField,
    streetField,
    houseField,
    addressRadiusField,
    addressPolarityField,
    ...optionalSpeedWindow,
    optionalIncludeLbs,
    ...SENSOR_BAND_FIELDS,
  ],
  boundPairs: [VALUE_BOUNDS, SPEED_BOUNDS],
  build(reader) {
    return {
      country: reader.read(countryField),
      region: reader.read(regionField),
      city: reader.read(cityField),
      street: reader.read(streetField),
      house: reader.read(houseField),
      radius: reader.read(addressRadiusField),
      type: reader.read(addressPolarityField),
      ...readSpeedWindow(reader, optionalSpeedWindow),
      include_lbs: reader.read(optionalIncludeLbs),
      ...readSensorBand(reader),
    };
  },
};

const unitGuidsField = idListField('unit_guids', 'Units to watch');
const interpositionRadiusField = integerField('radius', 'Distance (m)', {
  defaultValue: 100,
  min: 1,
  max: 100000,
});
const interpositionPolarityField = choiceField('type', 'Trigger when units are', [
  { value: 0, label: 'Approaching each other' },
  { value: 1, label: 'Moving away from each other' },
]);

export const interpositionTrigger: TriggerDefinition<'interposition'> = {
  kind: 'interposition',
  wireCode: 'interposition',
  label: 'Interposition of units',
  description: 'Unit comes within, or moves beyond, a distance of other units.',
  fields: [
    unitGuidsField,
    interpositionRadiusField,
    interpositionPolarityField,
    ...optionalSpeedWindow,
    optionalIncludeLbs,
    optionalLogicOperator,
    ...SENSOR_BAND_FIELDS,
  ],
  boundPairs: [VALUE_BOUNDS, SPEED_BOUNDS],
  build(reader) {
    return {
      unit_guids: reader.read(unitGuidsField),
      radius: reader.read(interpositionRadiusField),
      type: reader.read(interpositionPolarityField),
      ...readSpeedWindow(reader, optionalSpeedWindow),
      include_lbs: reader.read(optionalIncludeLbs),
      lo: reader.read(optionalLogicOperator),
      ...readSensorBand(reader),
    };
  },
};
