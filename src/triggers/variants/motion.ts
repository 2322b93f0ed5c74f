/**
 * Speed trigger.
 *
 * @packageDocumentation
 */

import { SPEED_BOUNDS, VALUE_BOUNDS, type TriggerDefinition } from '../definition.js';
import {
  SENSOR_BAND_FIELDS,
  readSensorBand,
  readSpeedWindow,
  speedWindowFields,
} from './sensor-band.js';

const speedWindow = speedWindowFields(false);

export const speedTrigger: TriggerDefinition<'speed'> = {
  kind: 'speed',
  wireCode: 'speed',
  label: 'Speed',
  description: 'Unit speed leaves or enters the min/max window (max 0 means no upper limit).',
  fields: [...speedWindow, ...SENSOR_BAND_FIELDS],
  boundPairs: [SPEED_BOUNDS, VALUE_BOUNDS],
  build(reader) {
    return {
      ...readSpeedWindow(reader, speedWindow),
      ...readSensorBand(reader),
    };
  },
};
