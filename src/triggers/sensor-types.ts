/**
 * Sensor type codes understood by the remote platform's sensor filters.
 *
 * @packageDocumentation
 */

import type { FieldChoice } from './fields.js';

/**
 * Sensor types grouped roughly by family. The empty code matches any sensor.
 */
export const SENSOR_TYPES: readonly FieldChoice<string>[] = [
  { value: '', label: 'Any' },
  // Mileage
  { value: 'mileage', label: 'Mileage sensor' },
  { value: 'odometer', label: 'Relative odometer' },
  // Digital
  { value: 'engine operation', label: 'Engine ignition sensor' },
  { value: 'alarm trigger', label: 'Alarm trigger' },
  { value: 'private mode', label: 'Private mode' },
  { value: 'real-time motion sensor', label: 'Real-time motion sensor' },
  { value: 'digital', label: 'Custom digital sensor' },
  // Gauges
  { value: 'voltage', label: 'Voltage sensor' },
  { value: 'weight', label: 'Weight sensor' },
  { value: 'accelerometer', label: 'Accelerometer' },
  { value: 'temperature', label: 'Temperature sensor' },
  { value: 'temperature coefficient', label: 'Temperature coefficient' },
  // Engine
  { value: 'engine rpm', label: 'Engine revolution sensor' },
  { value: 'engine efficiency', label: 'Engine efficiency sensor' },
  { value: 'engine hours', label: 'Absolute engine hours' },
  { value: 'relative engine hours', label: 'Relative engine hours' },
  // Fuel
  { value: 'impulse fuel consumption', label: 'Impulse fuel consumption sensor' },
  { value: 'absolute fuel consumption', label: 'Absolute fuel consumption sensor' },
  { value: 'instant fuel consumption', label: 'Instant fuel consumption sensor' },
  { value: 'fuel level', label: 'Fuel level sensor' },
  { value: 'fuel level impulse sensor', label: 'Impulse fuel level sensor' },
  { value: 'battery level', label: 'Battery level sensor' },
  // Other
  { value: 'counter', label: 'Counter sensor' },
  { value: 'custom', label: 'Custom sensor' },
  { value: 'driver', label: 'Driver assignment' },
  { value: 'trailer', label: 'Trailer assignment' },
  { value: 'tag', label: 'Passenger sensor' },
];
