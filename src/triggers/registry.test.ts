import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { UnknownTriggerKindError } from '../errors.js';
import {
  TRIGGER_REGISTRY,
  describeTriggerSchema,
  getTriggerDefinition,
  getTriggerDefinitionByWireCode,
  listTriggerKinds,
} from './registry.js';
import { TRIGGER_KINDS, isTriggerKind } from './types.js';

const WIRE_CODES = {
  geofence: 'geozone',
  address: 'address',
  speed: 'speed',
  alarm: 'alarm',
  'digital-input': 'digital_input',
  'message-parameter': 'msg_param',
  'sensor-value': 'sensor_value',
  'connection-outage': 'outage',
  interposition: 'interposition',
  'message-excess': 'msgs_counter',
  route: 'route_control',
  driver: 'driver',
  trailer: 'trailer',
  maintenance: 'service_intervals',
  'fuel-fill': 'fuel_filling',
  'fuel-drain': 'fuel_theft',
  'health-check': 'health_check',
} as const;

describe('trigger registry', () => {
  it('should register every kind under its own key', () => {
    for (const kind of TRIGGER_KINDS) {
      expect(TRIGGER_REGISTRY[kind].kind).toBe(kind);
    }
  });

  it('should map each kind to its remote trigger code', () => {
    const codes = Object.fromEntries(TRIGGER_KINDS.map((kind) => [kind, TRIGGER_REGISTRY[kind].wireCode]));
    expect(codes).toEqual(WIRE_CODES);
  });

  it('should find definitions by remote trigger code', () => {
    expect(getTriggerDefinitionByWireCode('geozone').kind).toBe('geofence');
    expect(getTriggerDefinitionByWireCode('fuel_theft').kind).toBe('fuel-drain');
    expect(() => getTriggerDefinitionByWireCode('geofence')).toThrow(UnknownTriggerKindError);
  });

  it('should reject unknown kinds', () => {
    expect(() => getTriggerDefinition('teleport')).toThrow("Unknown trigger kind 'teleport'");
    expect(() => getTriggerDefinition('sensor_value')).toThrow(UnknownTriggerKindError);
    expect(() => getTriggerDefinition('__proto__')).toThrow(UnknownTriggerKindError);
  });

  it('should reject any string outside the closed set', () => {
    fc.assert(
      fc.property(
        fc.string().filter((s) => !isTriggerKind(s)),
        (kind) => {
          expect(() => getTriggerDefinition(kind)).toThrow(UnknownTriggerKindError);
        }
      )
    );
  });

  it('should list kinds in display order with labels', () => {
    const kinds = listTriggerKinds();

    expect(kinds.map((k) => k.kind)).toEqual([...TRIGGER_KINDS]);
    expect(kinds[6]).toEqual({
      kind: 'sensor-value',
      label: 'Sensor value',
      description: 'Value of the matching sensors is inside or outside a band.',
    });
  });

  it('should describe a kind as plain field descriptors', () => {
    const fields = describeTriggerSchema('digital-input');

    expect(fields).toEqual([
      { name: 'input_index', label: 'Input number', control: 'integer', defaultValue: 1, min: 1, max: 32 },
      {
        name: 'type',
        label: 'Trigger on',
        control: 'choice',
        defaultValue: 0,
        choices: [
          { value: 0, label: 'Activation' },
          { value: 1, label: 'Deactivation' },
        ],
      },
    ]);
    expect(describeTriggerSchema('alarm')).toEqual([]);
  });
});
