/**
 * Trigger type registry.
 *
 * The registry is a mapped type over {@link TriggerKind}: adding a kind to the
 * enumeration without registering its definition fails to compile. Lookups
 * take untrusted strings and throw {@link UnknownTriggerKindError} for values
 * outside the closed set.
 *
 * @packageDocumentation
 */

import { UnknownTriggerKindError } from '../errors.js';
import type { TriggerDefinition } from './definition.js';
import { describeField, type FieldDescriptor } from './fields.js';
import { TRIGGER_KINDS, isTriggerKind, type TriggerKind, type TriggerWireCode } from './types.js';
import { addressTrigger, geofenceTrigger, interpositionTrigger } from './variants/location.js';
import { speedTrigger } from './variants/motion.js';
import {
  digitalInputTrigger,
  fuelDrainTrigger,
  fuelFillTrigger,
  messageParameterTrigger,
  sensorValueTrigger,
} from './variants/sensors.js';
import {
  alarmTrigger,
  connectionOutageTrigger,
  healthCheckTrigger,
  messageExcessTrigger,
} from './variants/connectivity.js';
import {
  driverTrigger,
  maintenanceTrigger,
  routeTrigger,
  trailerTrigger,
} from './variants/assignments.js';

/**
 * One definition per trigger kind.
 */
export type TriggerRegistry = { readonly [K in TriggerKind]: TriggerDefinition<K> };

export const TRIGGER_REGISTRY: TriggerRegistry = {
  geofence: geofenceTrigger,
  address: addressTrigger,
  speed: speedTrigger,
  alarm: alarmTrigger,
  'digital-input': digitalInputTrigger,
  'message-parameter': messageParameterTrigger,
  'sensor-value': sensorValueTrigger,
  'connection-outage': connectionOutageTrigger,
  interposition: interpositionTrigger,
  'message-excess': messageExcessTrigger,
  route: routeTrigger,
  driver: driverTrigger,
  trailer: trailerTrigger,
  maintenance: maintenanceTrigger,
  'fuel-fill': fuelFillTrigger,
  'fuel-drain': fuelDrainTrigger,
  'health-check': healthCheckTrigger,
};

const BY_WIRE_CODE: ReadonlyMap<string, TriggerDefinition> = new Map(
  TRIGGER_KINDS.map((kind): [TriggerWireCode, TriggerDefinition] => {
    const definition: TriggerDefinition = TRIGGER_REGISTRY[kind];
    return [definition.wireCode, definition];
  })
);

/**
 * Returns the definition for a trigger kind.
 *
 * @param kind - Untrusted kind, typically from a previous workflow step.
 * @throws UnknownTriggerKindError if `kind` is not a trigger kind.
 */
export function getTriggerDefinition<K extends TriggerKind>(kind: K): TriggerDefinition<K>;
export function getTriggerDefinition(kind: string): TriggerDefinition;
export function getTriggerDefinition(kind: string): TriggerDefinition {
  if (!isTriggerKind(kind)) {
    throw new UnknownTriggerKindError(kind);
  }
  return TRIGGER_REGISTRY[kind];
}

/**
 * Returns the definition whose remote trigger code is `code`.
 *
 * @param code - Trigger code as read from the remote platform.
 * @throws UnknownTriggerKindError if no kind uses the code.
 */
export function getTriggerDefinitionByWireCode(code: string): TriggerDefinition {
  const definition = BY_WIRE_CODE.get(code);
  if (definition === undefined) {
    throw new UnknownTriggerKindError(code);
  }
  return definition;
}

/**
 * Summary of a trigger kind for the kind selection step.
 */
export interface TriggerKindSummary {
  readonly kind: TriggerKind;
  readonly label: string;
  readonly description: string;
}

/**
 * Lists every trigger kind in display order.
 */
export function listTriggerKinds(): readonly TriggerKindSummary[] {
  return TRIGGER_KINDS.map((kind) => {
    const { label, description } = TRIGGER_REGISTRY[kind];
    return { kind, label, description };
  });
}

/**
 * Describes the parameter schema of a kind for rendering an input form.
 *
 * @param kind - Untrusted kind.
 * @throws UnknownTriggerKindError if `kind` is not a trigger kind.
 */
export function describeTriggerSchema(kind: string): readonly FieldDescriptor[] {
  return getTriggerDefinition(kind).fields.map(describeField);
}
