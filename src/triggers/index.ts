/**
 * Trigger kinds, parameter schemas and validators.
 *
 * @packageDocumentation
 */

export {
  TRIGGER_KINDS,
  isTriggerKind,
  type TriggerKind,
  type TriggerWireCode,
  type ParamValue,
  type RawParameters,
  type LogicOperator,
  type TriggerParametersMap,
  type TriggerParameters,
  type TriggerConfig,
  type SensorBandParameters,
  type SpeedWindowParameters,
  type GeofenceParameters,
  type AddressParameters,
  type SpeedParameters,
  type AlarmParameters,
  type DigitalInputParameters,
  type MessageParameterParameters,
  type SensorValueParameters,
  type ConnectionOutageParameters,
  type InterpositionParameters,
  type MessageExcessParameters,
  type RouteParameters,
  type DriverParameters,
  type TrailerParameters,
  type MaintenanceParameters,
  type FuelEventParameters,
  type HealthCheckParameters,
} from './types.js';
export {
  FieldReader,
  MAX_SPEED_KMH,
  describeField,
  sameParamValue,
  type FieldChoice,
  type FieldControl,
  type FieldDescriptor,
  type FieldParseResult,
  type FieldSpec,
} from './fields.js';
export { SPEED_BOUNDS, VALUE_BOUNDS, type BoundPair, type TriggerDefinition } from './definition.js';
export { SENSOR_TYPES } from './sensor-types.js';
export {
  TRIGGER_REGISTRY,
  describeTriggerSchema,
  getTriggerDefinition,
  getTriggerDefinitionByWireCode,
  listTriggerKinds,
  type TriggerKindSummary,
  type TriggerRegistry,
} from './registry.js';
export {
  defaultTrigger,
  errorsByField,
  validateTriggerParameters,
  type TriggerValidationResult,
} from './validator.js';
