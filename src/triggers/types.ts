/**
 * Trigger kinds and their parameter shapes.
 *
 * Parameter names follow the remote platform's own names so that a validated
 * parameter set can be written to the wire without renaming. The shapes are
 * type aliases rather than interfaces so that each one is assignable to a
 * plain `Record<string, ParamValue>` for generic field iteration.
 *
 * @packageDocumentation
 */

/**
 * All trigger kinds, in display order.
 */
export const TRIGGER_KINDS = [
  'geofence',
  'address',
  'speed',
  'alarm',
  'digital-input',
  'message-parameter',
  'sensor-value',
  'connection-outage',
  'interposition',
  'message-excess',
  'route',
  'driver',
  'trailer',
  'maintenance',
  'fuel-fill',
  'fuel-drain',
  'health-check',
] as const;

/**
 * Closed set of trigger kinds.
 */
export type TriggerKind = (typeof TRIGGER_KINDS)[number];

/**
 * Trigger codes as the remote platform names them.
 */
export type TriggerWireCode =
  | 'geozone'
  | 'address'
  | 'speed'
  | 'alarm'
  | 'digital_input'
  | 'msg_param'
  | 'sensor_value'
  | 'outage'
  | 'interposition'
  | 'msgs_counter'
  | 'route_control'
  | 'driver'
  | 'trailer'
  | 'service_intervals'
  | 'fuel_filling'
  | 'fuel_theft'
  | 'health_check';

/**
 * A single validated parameter value.
 */
export type ParamValue = number | string | readonly number[];

/**
 * Unvalidated parameter input keyed by field name, as submitted by an
 * operator or read back from the remote platform.
 */
export type RawParameters = Readonly<Record<string, unknown>>;

/** Logical operator joining a trigger's sub-conditions. */
export type LogicOperator = 'AND' | 'OR';

/**
 * Sensor-band fields shared by several trigger kinds.
 */
export type SensorBandParameters = {
  /** Sensor type filter; empty string matches any type. */
  readonly sensor_type: string;
  readonly sensor_name_mask: string;
  readonly lower_bound: number;
  readonly upper_bound: number;
  /** 0: relative to absolute value, 1: relative to previous value. */
  readonly prev_msg_diff: number;
  /** 0: calculate similar sensors separately, 1: sum them up. */
  readonly merge: number;
  /** 0: inside the band, 1: outside the band. */
  readonly reversed: number;
};

/** Speed window in km/h; `max_speed` 0 means no upper limit. */
export type SpeedWindowParameters = {
  readonly min_speed: number;
  readonly max_speed: number;
};

export type GeofenceParameters = SensorBandParameters &
  SpeedWindowParameters & {
    readonly geozone_ids: readonly number[];
    /** 0: inside geofence, 1: outside geofence. */
    readonly type: number;
    readonly include_lbs: number;
    readonly lo: LogicOperator;
  };

export type AddressParameters = SensorBandParameters &
  SpeedWindowParameters & {
    readonly country: string;
    readonly region: string;
    readonly city: string;
    readonly street: string;
    readonly house: string;
    /** Radius around the address in meters. */
    readonly radius: number;
    /** 0: within the radius, 1: outside the radius. */
    readonly type: number;
    readonly include_lbs: number;
  };

export type SpeedParameters = SensorBandParameters & SpeedWindowParameters;

export type AlarmParameters = Record<string, never>;

export type DigitalInputParameters = {
  /** Input index, 1 to 32. */
  readonly input_index: number;
  /** 0: activation, 1: deactivation. */
  readonly type: number;
};

export type MessageParameterParameters = {
  readonly param: string;
  /** 0: value range, 1: text mask, 2: parameter present, 3: parameter absent. */
  readonly kind: number;
  readonly text_mask: string;
  readonly lower_bound: number;
  readonly upper_bound: number;
  /** 0: in range, 1: out of range. */
  readonly type: number;
};

export type SensorValueParameters = {
  readonly sensor_type: string;
  readonly sensor_name_mask: string;
  readonly lower_bound: number;
  readonly upper_bound: number;
  readonly prev_msg_diff: number;
  readonly merge: number;
  /** 0: in range, 1: out of range. */
  readonly type: number;
};

export type ConnectionOutageParameters = {
  /** Seconds without data before the trigger fires. */
  readonly time: number;
  /** 0: coordinates loss, 1: connection loss. */
  readonly type: number;
  /** 0: lost, 1: lost and restored, 2: restored. */
  readonly check_restore: number;
  /** 0: outside the listed geofences, 1: inside. */
  readonly geozones_type: number;
  readonly geozones_list: readonly number[];
  readonly include_lbs: number;
};

export type InterpositionParameters = SensorBandParameters &
  SpeedWindowParameters & {
    readonly unit_guids: readonly number[];
    /** Distance between units in meters. */
    readonly radius: number;
    /** 0: approaching, 1: moving away. */
    readonly type: number;
    readonly include_lbs: number;
    readonly lo: LogicOperator;
  };

export type MessageExcessParameters = {
  /** 1: data messages, 2: SMS messages. */
  readonly flags: number;
  readonly msgs_limit: number;
  /** Counting window in seconds. */
  readonly time_offset: number;
};

export type RouteParameters = {
  readonly mask: string;
  readonly round_mask: string;
  readonly schedule_mask: string;
  /** Route event codes to react to. */
  readonly types: readonly number[];
};

export type DriverParameters = {
  readonly driver_code_mask: string;
  /** 1: assignment, 2: separation. */
  readonly flags: number;
};

export type TrailerParameters = {
  readonly driver_code_mask: string;
  /** 1: assignment, 2: separation. */
  readonly flags: number;
};

export type MaintenanceParameters = {
  readonly mask: string;
  /** 0: all intervals, 1: mileage, 2: engine hours, 4: days. */
  readonly flags: number;
  readonly mileage: number;
  readonly engine_hours: number;
  readonly days: number;
  /** 1: term approaching, -1: term expired. */
  readonly val: number;
};

export type FuelEventParameters = {
  readonly sensor_name_mask: string;
  readonly geozones_type: number;
  readonly geozones_list: readonly number[];
  readonly realtime_only: number;
};

export type HealthCheckParameters = {
  readonly healthy: number;
  readonly unhealthy: number;
  readonly needAttention: number;
  readonly triggerForEachIncident: number;
};

/**
 * Parameter shape for each trigger kind.
 */
export type TriggerParametersMap = {
  readonly geofence: GeofenceParameters;
  readonly address: AddressParameters;
  readonly speed: SpeedParameters;
  readonly alarm: AlarmParameters;
  readonly 'digital-input': DigitalInputParameters;
  readonly 'message-parameter': MessageParameterParameters;
  readonly 'sensor-value': SensorValueParameters;
  readonly 'connection-outage': ConnectionOutageParameters;
  readonly interposition: InterpositionParameters;
  readonly 'message-excess': MessageExcessParameters;
  readonly route: RouteParameters;
  readonly driver: DriverParameters;
  readonly trailer: TrailerParameters;
  readonly maintenance: MaintenanceParameters;
  readonly 'fuel-fill': FuelEventParameters;
  readonly 'fuel-drain': FuelEventParameters;
  readonly 'health-check': HealthCheckParameters;
};

/**
 * Parameters of one kind, or of any kind when `K` is left open.
 */
export type TriggerParameters<K extends TriggerKind = TriggerKind> = TriggerParametersMap[K];

/**
 * A trigger kind together with its validated parameters.
 *
 * With `K` left open this is a discriminated union over all kinds, so a
 * `switch` on `kind` narrows `parameters`.
 */
export type TriggerConfig<K extends TriggerKind = TriggerKind> = {
  [P in K]: { readonly kind: P; readonly parameters: TriggerParametersMap[P] };
}[K];

/**
 * Type guard for the closed set of trigger kinds.
 *
 * @param value - Untrusted input.
 */
export function isTriggerKind(value: unknown): value is TriggerKind {
  return typeof value === 'string' && TRIGGER_KINDS.some((kind) => kind === value);
}
