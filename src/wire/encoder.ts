/**
 * Wire protocol encoder for remote notification requests.
 *
 * Create, update and delete share one parameter payload; they differ only in
 * the call mode and the id. Key order is fixed, so identical input always
 * serializes to byte-identical JSON.
 *
 * @packageDocumentation
 */

import { InvalidNotificationError } from '../errors.js';
import { sameParamValue } from '../triggers/fields.js';
import { getTriggerDefinition, getTriggerDefinitionByWireCode } from '../triggers/registry.js';
import type { ParamValue, TriggerConfig, TriggerWireCode } from '../triggers/types.js';
import { validateTriggerParameters } from '../triggers/validator.js';
import type { WireAction } from './delivery.js';
import { encodeSchedule, type WireSchedule } from './schedule.js';
import { NOTIFICATION_FLAGS, type NotificationSettings } from './settings.js';

/**
 * Trigger in wire form: the remote trigger code and its parameters.
 */
export interface WireTrigger {
  readonly t: TriggerWireCode;
  readonly p: Readonly<Record<string, number | string>>;
}

/**
 * The parameter payload shared by create, update and delete.
 */
export interface NotificationParams {
  readonly n: string;
  readonly txt: string;
  readonly ta: number;
  readonly td: number;
  readonly ma: number;
  readonly mmtd: number;
  readonly cdt: number;
  readonly mast: number;
  readonly mpst: number;
  readonly cp: number;
  readonly fl: number;
  readonly la: string;
  readonly tz: number;
  readonly un: readonly number[];
  readonly trg: WireTrigger;
  readonly act: readonly WireAction[];
  readonly sch: WireSchedule;
  readonly ctrl_sch: WireSchedule;
}

/** Call modes of the platform's notification update service. */
export type CallMode = 'create' | 'update' | 'delete' | 'enable';

/**
 * Create, update or delete request.
 */
export type NotificationMutationRequest = {
  readonly itemId: number;
  readonly id: number;
  readonly callMode: 'create' | 'update' | 'delete';
} & NotificationParams;

/**
 * Enable or disable request.
 */
export interface NotificationEnableRequest {
  readonly itemId: number;
  readonly id: number;
  readonly callMode: 'enable';
  readonly e: 0 | 1;
}

export type NotificationRequest = NotificationMutationRequest | NotificationEnableRequest;

/**
 * Everything the encoder reads from a notification.
 */
export interface EncodableNotification {
  readonly resourceId: number;
  readonly units: readonly number[];
  readonly trigger: TriggerConfig;
  readonly settings: NotificationSettings;
  /** Rendered delivery text. */
  readonly text: string;
  /** Rendered delivery actions. */
  readonly actions: readonly WireAction[];
  readonly enabled: boolean;
}

/**
 * Encodes a validated trigger.
 *
 * Fields marked compact are left out while they hold their default; all
 * other fields are always written.
 *
 * @param trigger - A trigger produced by the validator.
 *
 * @example
 * ```typescript
 * encodeTrigger({ kind: 'driver', parameters: { driver_code_mask: '*', flags: 1 } });
 * // { t: 'driver', p: { driver_code_mask: '*', flags: 1 } }
 * ```
 */
export function encodeTrigger(trigger: TriggerConfig): WireTrigger {
  const definition = getTriggerDefinition(trigger.kind);
  const values: Readonly<Record<string, ParamValue>> = trigger.parameters;
  const p: Record<string, number | string> = {};

  for (const field of definition.fields) {
    const value = values[field.name] ?? field.defaultValue;
    if (field.omitWhenDefault && sameParamValue(value, field.defaultValue)) {
      continue;
    }
    p[field.name] = field.toWire(value);
  }

  return { t: definition.wireCode, p };
}

/**
 * Decodes a trigger read from the platform. Omitted fields take their
 * defaults, so `decodeTrigger(encodeTrigger(t))` equals `t`.
 *
 * @param wire - Trigger code and raw parameters.
 * @throws UnknownTriggerKindError if the code is not a known trigger.
 * @throws InvalidNotificationError if a parameter fails validation.
 */
export function decodeTrigger(wire: { readonly t: string; readonly p: Readonly<Record<string, unknown>> }): TriggerConfig {
  const definition = getTriggerDefinitionByWireCode(wire.t);
  const result = validateTriggerParameters(definition.kind, wire.p);
  if (!result.valid) {
    throw new InvalidNotificationError(`Remote trigger '${wire.t}' has invalid parameters`, result.errors);
  }
  return result.trigger;
}

/**
 * Computes the wire `fl` value from the settings flags and the enabled state.
 *
 * @param flags - Settings flags.
 * @param enabled - Whether the notification is enabled.
 */
export function encodeFlags(flags: number, enabled: boolean): number {
  const withoutDisabled = flags & ~NOTIFICATION_FLAGS.DISABLED;
  return enabled ? withoutDisabled : withoutDisabled | NOTIFICATION_FLAGS.DISABLED;
}

/**
 * Encodes the shared parameter payload. Absent times are written as 0.
 *
 * @param notification - The notification to encode.
 */
export function encodeNotificationParams(notification: EncodableNotification): NotificationParams {
  const { settings } = notification;
  return {
    n: settings.name,
    txt: notification.text,
    ta: settings.activationTime ?? 0,
    td: settings.deactivationTime ?? 0,
    ma: settings.maxAlarms,
    mmtd: settings.maxMessageInterval,
    cdt: settings.alarmTimeout,
    mast: settings.minAlarmDuration,
    mpst: settings.minPreviousDuration,
    cp: settings.controlPeriod,
    fl: encodeFlags(settings.flags, notification.enabled),
    la: settings.language,
    tz: settings.timezone,
    un: [...notification.units],
    trg: encodeTrigger(notification.trigger),
    act: notification.actions.map((action) => ({ t: action.t, p: { url: action.p.url, get: action.p.get } })),
    sch: encodeSchedule(settings.schedule),
    ctrl_sch: encodeSchedule(settings.controlSchedule),
  };
}

function mutation(
  callMode: NotificationMutationRequest['callMode'],
  id: number,
  notification: EncodableNotification
): NotificationMutationRequest {
  return {
    itemId: notification.resourceId,
    id,
    callMode,
    ...encodeNotificationParams(notification),
  };
}

/**
 * Builds a create request. The id is the sentinel 0; the platform assigns
 * the real id in its response.
 *
 * @param notification - The notification to create.
 */
export function buildCreateRequest(notification: EncodableNotification): NotificationMutationRequest {
  return mutation('create', 0, notification);
}

/**
 * Builds an update request.
 *
 * @param remoteId - Id assigned by the platform at creation.
 * @param notification - The notification's new state.
 */
export function buildUpdateRequest(
  remoteId: number,
  notification: EncodableNotification
): NotificationMutationRequest {
  return mutation('update', remoteId, notification);
}

/**
 * Builds a delete request.
 *
 * @param remoteId - Id assigned by the platform at creation.
 * @param notification - The notification to delete.
 */
export function buildDeleteRequest(
  remoteId: number,
  notification: EncodableNotification
): NotificationMutationRequest {
  return mutation('delete', remoteId, notification);
}

/**
 * Builds an enable or disable request.
 *
 * @param resourceId - Resource holding the notification.
 * @param remoteId - Id assigned by the platform at creation.
 * @param enabled - Target state.
 */
export function buildEnableRequest(
  resourceId: number,
  remoteId: number,
  enabled: boolean
): NotificationEnableRequest {
  return { itemId: resourceId, id: remoteId, callMode: 'enable', e: enabled ? 1 : 0 };
}
