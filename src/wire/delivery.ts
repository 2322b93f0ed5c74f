/**
 * Delivery rendering: the push-message action and the URL-encoded text the
 * remote platform sends to the callback when a notification fires.
 *
 * @packageDocumentation
 */

/**
 * How the alert reaches the customer.
 */
export type DeliveryMethod = 'sms' | 'voice';

export const DELIVERY_METHODS: readonly DeliveryMethod[] = ['sms', 'voice'];

/**
 * Type guard for delivery methods.
 *
 * @param value - Untrusted input.
 */
export function isDeliveryMethod(value: unknown): value is DeliveryMethod {
  return DELIVERY_METHODS.some((method) => method === value);
}

/**
 * Callback endpoints of the delivery service.
 */
export interface DeliveryEndpoints {
  /** Base URL of the callback service, e.g. `https://alerts.example.com/notify`. */
  readonly callbackBaseUrl: string;
  readonly smsPath: string;
  readonly voicePath: string;
}

/**
 * A push-message action in wire form.
 */
export interface WireAction {
  readonly t: 'push_messages';
  readonly p: {
    readonly url: string;
    /** 0: the platform POSTs the text; 1: it appends it as a query string. */
    readonly get: 0 | 1;
  };
}

/** Macro the platform replaces with the unit id. */
export const UNIT_ID_MACRO = '%UNIT_ID%';

/** Macro the platform replaces with the message time as a UNIX timestamp. */
export const MESSAGE_TIME_MACRO = '%MSG_TIME_INT%';

const MACRO_PATTERN = /(%[A-Z][A-Z0-9_]*%)/;

/**
 * Builds the callback URL for a delivery method.
 *
 * @param method - Delivery method.
 * @param endpoints - Callback endpoints.
 */
export function callbackUrl(method: DeliveryMethod, endpoints: DeliveryEndpoints): string {
  const base = endpoints.callbackBaseUrl.replace(/\/+$/, '');
  const path = method === 'sms' ? endpoints.smsPath : endpoints.voicePath;
  return `${base}/${path.replace(/^\/+/, '')}`;
}

/**
 * Renders the action list for a delivery method.
 *
 * @param method - Delivery method.
 * @param endpoints - Callback endpoints.
 */
export function renderActions(method: DeliveryMethod, endpoints: DeliveryEndpoints): WireAction[] {
  return [{ t: 'push_messages', p: { url: callbackUrl(method, endpoints), get: 0 } }];
}

/**
 * URL-encodes a message template while leaving platform macros such as
 * `%UNIT%` intact for substitution.
 *
 * @param template - Operator-written message.
 *
 * @example
 * ```typescript
 * encodeMessageTemplate('At %MSG_TIME%, %UNIT% stopped'); // 'At%20%MSG_TIME%%2C%20%UNIT%%20stopped'
 * ```
 */
export function encodeMessageTemplate(template: string): string {
  return template
    .split(MACRO_PATTERN)
    .map((part) => (MACRO_PATTERN.test(part) ? part : encodeURIComponent(part)))
    .join('');
}

/**
 * Renders the delivery text: URL-encoded key/value pairs carrying the unit,
 * user, message time and the message itself.
 *
 * @param userId - Customer's user id on the callback service.
 * @param template - Operator-written message.
 */
export function renderText(userId: number, template: string): string {
  return [
    `unit_id=${UNIT_ID_MACRO}`,
    `user_id=${String(userId)}`,
    `msg_time_int=${MESSAGE_TIME_MACRO}`,
    `message=${encodeMessageTemplate(template)}`,
  ].join('&');
}
