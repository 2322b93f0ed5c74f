/**
 * JSON schemas for remote platform responses, compiled once with ajv.
 *
 * @packageDocumentation
 */

import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { RemoteApiError } from '../errors.js';

const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

/** Response of `token/login`. */
export interface LoginResponse {
  readonly eid: string;
  readonly user: { readonly id: number; readonly nm?: string };
}

/** Response of `resource/update_notification`: the id and the stored object (null on delete). */
export type MutationResponse = [number, Record<string, unknown> | null];

/** An item returned by `core/search_items` or `core/create_resource`. */
export interface RemoteItem {
  readonly id: number;
  readonly nm: string;
}

/** Response of `core/search_items`. */
export interface SearchItemsResponse {
  readonly items: RemoteItem[];
  readonly totalItemsCount: number;
}

/** Response of `core/create_resource`. */
export interface CreateItemResponse {
  readonly item: RemoteItem;
}

/** Response of `resource/get_notification_data`. */
export type NotificationDataResponse = Record<string, unknown>[];

const itemSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    nm: { type: 'string' },
  },
  required: ['id', 'nm'],
};

const loginSchema: SchemaObject = {
  type: 'object',
  properties: {
    eid: { type: 'string', minLength: 1 },
    user: {
      type: 'object',
      properties: {
        id: { type: 'integer' },
        nm: { type: 'string' },
      },
      required: ['id'],
    },
  },
  required: ['eid', 'user'],
};

const mutationSchema: SchemaObject = {
  type: 'array',
  items: [
    { type: 'integer' },
    { type: ['object', 'null'] },
  ],
  minItems: 2,
  maxItems: 2,
};

const searchItemsSchema: SchemaObject = {
  type: 'object',
  properties: {
    items: { type: 'array', items: itemSchema },
    totalItemsCount: { type: 'integer' },
  },
  required: ['items', 'totalItemsCount'],
};

const createItemSchema: SchemaObject = {
  type: 'object',
  properties: {
    item: itemSchema,
  },
  required: ['item'],
};

const notificationDataSchema: SchemaObject = {
  type: 'array',
  items: { type: 'object' },
};

export const validateLoginResponse: ValidateFunction<LoginResponse> =
  ajv.compile<LoginResponse>(loginSchema);
export const validateMutationResponse: ValidateFunction<MutationResponse> =
  ajv.compile<MutationResponse>(mutationSchema);
export const validateSearchItemsResponse: ValidateFunction<SearchItemsResponse> =
  ajv.compile<SearchItemsResponse>(searchItemsSchema);
export const validateCreateItemResponse: ValidateFunction<CreateItemResponse> =
  ajv.compile<CreateItemResponse>(createItemSchema);
export const validateNotificationDataResponse: ValidateFunction<NotificationDataResponse> =
  ajv.compile<NotificationDataResponse>(notificationDataSchema);

/**
 * Formats ajv errors as `path: message` lines.
 *
 * @param errors - Errors from a failed validation.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath === '' ? '/' : e.instancePath}: ${e.message ?? 'invalid'}`)
    .join('; ');
}

/**
 * Checks a response against a compiled schema.
 *
 * @param svc - The service that produced the response.
 * @param body - The decoded response body.
 * @param validate - Compiled validator.
 * @returns The body, typed.
 * @throws RemoteApiError with code `malformed_response` on mismatch.
 */
export function expectShape<T>(svc: string, body: unknown, validate: ValidateFunction<T>): T {
  if (validate(body)) {
    return body;
  }
  throw new RemoteApiError(
    `Unexpected response from '${svc}': ${formatSchemaErrors(validate.errors)}`,
    'malformed_response',
    svc
  );
}
