/**
 * Signed continuation tokens.
 *
 * A token is `<payload>.<signature>`: the base64url JSON envelope
 * `{ v, iat, exp, draft }` and the base64url HMAC-SHA256 of the payload
 * part. Steps need nothing but the token to reconstruct the draft.
 *
 * @packageDocumentation
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import AjvModule, { type SchemaObject, type ValidateFunction } from 'ajv';
import { WorkflowError } from '../errors.js';
import { formatSchemaErrors } from '../remote/schemas.js';
import { TRIGGER_KINDS } from '../triggers/types.js';
import { validateTriggerParameters } from '../triggers/validator.js';
import type { NotificationDraft } from './types.js';

const Ajv = AjvModule.default;

/** Envelope format version. */
export const TOKEN_VERSION = 1;

/** Shortest accepted signing secret. */
export const MIN_SECRET_LENGTH = 16;

/**
 * Decoded token payload.
 */
export interface TokenEnvelope {
  readonly v: number;
  /** Issue time, UNIX seconds. */
  readonly iat: number;
  /** Expiry time, UNIX seconds. */
  readonly exp: number;
  readonly draft: NotificationDraft;
}

const positiveId: SchemaObject = { type: 'integer', minimum: 1 };
const unitList: SchemaObject = { type: 'array', items: positiveId, minItems: 1 };

function draftSchema(step: string, properties: Record<string, SchemaObject>): SchemaObject {
  return {
    type: 'object',
    properties: { step: { const: step }, customerId: { type: 'integer' }, ...properties },
    required: ['step', 'customerId', ...Object.keys(properties)],
    additionalProperties: false,
  };
}

const envelopeSchema: SchemaObject = {
  type: 'object',
  properties: {
    v: { type: 'integer' },
    iat: { type: 'integer' },
    exp: { type: 'integer' },
    draft: {
      oneOf: [
        draftSchema('SelectUnits', {}),
        draftSchema('SelectTriggerKind', { resourceId: positiveId, units: unitList }),
        draftSchema('ConfigureParameters', {
          resourceId: positiveId,
          units: unitList,
          kind: { enum: [...TRIGGER_KINDS] },
        }),
        draftSchema('ReviewAndCommit', {
          resourceId: positiveId,
          units: unitList,
          draftId: { type: 'string', minLength: 1, maxLength: 64 },
          trigger: {
            type: 'object',
            properties: { kind: { enum: [...TRIGGER_KINDS] }, parameters: { type: 'object' } },
            required: ['kind', 'parameters'],
            additionalProperties: false,
          },
        }),
      ],
    },
  },
  required: ['v', 'iat', 'exp', 'draft'],
  additionalProperties: false,
};

const validateEnvelope: ValidateFunction<TokenEnvelope> = new Ajv({ allErrors: true }).compile<TokenEnvelope>(
  envelopeSchema
);

/**
 * Options for {@link ContinuationTokenCodec}.
 */
export interface ContinuationTokenOptions {
  /** HMAC key, at least {@link MIN_SECRET_LENGTH} characters. */
  readonly secret: string;
  /** Token lifetime in seconds. */
  readonly ttlSeconds: number;
  readonly clock?: () => Date;
}

/**
 * Issues and verifies continuation tokens.
 *
 * @example
 * ```typescript
 * const codec = new ContinuationTokenCodec({ secret: config.workflow.token_secret, ttlSeconds: 1800 });
 * const token = codec.issue({ step: 'SelectUnits', customerId: 7 });
 * const draft = codec.verify(token, 7);
 * ```
 */
export class ContinuationTokenCodec {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly clock: () => Date;

  /**
   * Creates a new ContinuationTokenCodec.
   *
   * @param options - Secret, lifetime and time source.
   * @throws RangeError if the secret is too short or the lifetime is not positive.
   */
  constructor(options: ContinuationTokenOptions) {
    if (options.secret.length < MIN_SECRET_LENGTH) {
      throw new RangeError(`Token secret must be at least ${String(MIN_SECRET_LENGTH)} characters`);
    }
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new RangeError('Token lifetime must be a positive whole number of seconds');
    }
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Signs a draft.
   *
   * @param draft - Selections so far.
   */
  issue(draft: NotificationDraft): string {
    const iat = Math.floor(this.clock().getTime() / 1000);
    const envelope: TokenEnvelope = { v: TOKEN_VERSION, iat, exp: iat + this.ttlSeconds, draft };
    const payload = Buffer.from(JSON.stringify(envelope), 'utf8').toString('base64url');
    return `${payload}.${this.sign(payload)}`;
  }

  /**
   * Verifies a token and returns its draft.
   *
   * @param token - Token from a previous step.
   * @param customerId - The customer continuing the workflow.
   * @throws WorkflowError if the token is malformed, tampered with, expired,
   * of an unknown version, or issued to another customer.
   */
  verify(token: string, customerId: number): NotificationDraft {
    const [payload, signature, ...rest] = token.split('.');
    if (payload === undefined || signature === undefined || payload === '' || rest.length > 0) {
      throw new WorkflowError('Continuation token is malformed', 'malformed_token');
    }

    const expected = Buffer.from(this.sign(payload), 'utf8');
    const actual = Buffer.from(signature, 'utf8');
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      throw new WorkflowError('Continuation token signature is invalid', 'bad_signature');
    }

    const envelope = this.decode(payload);
    if (envelope.v !== TOKEN_VERSION) {
      throw new WorkflowError(`Continuation token version ${String(envelope.v)} is not supported`, 'unsupported_version');
    }
    if (envelope.exp <= Math.floor(this.clock().getTime() / 1000)) {
      throw new WorkflowError('Continuation token has expired', 'expired_token');
    }
    if (envelope.draft.customerId !== customerId) {
      throw new WorkflowError('Continuation token was issued to another customer', 'wrong_customer');
    }

    const { draft } = envelope;
    if (draft.step !== 'ReviewAndCommit') {
      return draft;
    }
    const result = validateTriggerParameters(draft.trigger.kind, draft.trigger.parameters);
    if (!result.valid) {
      throw new WorkflowError('Continuation token carries invalid trigger parameters', 'malformed_token');
    }
    return { ...draft, trigger: result.trigger };
  }

  private sign(payload: string): string {
    return createHmac('sha256', this.secret).update(payload).digest('base64url');
  }

  private decode(payload: string): TokenEnvelope {
    let data: unknown;
    try {
      data = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch (error) {
      throw new WorkflowError(
        `Continuation token payload is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        'malformed_token'
      );
    }
    if (!validateEnvelope(data)) {
      throw new WorkflowError(
        `Continuation token payload is invalid: ${formatSchemaErrors(validateEnvelope.errors)}`,
        'malformed_token'
      );
    }
    return data;
  }
}
