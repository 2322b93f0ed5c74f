/**
 * Error taxonomy shared by the trigger validators, the wire encoder, the
 * synchronizer and the configuration workflow.
 *
 * Validation errors are recoverable and stay inside the workflow boundary.
 * Remote and credential errors surface to the operator unchanged and are never
 * retried.
 *
 * @packageDocumentation
 */

/**
 * Machine-readable reason for a field-level validation failure.
 */
export type ValidationErrorCode =
  | 'required'
  | 'invalid'
  | 'out_of_range'
  | 'invalid_choice'
  | 'bound_order';

/**
 * A field-level validation failure.
 *
 * Produced by the parameter validators and the notification settings check.
 * Carried in result objects rather than thrown, so that every failing field
 * of one submission is reported together.
 */
export class ValidationError extends Error {
  /** Name of the field the error is attached to. */
  public readonly field: string;
  /** Machine-readable failure reason. */
  public readonly code: ValidationErrorCode;

  /**
   * Creates a new ValidationError.
   *
   * @param field - Field the error is attached to.
   * @param code - Failure reason.
   * @param message - Human-readable message shown next to the field.
   */
  constructor(field: string, code: ValidationErrorCode, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
    this.code = code;
  }
}

/**
 * Cross-field failure for a lower/upper pair that is out of order.
 *
 * Attached to each field of the pair, with `otherField` naming its partner.
 */
export class BoundOrderError extends ValidationError {
  /** The other field of the pair. */
  public readonly otherField: string;

  /**
   * Creates a new BoundOrderError.
   *
   * @param field - Field the error is attached to.
   * @param otherField - The partner field of the bound pair.
   * @param message - Human-readable message.
   */
  constructor(field: string, otherField: string, message: string) {
    super(field, 'bound_order', message);
    this.name = 'BoundOrderError';
    this.otherField = otherField;
  }
}

/**
 * Thrown when a trigger kind or wire code lies outside the closed set.
 */
export class UnknownTriggerKindError extends Error {
  /** The rejected value, as received. */
  public readonly kind: string;

  /**
   * Creates a new UnknownTriggerKindError.
   *
   * @param kind - The rejected value.
   */
  constructor(kind: string) {
    super(`Unknown trigger kind '${kind}'`);
    this.name = 'UnknownTriggerKindError';
    this.kind = kind;
  }
}

/**
 * Failure category of a remote call. Numbers are the platform's own error
 * codes; strings are failures detected on this side of the wire.
 */
export type RemoteErrorCode = number | 'timeout' | 'transport' | 'malformed_response';

/**
 * Any failure of a call to the remote telemetry platform.
 */
export class RemoteApiError extends Error {
  /** Platform error code or local failure category. */
  public readonly code: RemoteErrorCode;
  /** The remote service that was called, e.g. `resource/update_notification`. */
  public readonly svc: string;
  /** Reason text returned by the platform, if any. */
  public readonly reason: string | undefined;
  /** The underlying cause, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new RemoteApiError.
   *
   * @param message - Human-readable message.
   * @param code - Platform error code or local failure category.
   * @param svc - The remote service that was called.
   * @param options - Reason text and underlying cause.
   */
  constructor(
    message: string,
    code: RemoteErrorCode,
    svc: string,
    options: { reason?: string; cause?: Error } = {}
  ) {
    super(message);
    this.name = 'RemoteApiError';
    this.code = code;
    this.svc = svc;
    this.reason = options.reason;
    this.cause = options.cause;
  }
}

/**
 * Thrown before any remote call when no platform token exists for a customer.
 */
export class MissingCredentialError extends Error {
  /** The customer without a usable token. */
  public readonly customerId: number;

  /**
   * Creates a new MissingCredentialError.
   *
   * @param customerId - The customer without a usable token.
   */
  constructor(customerId: number) {
    super(`No remote platform token is available for customer ${String(customerId)}`);
    this.name = 'MissingCredentialError';
    this.customerId = customerId;
  }
}

/**
 * Thrown when a notification does not exist locally or belongs to another customer.
 */
export class NotificationNotFoundError extends Error {
  /** The requested local id. */
  public readonly notificationId: string;

  /**
   * Creates a new NotificationNotFoundError.
   *
   * @param notificationId - The requested local id.
   */
  constructor(notificationId: string) {
    super(`Notification '${notificationId}' does not exist`);
    this.name = 'NotificationNotFoundError';
    this.notificationId = notificationId;
  }
}

/**
 * Thrown when notification settings or a trigger fail validation at a point
 * where no result object can be returned (synchronizer input, wire decoding).
 */
export class InvalidNotificationError extends Error {
  /** Every field-level failure. */
  public readonly errors: readonly ValidationError[];

  /**
   * Creates a new InvalidNotificationError.
   *
   * @param message - Summary message.
   * @param errors - Field-level failures.
   */
  constructor(message: string, errors: readonly ValidationError[]) {
    const details = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    super(details.length > 0 ? `${message}:\n${details}` : message);
    this.name = 'InvalidNotificationError';
    this.errors = errors;
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 *
 * @param error - The thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrows an unknown thrown value to an Error, wrapping anything else.
 *
 * @param error - The thrown value.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Failure categories of {@link RepositoryError}. */
export type RepositoryErrorCode = 'duplicate' | 'not_found' | 'file_error' | 'corruption_error';

/**
 * Failure of the local notification repository.
 */
export class RepositoryError extends Error {
  public readonly code: RepositoryErrorCode;
  public readonly cause: Error | undefined;

  /**
   * Creates a new RepositoryError.
   *
   * @param message - Human-readable message.
   * @param code - Failure category.
   * @param cause - Underlying I/O or parse error.
   */
  constructor(message: string, code: RepositoryErrorCode, cause?: Error) {
    super(message);
    this.name = 'RepositoryError';
    this.code = code;
    this.cause = cause;
  }
}

/** Reasons a continuation token or workflow step is rejected. */
export type WorkflowErrorCode =
  | 'malformed_token'
  | 'bad_signature'
  | 'expired_token'
  | 'unsupported_version'
  | 'wrong_customer'
  | 'out_of_sequence';

/**
 * Thrown when a workflow step receives a token it cannot continue from.
 */
export class WorkflowError extends Error {
  public readonly code: WorkflowErrorCode;

  /**
   * Creates a new WorkflowError.
   *
   * @param message - Human-readable message.
   * @param code - Rejection reason.
   */
  constructor(message: string, code: WorkflowErrorCode) {
    super(message);
    this.name = 'WorkflowError';
    this.code = code;
  }
}
