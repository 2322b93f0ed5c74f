/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser's type checks cannot:
 * - URLs are absolute http(s) URLs
 * - Timeouts and lifetimes are positive integers
 * - The token secret is long enough to sign with
 * - Callback paths are absolute
 *
 * @packageDocumentation
 */

import { MIN_SECRET_LENGTH } from '../workflow/token.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ConfigValidationIssue[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ConfigValidationIssue[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation failure.
 */
export interface ConfigValidationIssue {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ConfigValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ConfigValidationIssue[];
}

function validateHttpUrl(value: string, fieldPath: string, errors: ConfigValidationIssue[]): void {
  let protocol: string | undefined;
  try {
    protocol = new URL(value).protocol;
  } catch {
    protocol = undefined;
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be an http or https URL, got '${value}'`,
    });
  }
}

function validatePositiveInteger(value: number, fieldPath: string, errors: ConfigValidationIssue[]): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateNonEmpty(value: string, fieldPath: string, errors: ConfigValidationIssue[]): void {
  if (value.trim() === '') {
    errors.push({ field: fieldPath, value, message: `'${fieldPath}' must not be empty` });
  }
}

function validateCallbackPath(value: string, fieldPath: string, errors: ConfigValidationIssue[]): void {
  if (!value.startsWith('/')) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must start with '/', got '${value}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ConfigValidationResult {
  const errors: ConfigValidationIssue[] = [];

  validateHttpUrl(config.remote.base_url, 'remote.base_url', errors);
  validatePositiveInteger(config.remote.timeout_ms, 'remote.timeout_ms', errors);
  validateNonEmpty(config.remote.resource_name, 'remote.resource_name', errors);

  validateHttpUrl(config.delivery.callback_base_url, 'delivery.callback_base_url', errors);
  validateCallbackPath(config.delivery.sms_path, 'delivery.sms_path', errors);
  validateCallbackPath(config.delivery.voice_path, 'delivery.voice_path', errors);

  if (config.workflow.token_secret.length < MIN_SECRET_LENGTH) {
    errors.push({
      field: 'workflow.token_secret',
      value: '[redacted]',
      message: `'workflow.token_secret' must be at least ${String(MIN_SECRET_LENGTH)} characters`,
    });
  }
  validatePositiveInteger(config.workflow.token_ttl_seconds, 'workflow.token_ttl_seconds', errors);

  if (!/^[a-z]{2}$/.test(config.defaults.language)) {
    errors.push({
      field: 'defaults.language',
      value: config.defaults.language,
      message: `'defaults.language' must be a two-letter code, got '${config.defaults.language}'`,
    });
  }
  if (!Number.isInteger(config.defaults.timezone)) {
    errors.push({
      field: 'defaults.timezone',
      value: config.defaults.timezone,
      message: `'defaults.timezone' must be a whole number of seconds, got ${String(config.defaults.timezone)}`,
    });
  }

  validateNonEmpty(config.storage.path, 'storage.path', errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
