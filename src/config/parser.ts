/**
 * TOML configuration parser for fleet-notify.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  CONFIG_SECTIONS,
  type Config,
  type DefaultsConfig,
  type DeliveryConfig,
  type LoggingConfig,
  type RawConfigSections,
  type RemoteConfig,
  type StorageConfig,
  type WorkflowConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Readonly<Record<string, unknown>>;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function parseRemote(raw: Table | undefined, base: RemoteConfig): RemoteConfig {
  const result: RemoteConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('base_url' in raw) {
    result.base_url = validateString(raw['base_url'], 'remote.base_url');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw['timeout_ms'], 'remote.timeout_ms');
  }
  if ('resource_name' in raw) {
    result.resource_name = validateString(raw['resource_name'], 'remote.resource_name');
  }

  return result;
}

function parseDelivery(raw: Table | undefined, base: DeliveryConfig): DeliveryConfig {
  const result: DeliveryConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('callback_base_url' in raw) {
    result.callback_base_url = validateString(raw['callback_base_url'], 'delivery.callback_base_url');
  }
  if ('sms_path' in raw) {
    result.sms_path = validateString(raw['sms_path'], 'delivery.sms_path');
  }
  if ('voice_path' in raw) {
    result.voice_path = validateString(raw['voice_path'], 'delivery.voice_path');
  }

  return result;
}

function parseWorkflow(raw: Table | undefined, base: WorkflowConfig): WorkflowConfig {
  const result: WorkflowConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('token_secret' in raw) {
    result.token_secret = validateString(raw['token_secret'], 'workflow.token_secret');
  }
  if ('token_ttl_seconds' in raw) {
    result.token_ttl_seconds = validateNumber(raw['token_ttl_seconds'], 'workflow.token_ttl_seconds');
  }

  return result;
}

function parseDefaults(raw: Table | undefined, base: DefaultsConfig): DefaultsConfig {
  const result: DefaultsConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('language' in raw) {
    result.language = validateString(raw['language'], 'defaults.language');
  }
  if ('timezone' in raw) {
    result.timezone = validateNumber(raw['timezone'], 'defaults.timezone');
  }

  return result;
}

function parseStorage(raw: Table | undefined, base: StorageConfig): StorageConfig {
  const result: StorageConfig = { ...base };
  if (raw !== undefined && 'path' in raw) {
    result.path = validateString(raw['path'], 'storage.path');
  }
  return result;
}

function parseLogging(raw: Table | undefined, base: LoggingConfig): LoggingConfig {
  const result: LoggingConfig = { ...base };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw['debug'], 'logging.debug');
  }
  return result;
}

/**
 * Merges untyped section tables over a configuration, checking the type of
 * every field present.
 *
 * @param base - Configuration to merge over.
 * @param raw - Section tables from a file or the environment.
 * @returns A new configuration.
 * @throws ConfigParseError if a field has the wrong type.
 */
export function mergeConfigSections(base: Config, raw: RawConfigSections): Config {
  return {
    remote: parseRemote(raw.remote, base.remote),
    delivery: parseDelivery(raw.delivery, base.delivery),
    workflow: parseWorkflow(raw.workflow, base.workflow),
    defaults: parseDefaults(raw.defaults, base.defaults),
    storage: parseStorage(raw.storage, base.storage),
    logging: parseLogging(raw.logging, base.logging),
  };
}

/**
 * Parses a TOML string into a typed Config object.
 *
 * Unknown sections and fields are ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const config = parseConfig(`
 * [remote]
 * timeout_ms = 5000
 * `);
 * console.log(config.remote.timeout_ms); // 5000
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  const sections: RawConfigSections = {};
  for (const section of CONFIG_SECTIONS) {
    const table = parsed[section];
    if (table === undefined) {
      continue;
    }
    if (!isTable(table)) {
      throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof table}`);
    }
    sections[section] = table;
  }

  return mergeConfigSections(DEFAULT_CONFIG, sections);
}

/**
 * Returns a copy of the default configuration.
 *
 * @example
 * ```typescript
 * const config = getDefaultConfig();
 * console.log(config.remote.base_url); // "https://hst-api.wialon.com"
 * ```
 */
export function getDefaultConfig(): Config {
  return mergeConfigSections(DEFAULT_CONFIG, {});
}
