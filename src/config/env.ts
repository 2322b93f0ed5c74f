/**
 * Environment variable overrides for configuration.
 *
 * FLEET_NOTIFY_<SECTION>_<FIELD> overrides `<section>.<field>`. Environment
 * variables take precedence over config file values, which take precedence
 * over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { mergeConfigSections } from './parser.js';
import type { Config, ConfigSection } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/** Coerced environment value. */
export type EnvValue = string | number | boolean;

/**
 * Overrides read from the environment, by section and field.
 */
export type EnvOverrides = Partial<Record<ConfigSection, Record<string, EnvValue>>>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

interface EnvMapping {
  readonly section: ConfigSection;
  readonly field: string;
  readonly type: 'string' | 'number' | 'boolean';
  readonly description: string;
}

/**
 * Mapping from environment variable names to config paths.
 *
 * Shortcuts come first so that the full form wins when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Shortcuts
  FLEET_NOTIFY_SECRET: {
    section: 'workflow',
    field: 'token_secret',
    type: 'string',
    description: 'Continuation token secret (shortcut for FLEET_NOTIFY_WORKFLOW_TOKEN_SECRET)',
  },
  FLEET_NOTIFY_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug logging (shortcut for FLEET_NOTIFY_LOGGING_DEBUG)',
  },

  FLEET_NOTIFY_REMOTE_BASE_URL: {
    section: 'remote',
    field: 'base_url',
    type: 'string',
    description: 'Remote platform base URL',
  },
  FLEET_NOTIFY_REMOTE_TIMEOUT_MS: {
    section: 'remote',
    field: 'timeout_ms',
    type: 'number',
    description: 'Remote call timeout in milliseconds',
  },
  FLEET_NOTIFY_REMOTE_RESOURCE_NAME: {
    section: 'remote',
    field: 'resource_name',
    type: 'string',
    description: 'Name of the resource holding created notifications',
  },
  FLEET_NOTIFY_DELIVERY_CALLBACK_BASE_URL: {
    section: 'delivery',
    field: 'callback_base_url',
    type: 'string',
    description: 'Base URL of the delivery callback service',
  },
  FLEET_NOTIFY_DELIVERY_SMS_PATH: {
    section: 'delivery',
    field: 'sms_path',
    type: 'string',
    description: 'Callback path for SMS delivery',
  },
  FLEET_NOTIFY_DELIVERY_VOICE_PATH: {
    section: 'delivery',
    field: 'voice_path',
    type: 'string',
    description: 'Callback path for voice delivery',
  },
  FLEET_NOTIFY_WORKFLOW_TOKEN_SECRET: {
    section: 'workflow',
    field: 'token_secret',
    type: 'string',
    description: 'Continuation token secret',
  },
  FLEET_NOTIFY_WORKFLOW_TOKEN_TTL_SECONDS: {
    section: 'workflow',
    field: 'token_ttl_seconds',
    type: 'number',
    description: 'Continuation token lifetime in seconds',
  },
  FLEET_NOTIFY_DEFAULTS_LANGUAGE: {
    section: 'defaults',
    field: 'language',
    type: 'string',
    description: 'Default notification language',
  },
  FLEET_NOTIFY_DEFAULTS_TIMEZONE: {
    section: 'defaults',
    field: 'timezone',
    type: 'number',
    description: 'Default timezone offset in seconds',
  },
  FLEET_NOTIFY_STORAGE_PATH: {
    section: 'storage',
    field: 'path',
    type: 'string',
    description: 'Path of the notification file',
  },
  FLEET_NOTIFY_LOGGING_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug logging (true/false)',
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(value: string, type: EnvMapping['type'], envVar: string): EnvValue {
  switch (type) {
    case 'string':
      return value;
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Values from environment variables, by section and field. */
  overrides: EnvOverrides;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads FLEET_NOTIFY_* environment variables and returns configuration
 * overrides. Unset and empty variables are skipped.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ FLEET_NOTIFY_REMOTE_TIMEOUT_MS: '5000' });
 * console.log(result.overrides.remote); // { timeout_ms: 5000 }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: EnvOverrides = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      const coerced = coerceValue(value, mapping.type, envVar);
      const section = overrides[mapping.section] ?? {};
      section[mapping.field] = coerced;
      overrides[mapping.section] = section;
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfigSections(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
