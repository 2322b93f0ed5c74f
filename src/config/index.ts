/**
 * Configuration module for fleet-notify.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { readTextFile } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

export { ConfigParseError, getDefaultConfig, mergeConfigSections, parseConfig } from './parser.js';
export { CONFIG_SECTIONS } from './types.js';
export type {
  Config,
  ConfigSection,
  DefaultsConfig,
  DeliveryConfig,
  LoggingConfig,
  PartialConfig,
  RawConfigSections,
  RemoteConfig,
  StorageConfig,
  WorkflowConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_DEFAULTS,
  DEFAULT_DELIVERY,
  DEFAULT_LOGGING,
  DEFAULT_REMOTE,
  DEFAULT_STORAGE,
  DEFAULT_WORKFLOW,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ConfigValidationIssue, ConfigValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvOverrides, EnvRecord, EnvValue } from './env.js';

/**
 * Reads a configuration file, applies environment overrides and validates
 * the result. A missing file is an error; pass `undefined` to use defaults
 * and the environment only.
 *
 * @param filePath - Path of the TOML file, or undefined.
 * @param env - Environment to read overrides from (defaults to process.env).
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function loadConfig(filePath: string | undefined, env: EnvRecord = process.env): Promise<Config> {
  const content = filePath === undefined ? '' : await readTextFile(filePath);
  const config = applyEnvOverrides(parseConfig(content), env);
  assertConfigValid(config);
  return config;
}
