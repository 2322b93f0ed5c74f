/**
 * Default configuration values for fleet-notify.toml.
 *
 * @packageDocumentation
 */

import type {
  Config,
  DefaultsConfig,
  DeliveryConfig,
  LoggingConfig,
  RemoteConfig,
  StorageConfig,
  WorkflowConfig,
} from './types.js';

export const DEFAULT_REMOTE: RemoteConfig = {
  base_url: 'https://hst-api.wialon.com',
  timeout_ms: 15000,
  resource_name: 'Fleet Notify Alerts',
};

/**
 * Default delivery endpoints. The callback base URL has no usable default
 * and must be configured.
 */
export const DEFAULT_DELIVERY: DeliveryConfig = {
  callback_base_url: '',
  sms_path: '/sms',
  voice_path: '/voice',
};

/**
 * Default workflow settings. The token secret must be configured.
 */
export const DEFAULT_WORKFLOW: WorkflowConfig = {
  token_secret: '',
  token_ttl_seconds: 1800,
};

export const DEFAULT_DEFAULTS: DefaultsConfig = {
  language: 'en',
  timezone: 0,
};

export const DEFAULT_STORAGE: StorageConfig = {
  path: '.fleet-notify/notifications.json',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  remote: DEFAULT_REMOTE,
  delivery: DEFAULT_DELIVERY,
  workflow: DEFAULT_WORKFLOW,
  defaults: DEFAULT_DEFAULTS,
  storage: DEFAULT_STORAGE,
  logging: DEFAULT_LOGGING,
};
