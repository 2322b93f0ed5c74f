/**
 * Configuration types for fleet-notify.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Remote platform connection.
 */
export interface RemoteConfig {
  /** Platform base URL; calls go to `<base_url>/wialon/ajax.html`. */
  base_url: string;
  /** Per-call timeout in milliseconds. */
  timeout_ms: number;
  /** Name of the resource that holds notifications created by this service. */
  resource_name: string;
}

/**
 * Callback endpoints that receive notification deliveries.
 */
export interface DeliveryConfig {
  callback_base_url: string;
  sms_path: string;
  voice_path: string;
}

/**
 * Continuation token settings.
 */
export interface WorkflowConfig {
  /** HMAC key for continuation tokens. */
  token_secret: string;
  token_ttl_seconds: number;
}

/**
 * Defaults applied when the review step omits them.
 */
export interface DefaultsConfig {
  /** Two-letter language code. */
  language: string;
  /** Timezone offset in seconds. */
  timezone: number;
}

/**
 * Local notification storage.
 */
export interface StorageConfig {
  /** Path of the JSON notification file. */
  path: string;
}

export interface LoggingConfig {
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  remote: RemoteConfig;
  delivery: DeliveryConfig;
  workflow: WorkflowConfig;
  defaults: DefaultsConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}

/** Name of a configuration section. */
export type ConfigSection = keyof Config;

/** All section names, in file order. */
export const CONFIG_SECTIONS: readonly ConfigSection[] = [
  'remote',
  'delivery',
  'workflow',
  'defaults',
  'storage',
  'logging',
];

/**
 * Partial configuration, as read from overrides.
 */
export type PartialConfig = { [S in ConfigSection]?: Partial<Config[S]> };

/**
 * Untyped section tables, as read from a TOML file or the environment.
 */
export type RawConfigSections = Partial<Record<ConfigSection, Readonly<Record<string, unknown>>>>;
