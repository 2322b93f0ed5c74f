/**
 * fleet-notify
 *
 * Configures telemetry notification triggers on a remote fleet platform:
 * a typed trigger registry, the remote wire codec, a synchronizer that
 * keeps local records and remote notifications in step, and a four-step
 * configuration workflow carried in signed continuation tokens.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './errors.js';
export * from './triggers/index.js';
export * from './wire/index.js';
export * from './remote/index.js';
export * from './notifications/index.js';
export * from './storage/index.js';
export * from './sync/index.js';
export * from './workflow/index.js';
export * from './config/index.js';
export { createFleetNotify, type FleetNotify, type FleetNotifyDependencies } from './app.js';
export { Logger, SilentLogger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
export {
  PathValidationError,
  readTextFile,
  readTextFileIfExists,
  validatePath,
  writeTextFileAtomic,
  type AtomicWriteOptions,
} from './utils/safe-fs.js';
