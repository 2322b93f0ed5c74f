/**
 * Wires the configured components together.
 *
 * @packageDocumentation
 */

import type { Config } from './config/types.js';
import { RemoteUnitDirectory, type UnitDirectory } from './remote/resources.js';
import { SessionFactory, type CredentialStore } from './remote/session.js';
import { HttpTransport, type RemoteTransport } from './remote/transport.js';
import { JsonFileNotificationRepository } from './storage/json-file.js';
import type { NotificationRepository } from './storage/repository.js';
import { NotificationSynchronizer } from './sync/synchronizer.js';
import { Logger } from './utils/logger.js';
import { ContinuationTokenCodec } from './workflow/token.js';
import { ConfigurationWorkflow } from './workflow/workflow.js';

/**
 * Collaborators that configuration cannot supply. Everything except the
 * credential store has a configuration-driven default.
 */
export interface FleetNotifyDependencies {
  readonly credentials: CredentialStore;
  readonly transport?: RemoteTransport;
  readonly repository?: NotificationRepository;
  readonly directory?: UnitDirectory;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

/**
 * The assembled service.
 */
export interface FleetNotify {
  readonly config: Config;
  readonly logger: Logger;
  readonly sessions: SessionFactory;
  readonly directory: UnitDirectory;
  readonly repository: NotificationRepository;
  readonly synchronizer: NotificationSynchronizer;
  readonly workflow: ConfigurationWorkflow;
}

/**
 * Builds the synchronizer and workflow from a validated configuration.
 *
 * @param config - Configuration, typically from `loadConfig`.
 * @param deps - Credential store and optional replacements.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('fleet-notify.toml');
 * const app = createFleetNotify(config, { credentials });
 * const view = await app.workflow.start(7);
 * ```
 */
export function createFleetNotify(config: Config, deps: FleetNotifyDependencies): FleetNotify {
  const logger = deps.logger ?? new Logger({ component: 'fleet-notify', debugMode: config.logging.debug });

  const transport =
    deps.transport ??
    new HttpTransport({
      baseUrl: config.remote.base_url,
      timeoutMs: config.remote.timeout_ms,
      logger: logger.child('transport'),
    });
  const sessions = new SessionFactory(transport, deps.credentials, logger.child('session'));
  const repository =
    deps.repository ?? new JsonFileNotificationRepository(config.storage.path, logger.child('repository'));
  const directory = deps.directory ?? new RemoteUnitDirectory(sessions);

  const synchronizer = new NotificationSynchronizer({
    sessions,
    repository,
    endpoints: {
      callbackBaseUrl: config.delivery.callback_base_url,
      smsPath: config.delivery.sms_path,
      voicePath: config.delivery.voice_path,
    },
    resourceName: config.remote.resource_name,
    logger: logger.child('synchronizer'),
    clock: deps.clock,
  });

  const workflow = new ConfigurationWorkflow({
    directory,
    synchronizer,
    tokens: new ContinuationTokenCodec({
      secret: config.workflow.token_secret,
      ttlSeconds: config.workflow.token_ttl_seconds,
      clock: deps.clock,
    }),
    defaults: { language: config.defaults.language, timezone: config.defaults.timezone },
    logger: logger.child('workflow'),
  });

  return { config, logger, sessions, directory, repository, synchronizer, workflow };
}
