/**
 * Notification repository stored in a single JSON file.
 *
 * Every mutation rewrites the file through a temporary file and a rename, so
 * a crash mid-write leaves the previous contents intact. Records are checked
 * against a JSON schema on load and their triggers re-validated.
 *
 * @packageDocumentation
 */

import AjvModule, { type SchemaObject, type ValidateFunction } from 'ajv';
import { RepositoryError, errorMessage, toError } from '../errors.js';
import type { Notification } from '../notifications/types.js';
import { formatSchemaErrors } from '../remote/schemas.js';
import { validateTriggerParameters } from '../triggers/validator.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import { readTextFileIfExists, writeTextFileAtomic } from '../utils/safe-fs.js';
import {
  type NotificationRepository,
  withDeleted,
  withInserted,
  withUpdated,
} from './repository.js';

const Ajv = AjvModule.default;

/** Current file format version. */
export const STORAGE_FORMAT_VERSION = 1;

/**
 * Contents of the repository file.
 */
export interface StoredNotifications {
  readonly version: number;
  readonly notifications: Notification[];
}

const intervalSchema: SchemaObject = {
  type: 'object',
  properties: { from: { type: 'integer' }, to: { type: 'integer' } },
  required: ['from', 'to'],
};

const scheduleSchema: SchemaObject = {
  type: 'object',
  properties: {
    first: intervalSchema,
    second: intervalSchema,
    daysOfMonth: { type: 'integer' },
    months: { type: 'integer' },
    weekdays: { type: 'integer' },
    flags: { type: 'integer' },
  },
  required: ['first', 'second', 'daysOfMonth', 'months', 'weekdays', 'flags'],
};

const nullableInteger: SchemaObject = { type: ['integer', 'null'] };

const notificationSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
    customerId: { type: 'integer' },
    resourceId: { type: 'integer' },
    remoteId: { type: 'integer', minimum: 1 },
    trigger: {
      type: 'object',
      properties: { kind: { type: 'string' }, parameters: { type: 'object' } },
      required: ['kind', 'parameters'],
    },
    units: { type: 'array', items: { type: 'integer' } },
    settings: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        message: { type: 'string' },
        method: { enum: ['sms', 'voice'] },
        activationTime: nullableInteger,
        deactivationTime: nullableInteger,
        maxAlarms: { type: 'integer' },
        maxMessageInterval: { type: 'integer' },
        alarmTimeout: { type: 'integer' },
        minAlarmDuration: { type: 'integer' },
        minPreviousDuration: { type: 'integer' },
        controlPeriod: { type: 'integer' },
        flags: { type: 'integer' },
        language: { type: 'string' },
        timezone: { type: 'integer' },
        schedule: scheduleSchema,
        controlSchedule: scheduleSchema,
      },
      required: [
        'name',
        'message',
        'method',
        'activationTime',
        'deactivationTime',
        'maxAlarms',
        'maxMessageInterval',
        'alarmTimeout',
        'minAlarmDuration',
        'minPreviousDuration',
        'controlPeriod',
        'flags',
        'language',
        'timezone',
        'schedule',
        'controlSchedule',
      ],
    },
    text: { type: 'string' },
    actions: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          t: { const: 'push_messages' },
          p: {
            type: 'object',
            properties: { url: { type: 'string' }, get: { enum: [0, 1] } },
            required: ['url', 'get'],
          },
        },
        required: ['t', 'p'],
      },
    },
    enabled: { type: 'boolean' },
    label: { type: ['string', 'null'] },
    draftId: { type: ['string', 'null'] },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' },
  },
  required: [
    'id',
    'customerId',
    'resourceId',
    'remoteId',
    'trigger',
    'units',
    'settings',
    'text',
    'actions',
    'enabled',
    'label',
    'draftId',
    'createdAt',
    'updatedAt',
  ],
};

const fileSchema: SchemaObject = {
  type: 'object',
  properties: {
    version: { type: 'integer' },
    notifications: { type: 'array', items: notificationSchema },
  },
  required: ['version', 'notifications'],
};

const validateStoredNotifications: ValidateFunction<StoredNotifications> = new Ajv({
  allErrors: true,
  allowUnionTypes: true,
}).compile<StoredNotifications>(fileSchema);

/**
 * Parses and checks the repository file's contents.
 *
 * @param content - Raw file text.
 * @param filePath - Path, for error messages.
 * @throws RepositoryError with code `corruption_error` on any mismatch.
 */
export function parseStoredNotifications(content: string, filePath: string): Notification[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new RepositoryError(
      `Notification file "${filePath}" is not valid JSON: ${errorMessage(error)}`,
      'corruption_error',
      toError(error)
    );
  }

  if (!validateStoredNotifications(data)) {
    throw new RepositoryError(
      `Notification file "${filePath}" has an invalid format: ${formatSchemaErrors(validateStoredNotifications.errors)}`,
      'corruption_error'
    );
  }
  if (data.version !== STORAGE_FORMAT_VERSION) {
    throw new RepositoryError(
      `Notification file "${filePath}" has unsupported version ${String(data.version)}`,
      'corruption_error'
    );
  }

  return data.notifications.map((record) => {
    const result = validateTriggerParameters(record.trigger.kind, record.trigger.parameters);
    if (!result.valid) {
      throw new RepositoryError(
        `Notification '${record.id}' in "${filePath}" has an invalid trigger: ${result.errors.map((e) => e.message).join('; ')}`,
        'corruption_error'
      );
    }
    return { ...record, trigger: result.trigger };
  });
}

/**
 * Repository persisted as one JSON file.
 *
 * @example
 * ```typescript
 * const repository = new JsonFileNotificationRepository('.fleet-notify/notifications.json');
 * const mine = await repository.listByCustomer(7);
 * ```
 */
export class JsonFileNotificationRepository implements NotificationRepository {
  private readonly filePath: string;
  private readonly logger: Logger;
  /** Tail of the mutation chain; each read-modify-write waits for the previous one. */
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * Creates a new JsonFileNotificationRepository.
   *
   * @param filePath - Repository file; created on first write.
   * @param logger - Logger for write failures.
   */
  constructor(filePath: string, logger: Logger = new SilentLogger()) {
    this.filePath = filePath;
    this.logger = logger;
  }

  async get(customerId: number, id: string): Promise<Notification | null> {
    const records = await this.load();
    return records.find((r) => r.id === id && r.customerId === customerId) ?? null;
  }

  async listByCustomer(customerId: number): Promise<readonly Notification[]> {
    const records = await this.load();
    return records.filter((r) => r.customerId === customerId);
  }

  async findByDraftId(customerId: number, draftId: string): Promise<Notification | null> {
    const records = await this.load();
    return records.find((r) => r.draftId === draftId && r.customerId === customerId) ?? null;
  }

  async insert(notification: Notification): Promise<void> {
    await this.mutate((records) => withInserted(records, notification));
  }

  async update(notification: Notification): Promise<void> {
    await this.mutate((records) => withUpdated(records, notification));
  }

  async delete(customerId: number, id: string): Promise<void> {
    await this.mutate((records) => withDeleted(records, customerId, id));
  }

  private mutate(change: (records: Notification[]) => Notification[]): Promise<void> {
    const run = this.queue.then(async () => {
      await this.save(change(await this.load()));
    });
    // A failed mutation is reported to its caller only; later ones still run.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<Notification[]> {
    let content: string | null;
    try {
      content = await readTextFileIfExists(this.filePath);
    } catch (error) {
      throw new RepositoryError(
        `Failed to read notification file "${this.filePath}": ${errorMessage(error)}`,
        'file_error',
        toError(error)
      );
    }
    return content === null ? [] : parseStoredNotifications(content, this.filePath);
  }

  private async save(notifications: Notification[]): Promise<void> {
    const stored: StoredNotifications = { version: STORAGE_FORMAT_VERSION, notifications };
    const json = JSON.stringify(stored, null, 2) + '\n';

    try {
      await writeTextFileAtomic(this.filePath, json, {
        onCleanupError: (tempPath, cleanupError) => {
          this.logger.debug('temp_file_cleanup_skipped', { tempPath, error: errorMessage(cleanupError) });
        },
      });
    } catch (error) {
      this.logger.error('notification_file_write_failed', { filePath: this.filePath, error: errorMessage(error) });
      throw new RepositoryError(
        `Failed to save notification file "${this.filePath}": ${errorMessage(error)}`,
        'file_error',
        toError(error)
      );
    }
  }
}
