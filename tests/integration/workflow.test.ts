/**
 * End-to-end tests for notification configuration.
 *
 * Drives the assembled service through the four workflow steps against the
 * in-process platform, with notifications stored in a JSON file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'node:crypto';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createFleetNotify, type FleetNotify } from '../../src/app.js';
import { DEFAULT_CONFIG, type Config } from '../../src/config/index.js';
import { RemoteApiError } from '../../src/errors.js';
import { StaticCredentialStore } from '../../src/remote/session.js';
import { JsonFileNotificationRepository } from '../../src/storage/json-file.js';
import { SilentLogger } from '../../src/utils/logger.js';
import type { WorkflowView } from '../../src/workflow/types.js';
import { FakePlatform } from '../support/fake-platform.js';
import { TEST_SECRET } from '../support/fixtures.js';

type ViewOf<S extends WorkflowView['state']> = Extract<WorkflowView, { state: S }>;

function isState<S extends WorkflowView['state']>(view: WorkflowView, state: S): view is ViewOf<S> {
  return view.state === state;
}

function expectState<S extends WorkflowView['state']>(view: WorkflowView, state: S): ViewOf<S> {
  if (!isState(view, state)) {
    throw new Error(`expected state ${state}, got ${view.state}`);
  }
  return view;
}

const NOW = new Date('2026-03-01T12:00:00.000Z');
const ALWAYS_WIRE = { f1: 0, f2: 0, t1: 0, t2: 0, m: 0, y: 0, w: 0, f: 0 };

describe('Notification configuration end to end', () => {
  let testDir: string;
  let storagePath: string;
  let platform: FakePlatform;
  let app: FleetNotify;

  beforeEach(async () => {
    testDir = join(tmpdir(), `fleet-notify-e2e-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    storagePath = join(testDir, 'data', 'notifications.json');

    platform = new FakePlatform();
    platform.addResource(10, 'Fleet Notify Alerts');
    platform.units.push({ id: 1001, nm: 'Truck 1' }, { id: 1002, nm: 'Truck 2' });

    const config: Config = {
      ...DEFAULT_CONFIG,
      delivery: { ...DEFAULT_CONFIG.delivery, callback_base_url: 'https://alerts.example.com' },
      workflow: { ...DEFAULT_CONFIG.workflow, token_secret: TEST_SECRET },
      storage: { path: storagePath },
    };
    app = createFleetNotify(config, {
      credentials: new StaticCredentialStore([[7, 'test-token']]),
      transport: platform,
      logger: new SilentLogger(),
      clock: () => NOW,
    });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function reachReview(): Promise<ViewOf<'ReviewAndCommit'>> {
    const start = expectState(await app.workflow.start(7), 'SelectUnits');
    const kinds = expectState(
      await app.workflow.selectUnits(7, start.token, { resourceId: 10, units: [1001, 1002] }),
      'SelectTriggerKind'
    );
    const params = expectState(await app.workflow.selectTriggerKind(7, kinds.token, 'sensor-value'), 'ConfigureParameters');
    return expectState(
      await app.workflow.configureParameters(7, params.token, {
        lower_bound: -1.0,
        upper_bound: 1.0,
        sensor_name_mask: '*IGN*',
        type: 0,
      }),
      'ReviewAndCommit'
    );
  }

  async function commitIgnition(): Promise<ViewOf<'Committed'>> {
    const review = await reachReview();
    return expectState(
      await app.workflow.commit(7, review.token, { name: 'Ignition', message: '%UNIT% ignition', method: 'sms' }),
      'Committed'
    );
  }

  it('should send the create request and persist the result', async () => {
    const start = expectState(await app.workflow.start(7), 'SelectUnits');
    expect(start.resources).toEqual([{ id: 10, name: 'Fleet Notify Alerts', kind: 'resource' }]);

    const { notification } = await commitIgnition();

    const creates = platform.callsTo('resource/update_notification');
    expect(creates).toHaveLength(1);
    expect(creates[0]?.params).toEqual({
      itemId: 10,
      id: 0,
      callMode: 'create',
      n: 'Ignition',
      txt: 'unit_id=%UNIT_ID%&user_id=7&msg_time_int=%MSG_TIME_INT%&message=%UNIT%%20ignition',
      ta: 0,
      td: 0,
      ma: 0,
      mmtd: 0,
      cdt: 0,
      mast: 0,
      mpst: 0,
      cp: 3600,
      fl: 0,
      la: 'en',
      tz: 0,
      un: [1001, 1002],
      trg: { t: 'sensor_value', p: { sensor_name_mask: '*IGN*', lower_bound: -1, upper_bound: 1, type: 0 } },
      act: [{ t: 'push_messages', p: { url: 'https://alerts.example.com/sms', get: 0 } }],
      sch: ALWAYS_WIRE,
      ctrl_sch: ALWAYS_WIRE,
    });

    expect(notification.remoteId).toBe(1);
    expect(notification.createdAt).toBe('2026-03-01T12:00:00.000Z');
    expect(platform.openSessions.size).toBe(0);

    const reopened = new JsonFileNotificationRepository(storagePath);
    await expect(reopened.get(7, notification.id)).resolves.toEqual(notification);
  });

  it('should store nothing when the remote create fails', async () => {
    const review = await reachReview();
    platform.failNext(
      'resource/update_notification',
      new RemoteApiError('Remote call failed with error 6 (Unknown error)', 6, 'resource/update_notification'),
      'create'
    );

    const view = expectState(
      await app.workflow.commit(7, review.token, { name: 'Ignition', message: '%UNIT% ignition', method: 'sms' }),
      'ReviewAndCommit'
    );

    expect(view.failure).toBe('Remote call failed with error 6 (Unknown error)');
    await expect(app.repository.listByCustomer(7)).resolves.toEqual([]);
    expect(platform.notifications.get(10)?.size).toBe(0);
  });

  it('should not call the platform again for an unchanged update', async () => {
    const { notification } = await commitIgnition();

    const same = await app.synchronizer.update(7, notification.id, { settings: { name: 'Ignition' } });
    const labelled = await app.synchronizer.update(7, notification.id, { label: 'Depot' });

    expect(same.remoteId).toBe(notification.remoteId);
    expect(labelled.label).toBe('Depot');
    expect(platform.callsTo('resource/update_notification')).toHaveLength(1);
  });

  it('should re-render delivery when the method changes', async () => {
    const { notification } = await commitIgnition();

    const updated = await app.synchronizer.update(7, notification.id, { settings: { method: 'voice' } });

    const last = platform.callsTo('resource/update_notification').at(-1);
    expect(last?.params['callMode']).toBe('update');
    expect(last?.params['id']).toBe(notification.remoteId);
    expect(updated.actions).toEqual([{ t: 'push_messages', p: { url: 'https://alerts.example.com/voice', get: 0 } }]);
    expect(platform.stored(10, notification.remoteId)?.['act']).toEqual(updated.actions);
  });

  it('should treat enabling an enabled notification as a no-op', async () => {
    const { notification } = await commitIgnition();

    const unchanged = await app.synchronizer.enable(7, notification.id);
    expect(unchanged).toEqual(notification);
    expect(platform.callsTo('resource/update_notification')).toHaveLength(1);

    const disabled = await app.synchronizer.disable(7, notification.id);
    expect(disabled.enabled).toBe(false);
    expect(platform.stored(10, notification.remoteId)?.['fl']).toBe(2);
  });

  it('should delete remotely and locally', async () => {
    const { notification } = await commitIgnition();

    await app.synchronizer.delete(7, notification.id);

    expect(platform.stored(10, notification.remoteId)).toBeUndefined();
    await expect(app.repository.listByCustomer(7)).resolves.toEqual([]);
  });
});
