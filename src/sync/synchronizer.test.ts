import { describe, it, expect, beforeEach } from 'vitest';
import { NotificationSynchronizer, sameRemoteState } from './synchronizer.js';
import {
  InvalidNotificationError,
  MissingCredentialError,
  NotificationNotFoundError,
  RemoteApiError,
  RepositoryError,
} from '../errors.js';
import type { Notification } from '../notifications/types.js';
import { SessionFactory, StaticCredentialStore } from '../remote/session.js';
import { InMemoryNotificationRepository } from '../storage/repository.js';
import { FakePlatform } from '../../tests/support/fake-platform.js';
import { TEST_ENDPOINTS, makeInput } from '../../tests/support/fixtures.js';

class FailingRepository extends InMemoryNotificationRepository {
  failInsert = false;
  failUpdate = false;

  override async insert(notification: Notification): Promise<void> {
    if (this.failInsert) {
      throw new RepositoryError('disk full', 'file_error');
    }
    await super.insert(notification);
  }

  override async update(notification: Notification): Promise<void> {
    if (this.failUpdate) {
      throw new RepositoryError('disk full', 'file_error');
    }
    await super.update(notification);
  }
}

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('NotificationSynchronizer', () => {
  let platform: FakePlatform;
  let repository: FailingRepository;
  let synchronizer: NotificationSynchronizer;

  beforeEach(() => {
    platform = new FakePlatform();
    platform.addResource(10, 'Fleet Notify Alerts');
    repository = new FailingRepository();
    synchronizer = new NotificationSynchronizer({
      sessions: new SessionFactory(platform, new StaticCredentialStore([[7, 'test-token']])),
      repository,
      endpoints: TEST_ENDPOINTS,
      clock: () => NOW,
    });
  });

  function mutationModes(): unknown[] {
    return platform.callsTo('resource/update_notification').map((c) => c.params['callMode']);
  }

  describe('create', () => {
    it('should create remotely, then store the record with the remote id', async () => {
      const notification = await synchronizer.create(makeInput());

      expect(notification.remoteId).toBe(1);
      expect(notification.createdAt).toBe('2026-03-01T12:00:00.000Z');
      await expect(repository.get(7, notification.id)).resolves.toEqual(notification);
      const [request] = platform.callsTo('resource/update_notification');
      expect(request?.params['id']).toBe(0);
      expect(request?.params['callMode']).toBe('create');
      expect(platform.openSessions.size).toBe(0);
    });

    it('should store nothing when the remote create fails', async () => {
      platform.failNext('resource/update_notification', new RemoteApiError('denied', 7, 'x'), 'create');

      await expect(synchronizer.create(makeInput())).rejects.toBeInstanceOf(RemoteApiError);

      await expect(repository.listByCustomer(7)).resolves.toEqual([]);
    });

    it('should delete the remote notification when the local insert fails', async () => {
      repository.failInsert = true;

      await expect(synchronizer.create(makeInput())).rejects.toThrow('disk full');

      expect(mutationModes()).toEqual(['create', 'delete']);
      expect(platform.stored(10, 1)).toBeUndefined();
    });

    it('should rethrow the insert error when compensation fails too', async () => {
      repository.failInsert = true;
      platform.failNext('resource/update_notification', new RemoteApiError('gone', 'timeout', 'x'), 'delete');

      await expect(synchronizer.create(makeInput())).rejects.toBeInstanceOf(RepositoryError);
    });

    it('should fail before any remote call without a credential', async () => {
      await expect(synchronizer.create(makeInput({ customerId: 8 }))).rejects.toBeInstanceOf(MissingCredentialError);

      expect(platform.calls).toHaveLength(0);
    });

    it('should reject invalid input before any remote call', async () => {
      await expect(synchronizer.create(makeInput({ units: [] }))).rejects.toBeInstanceOf(InvalidNotificationError);

      expect(platform.calls).toHaveLength(0);
    });
  });

  describe('update', () => {
    it('should not call the platform for local-only edits', async () => {
      const created = await synchronizer.create(makeInput());
      platform.calls.length = 0;

      const updated = await synchronizer.update(7, created.id, { label: 'Depot' });

      expect(updated.label).toBe('Depot');
      expect(platform.calls).toHaveLength(0);
      expect((await repository.get(7, created.id))?.label).toBe('Depot');
    });

    it('should send an update with the stored remote id when the payload changes', async () => {
      const created = await synchronizer.create(makeInput());

      const updated = await synchronizer.update(7, created.id, { settings: { message: 'Engine on' } });

      const last = platform.callsTo('resource/update_notification').at(-1);
      expect(last?.params['callMode']).toBe('update');
      expect(last?.params['id']).toBe(created.remoteId);
      expect(last?.params['txt']).toBe(updated.text);
      expect(platform.stored(10, created.remoteId)?.['txt']).toBe(
        'unit_id=%UNIT_ID%&user_id=7&msg_time_int=%MSG_TIME_INT%&message=Engine%20on'
      );
    });

    it('should keep the local record unchanged when the remote update fails', async () => {
      const created = await synchronizer.create(makeInput());
      platform.failNext('resource/update_notification', new RemoteApiError('timeout', 'timeout', 'x'), 'update');

      await expect(synchronizer.update(7, created.id, { units: [1001] })).rejects.toBeInstanceOf(RemoteApiError);

      await expect(repository.get(7, created.id)).resolves.toEqual(created);
    });

    it('should restore the remote state when the local update fails', async () => {
      const created = await synchronizer.create(makeInput());
      repository.failUpdate = true;

      await expect(synchronizer.update(7, created.id, { units: [1001] })).rejects.toThrow('disk full');

      expect(mutationModes()).toEqual(['create', 'update', 'update']);
      expect(platform.stored(10, created.remoteId)?.['un']).toEqual([1001, 1002]);
    });

    it('should reject unknown notifications', async () => {
      await expect(synchronizer.update(7, 'missing', {})).rejects.toBeInstanceOf(NotificationNotFoundError);
    });
  });

  describe('delete', () => {
    it('should delete remotely, then locally', async () => {
      const created = await synchronizer.create(makeInput());

      await synchronizer.delete(7, created.id);

      expect(mutationModes()).toEqual(['create', 'delete']);
      await expect(repository.get(7, created.id)).resolves.toBeNull();
    });

    it('should keep the local record when the remote delete fails and it still exists', async () => {
      const created = await synchronizer.create(makeInput());
      platform.failNext('resource/update_notification', new RemoteApiError('busy', 1003, 'x'), 'delete');

      await expect(synchronizer.delete(7, created.id)).rejects.toThrow('busy');

      await expect(repository.get(7, created.id)).resolves.toEqual(created);
      expect(platform.callsTo('resource/get_notification_data')).toHaveLength(1);
    });

    it('should remove the local record when the remote notification is confirmed absent', async () => {
      const created = await synchronizer.create(makeInput());
      platform.notifications.get(10)?.delete(created.remoteId);

      await synchronizer.delete(7, created.id);

      await expect(repository.get(7, created.id)).resolves.toBeNull();
    });

    it('should keep the record when the existence check fails as well', async () => {
      const created = await synchronizer.create(makeInput());
      platform.failNext('resource/update_notification', new RemoteApiError('busy', 1003, 'x'), 'delete');
      platform.failNext('resource/get_notification_data', new RemoteApiError('busy', 1003, 'x'));

      await expect(synchronizer.delete(7, created.id)).rejects.toThrow('busy');

      await expect(repository.get(7, created.id)).resolves.toEqual(created);
    });
  });

  describe('enable and disable', () => {
    it('should make no remote call when already in the target state', async () => {
      const created = await synchronizer.create(makeInput());
      platform.calls.length = 0;

      const result = await synchronizer.enable(7, created.id);

      expect(result).toEqual(created);
      expect(platform.calls).toHaveLength(0);
    });

    it('should send the enable request and save the flag', async () => {
      const created = await synchronizer.create(makeInput());

      const disabled = await synchronizer.disable(7, created.id);

      const last = platform.callsTo('resource/update_notification').at(-1);
      expect(last?.params).toEqual({ itemId: 10, id: created.remoteId, callMode: 'enable', e: 0 });
      expect(disabled.enabled).toBe(false);
      expect((await repository.get(7, created.id))?.enabled).toBe(false);
    });

    it('should keep the flag when the remote call fails', async () => {
      const created = await synchronizer.create(makeInput());
      platform.failNext('resource/update_notification', new RemoteApiError('denied', 7, 'x'), 'enable');

      await expect(synchronizer.disable(7, created.id)).rejects.toBeInstanceOf(RemoteApiError);

      expect((await repository.get(7, created.id))?.enabled).toBe(true);
    });
  });

  describe('ensureNotificationResource', () => {
    it('should resolve the configured resource', async () => {
      await expect(synchronizer.ensureNotificationResource(7)).resolves.toBe(10);
    });
  });
});

describe('sameRemoteState', () => {
  it('should ignore the local label but not the units', async () => {
    const input = makeInput();
    const base = {
      ...input,
      text: 'x',
      actions: [],
      enabled: true,
    };

    expect(sameRemoteState(base, { ...base })).toBe(true);
    expect(sameRemoteState(base, { ...base, units: [1001] })).toBe(false);
    expect(sameRemoteState(base, { ...base, enabled: false })).toBe(false);
  });
});
