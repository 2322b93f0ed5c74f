import { describe, it, expect, vi } from 'vitest';
import { notificationExists, sendNotificationEnable, sendNotificationMutation } from './notifications-api.js';
import type { RemoteSession } from './session.js';
import { RemoteApiError } from '../errors.js';
import type { NotificationMutationRequest } from '../wire/encoder.js';
import { ALWAYS, encodeSchedule } from '../wire/schedule.js';

function sessionReturning(body: unknown): RemoteSession & { call: ReturnType<typeof vi.fn> } {
  return { sid: 'sid-1', userId: 42, call: vi.fn().mockResolvedValue(body) };
}

const request: NotificationMutationRequest = {
  itemId: 10,
  id: 0,
  callMode: 'create',
  n: 'Ignition',
  txt: 'unit_id=%UNIT_ID%',
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
  un: [1001],
  trg: { t: 'alarm', p: {} },
  act: [],
  sch: encodeSchedule(ALWAYS),
  ctrl_sch: encodeSchedule(ALWAYS),
};

describe('sendNotificationMutation', () => {
  it('should send the request and return the assigned id', async () => {
    const session = sessionReturning([31, { id: 31 }]);

    await expect(sendNotificationMutation(session, request)).resolves.toBe(31);
    expect(session.call).toHaveBeenCalledWith('resource/update_notification', request);
  });

  it('should accept a null object for deletes', async () => {
    const session = sessionReturning([31, null]);

    await expect(sendNotificationMutation(session, { ...request, id: 31, callMode: 'delete' })).resolves.toBe(31);
  });

  it('should reject a create that yields no positive id', async () => {
    const session = sessionReturning([0, null]);

    await expect(sendNotificationMutation(session, request)).rejects.toThrow(
      'Remote create returned invalid notification id 0'
    );
  });

  it('should reject responses of the wrong shape', async () => {
    const session = sessionReturning({ id: 31 });

    const error = await sendNotificationMutation(session, request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteApiError);
    if (error instanceof RemoteApiError) {
      expect(error.code).toBe('malformed_response');
    }
  });
});

describe('sendNotificationEnable', () => {
  it('should send the enable request', async () => {
    const session = sessionReturning([31, { id: 31 }]);
    const enable = { itemId: 10, id: 31, callMode: 'enable' as const, e: 0 as const };

    await sendNotificationEnable(session, enable);

    expect(session.call).toHaveBeenCalledWith('resource/update_notification', enable);
  });
});

describe('notificationExists', () => {
  it('should query the notification by id', async () => {
    const session = sessionReturning([{ id: 31, n: 'Ignition' }]);

    await expect(notificationExists(session, 10, 31)).resolves.toBe(true);
    expect(session.call).toHaveBeenCalledWith('resource/get_notification_data', {
      itemId: 10,
      col: [31],
      flags: 0,
    });
  });

  it('should report absence for an empty result', async () => {
    const session = sessionReturning([]);

    await expect(notificationExists(session, 10, 31)).resolves.toBe(false);
  });
});
