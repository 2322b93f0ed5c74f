import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationWorkflow } from './workflow.js';
import { ContinuationTokenCodec } from './token.js';
import type { WorkflowView } from './types.js';
import { RemoteApiError, UnknownTriggerKindError, WorkflowError } from '../errors.js';
import { StaticUnitDirectory } from '../remote/resources.js';
import { SessionFactory, StaticCredentialStore } from '../remote/session.js';
import { InMemoryNotificationRepository } from '../storage/repository.js';
import { NotificationSynchronizer } from '../sync/synchronizer.js';
import { ALWAYS } from '../wire/schedule.js';
import { FakePlatform } from '../../tests/support/fake-platform.js';
import { TEST_ENDPOINTS, TEST_SECRET } from '../../tests/support/fixtures.js';

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

describe('ConfigurationWorkflow', () => {
  let platform: FakePlatform;
  let repository: InMemoryNotificationRepository;
  let workflow: ConfigurationWorkflow;

  beforeEach(() => {
    platform = new FakePlatform();
    platform.addResource(10, 'Fleet Notify Alerts');
    repository = new InMemoryNotificationRepository();
    const directory = new StaticUnitDirectory(
      [{ id: 10, name: 'Fleet Notify Alerts', kind: 'resource' }],
      new Map([
        [
          10,
          [
            { id: 1001, name: 'Truck 1', kind: 'unit' as const },
            { id: 1002, name: 'Truck 2', kind: 'unit' as const },
          ],
        ],
      ])
    );
    const synchronizer = new NotificationSynchronizer({
      sessions: new SessionFactory(platform, new StaticCredentialStore([[7, 'test-token']])),
      repository,
      endpoints: TEST_ENDPOINTS,
    });
    workflow = new ConfigurationWorkflow({
      directory,
      synchronizer,
      tokens: new ContinuationTokenCodec({ secret: TEST_SECRET, ttlSeconds: 600 }),
      defaults: { language: 'fr', timezone: 3600 },
    });
  });

  async function reachReview(customerId = 7): Promise<ViewOf<'ReviewAndCommit'>> {
    const start = expectState(await workflow.start(customerId), 'SelectUnits');
    const kinds = expectState(
      await workflow.selectUnits(customerId, start.token, { resourceId: 10, units: [1001, 1002] }),
      'SelectTriggerKind'
    );
    const params = expectState(
      await workflow.selectTriggerKind(customerId, kinds.token, 'digital-input'),
      'ConfigureParameters'
    );
    return expectState(
      await workflow.configureParameters(customerId, params.token, { input_index: '3', type: '1' }),
      'ReviewAndCommit'
    );
  }

  describe('start and selectUnits', () => {
    it('should start at unit selection with the resource list', async () => {
      const view = expectState(await workflow.start(7), 'SelectUnits');

      expect(view.resources).toEqual([{ id: 10, name: 'Fleet Notify Alerts', kind: 'resource' }]);
      expect(view.errors).toEqual({});
    });

    it('should move to kind selection with the kinds in display order', async () => {
      const view = expectState(
        await workflow.selectUnits(7, undefined, { resourceId: 10, units: [1002, 1001, 1002] }),
        'SelectTriggerKind'
      );

      expect(view.units).toEqual([1002, 1001]);
      expect(view.kinds).toHaveLength(17);
      expect(view.kinds[0]?.kind).toBe('geofence');
    });

    it('should stay at unit selection for unknown resources and units', async () => {
      const badResource = expectState(
        await workflow.selectUnits(7, undefined, { resourceId: 99, units: [1001] }),
        'SelectUnits'
      );
      const badUnits = expectState(
        await workflow.selectUnits(7, undefined, { resourceId: 10, units: [1001, 5, 6] }),
        'SelectUnits'
      );
      const noUnits = expectState(await workflow.selectUnits(7, undefined, { resourceId: 10, units: [] }), 'SelectUnits');

      expect(badResource.errors).toEqual({ resourceId: ['resource 99 is not available'] });
      expect(badUnits.errors).toEqual({ units: ['units not available: 5, 6'] });
      expect(noUnits.errors).toEqual({ units: ['select at least one unit'] });
    });
  });

  describe('selectTriggerKind', () => {
    it('should return the schema of the chosen kind', async () => {
      const kinds = expectState(
        await workflow.selectUnits(7, undefined, { resourceId: 10, units: [1001] }),
        'SelectTriggerKind'
      );

      const view = expectState(await workflow.selectTriggerKind(7, kinds.token, 'digital-input'), 'ConfigureParameters');

      expect(view.kind).toBe('digital-input');
      expect(view.fields.map((f) => f.name)).toEqual(['input_index', 'type']);
    });

    it('should reject unknown kinds', async () => {
      const kinds = expectState(
        await workflow.selectUnits(7, undefined, { resourceId: 10, units: [1001] }),
        'SelectTriggerKind'
      );

      await expect(workflow.selectTriggerKind(7, kinds.token, 'teleport')).rejects.toBeInstanceOf(
        UnknownTriggerKindError
      );
    });

    it('should refuse a token that has not passed unit selection', async () => {
      const start = expectState(await workflow.start(7), 'SelectUnits');

      const error = await workflow.selectTriggerKind(7, start.token, 'alarm').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WorkflowError);
      if (error instanceof WorkflowError) {
        expect(error.code).toBe('out_of_sequence');
      }
    });
  });

  describe('configureParameters', () => {
    it('should stay with field errors when bounds are reversed', async () => {
      const kinds = expectState(
        await workflow.selectUnits(7, undefined, { resourceId: 10, units: [1001] }),
        'SelectTriggerKind'
      );
      const params = expectState(await workflow.selectTriggerKind(7, kinds.token, 'sensor-value'), 'ConfigureParameters');

      const view = expectState(
        await workflow.configureParameters(7, params.token, { lower_bound: 5, upper_bound: 1 }),
        'ConfigureParameters'
      );

      expect(Object.keys(view.errors)).toEqual(['lower_bound', 'upper_bound']);
      expect(view.values).toEqual({ lower_bound: 5, upper_bound: 1 });
    });

    it('should move to review with the normalized trigger', async () => {
      const review = await reachReview();

      expect(review.trigger).toEqual({ kind: 'digital-input', parameters: { input_index: 3, type: 1 } });
      expect(review.units).toEqual([1001, 1002]);
      expect(review.failure).toBeNull();
    });

    it('should allow revisiting the parameters from review', async () => {
      const review = await reachReview();

      const again = expectState(
        await workflow.configureParameters(7, review.token, { input_index: 4 }),
        'ReviewAndCommit'
      );

      expect(again.trigger).toEqual({ kind: 'digital-input', parameters: { input_index: 4, type: 0 } });
    });

    it('should drop the trigger when kind selection is revisited', async () => {
      const review = await reachReview();

      const params = expectState(await workflow.selectTriggerKind(7, review.token, 'alarm'), 'ConfigureParameters');
      const described = await workflow.describe(7, params.token);

      expect(described.state).toBe('ConfigureParameters');
      expect(expectState(described, 'ConfigureParameters').kind).toBe('alarm');
    });
  });

  describe('commit', () => {
    it('should create the notification and finish', async () => {
      const review = await reachReview();

      const view = expectState(
        await workflow.commit(7, review.token, { name: 'Door', message: 'Door open on %UNIT%', method: 'voice', label: 'Rear' }),
        'Committed'
      );

      expect(view.notification.remoteId).toBe(1);
      expect(view.notification.label).toBe('Rear');
      expect(view.notification.settings.language).toBe('fr');
      expect(view.notification.settings.timezone).toBe(3600);
      await expect(repository.listByCustomer(7)).resolves.toHaveLength(1);
    });

    it('should take defaults for settings passed as undefined', async () => {
      const review = await reachReview();

      const view = expectState(
        await workflow.commit(7, review.token, {
          name: 'Door',
          message: 'Door open',
          method: 'sms',
          schedule: undefined,
          language: undefined,
        }),
        'Committed'
      );

      expect(view.notification.settings.language).toBe('fr');
      expect(view.notification.settings.schedule).toEqual(ALWAYS);
    });

    it('should return the existing notification when a token is committed again', async () => {
      const review = await reachReview();
      const input = { name: 'Door', message: 'Door open', method: 'sms' } as const;

      const first = expectState(await workflow.commit(7, review.token, input), 'Committed');
      const second = expectState(await workflow.commit(7, review.token, input), 'Committed');

      expect(second.notification).toEqual(first.notification);
      expect(platform.callsTo('resource/update_notification')).toHaveLength(1);
      await expect(repository.listByCustomer(7)).resolves.toHaveLength(1);
    });

    it('should create one notification for overlapping commits of a token', async () => {
      const review = await reachReview();
      const input = { name: 'Door', message: 'Door open', method: 'sms' } as const;

      const views = await Promise.all([
        workflow.commit(7, review.token, input),
        workflow.commit(7, review.token, input),
      ]);

      const ids = views.map((view) => expectState(view, 'Committed').notification.id);
      expect(ids[0]).toBe(ids[1]);
      expect(platform.callsTo('resource/update_notification')).toHaveLength(1);
      await expect(repository.listByCustomer(7)).resolves.toHaveLength(1);
    });

    it('should stay at review with field errors for invalid settings', async () => {
      const review = await reachReview();

      const view = expectState(
        await workflow.commit(7, review.token, { name: '', message: 'x', method: 'sms', alarmTimeout: 5000 }),
        'ReviewAndCommit'
      );

      expect(view.token).toBe(review.token);
      expect(view.errors).toEqual({
        name: ['name is required'],
        alarmTimeout: ['alarmTimeout must be between 0 and 1800, got 5000'],
      });
      expect(platform.callsTo('resource/update_notification')).toHaveLength(0);
    });

    it('should stay at review with the same token when the remote create fails', async () => {
      const review = await reachReview();
      platform.failNext(
        'resource/update_notification',
        new RemoteApiError('Remote call failed with error 7 (Access denied)', 7, 'resource/update_notification'),
        'create'
      );

      const view = expectState(
        await workflow.commit(7, review.token, { name: 'Door', message: 'Door open', method: 'sms' }),
        'ReviewAndCommit'
      );

      expect(view.token).toBe(review.token);
      expect(view.failure).toBe('Remote call failed with error 7 (Access denied)');
      await expect(repository.listByCustomer(7)).resolves.toEqual([]);

      const retried = await workflow.commit(7, view.token, { name: 'Door', message: 'Door open', method: 'sms' });
      expect(retried.state).toBe('Committed');
    });

    it('should stay at review when the customer has no credential', async () => {
      const review = await reachReview(8);

      const view = expectState(
        await workflow.commit(8, review.token, { name: 'Door', message: 'Door open', method: 'sms' }),
        'ReviewAndCommit'
      );

      expect(view.failure).toBe('No remote platform token is available for customer 8');
      expect(platform.calls).toHaveLength(0);
    });

    it('should refuse to commit from an earlier step', async () => {
      const start = expectState(await workflow.start(7), 'SelectUnits');

      await expect(
        workflow.commit(7, start.token, { name: 'Door', message: 'Door open', method: 'sms' })
      ).rejects.toBeInstanceOf(WorkflowError);
    });
  });

  describe('abort and describe', () => {
    it('should abort from any step without remote calls', async () => {
      const review = await reachReview();

      expect(workflow.abort(7, review.token)).toEqual({ state: 'Aborted' });
      expect(platform.calls).toHaveLength(0);
    });

    it('should reject tokens of another customer', () => {
      return workflow.start(7).then((view) => {
        const start = expectState(view, 'SelectUnits');
        expect(() => workflow.abort(8, start.token)).toThrow(WorkflowError);
      });
    });

    it('should rebuild the review view from the token alone', async () => {
      const review = await reachReview();

      const described = expectState(await workflow.describe(7, review.token), 'ReviewAndCommit');

      expect(described.trigger).toEqual(review.trigger);
      expect(described.units).toEqual([1001, 1002]);
      expect(described.token).toBe(review.token);
    });
  });
});
