/**
 * Notification configuration workflow.
 *
 * Four operator steps, `SelectUnits → SelectTriggerKind →
 * ConfigureParameters → ReviewAndCommit`, each invoked independently. The
 * selections made so far travel in a signed continuation token, so a step
 * depends on nothing but its input. A step accepts any token that has
 * reached its prerequisite; revisiting an earlier step drops the later
 * selections. Nothing on the remote platform changes before `commit`.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import {
  InvalidNotificationError,
  MissingCredentialError,
  RemoteApiError,
  UnknownTriggerKindError,
  WorkflowError,
} from '../errors.js';
import type { UnitDirectory } from '../remote/resources.js';
import type { NotificationSynchronizer } from '../sync/synchronizer.js';
import { describeTriggerSchema, listTriggerKinds } from '../triggers/registry.js';
import { isTriggerKind, type RawParameters, type TriggerKind } from '../triggers/types.js';
import { errorsByField, validateTriggerParameters } from '../triggers/validator.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import { createNotificationSettings, validateNotificationSettings } from '../wire/settings.js';
import type { ContinuationTokenCodec } from './token.js';
import type {
  DraftAt,
  FieldErrors,
  NotificationDraft,
  ReviewInput,
  UnitSelection,
  WorkflowView,
} from './types.js';

/**
 * Options for {@link ConfigurationWorkflow}.
 */
export interface ConfigurationWorkflowOptions {
  readonly directory: UnitDirectory;
  readonly synchronizer: NotificationSynchronizer;
  readonly tokens: ContinuationTokenCodec;
  /** Language and timezone used when the review step omits them. */
  readonly defaults?: { readonly language: string; readonly timezone: number };
  readonly logger?: Logger;
}

const NO_ERRORS: FieldErrors = {};

function unitSelectionOf(draft: NotificationDraft): UnitSelection | null {
  return draft.step === 'SelectUnits' ? null : { resourceId: draft.resourceId, units: draft.units };
}

function kindOf(draft: NotificationDraft): TriggerKind | null {
  switch (draft.step) {
    case 'ConfigureParameters':
      return draft.kind;
    case 'ReviewAndCommit':
      return draft.trigger.kind;
    default:
      return null;
  }
}

function outOfSequence(step: string): WorkflowError {
  return new WorkflowError(`Continuation token has not reached the step before ${step}`, 'out_of_sequence');
}

/**
 * Drives the notification configuration steps.
 *
 * @example
 * ```typescript
 * const workflow = new ConfigurationWorkflow({ directory, synchronizer, tokens });
 * let view = await workflow.start(7);
 * view = await workflow.selectUnits(7, view.token, { resourceId: 10, units: [1001] });
 * ```
 */
export class ConfigurationWorkflow {
  private readonly directory: UnitDirectory;
  private readonly synchronizer: NotificationSynchronizer;
  private readonly tokens: ContinuationTokenCodec;
  private readonly defaults: { readonly language: string; readonly timezone: number };
  private readonly logger: Logger;
  /** Commits in progress, by draft id. */
  private readonly inFlight = new Map<string, Promise<WorkflowView>>();

  /**
   * Creates a new ConfigurationWorkflow.
   *
   * @param options - Collaborators and defaults.
   */
  constructor(options: ConfigurationWorkflowOptions) {
    this.directory = options.directory;
    this.synchronizer = options.synchronizer;
    this.tokens = options.tokens;
    this.defaults = options.defaults ?? { language: 'en', timezone: 0 };
    this.logger = options.logger ?? new SilentLogger();
  }

  /**
   * Starts a workflow at unit selection.
   *
   * @param customerId - The customer.
   */
  async start(customerId: number): Promise<WorkflowView> {
    this.logger.debug('workflow_started', { customerId });
    return this.selectUnitsView({ step: 'SelectUnits', customerId }, NO_ERRORS);
  }

  /**
   * Submits the resource and unit selection.
   *
   * Units are checked against the unit directory; repeated ids are dropped.
   * On failure the view stays at `SelectUnits` with field errors.
   *
   * @param customerId - The customer.
   * @param token - Any token of this customer's workflow, or undefined to start fresh.
   * @param selection - Resource and unit ids.
   * @throws WorkflowError if the token is rejected.
   */
  async selectUnits(customerId: number, token: string | undefined, selection: UnitSelection): Promise<WorkflowView> {
    if (token !== undefined) {
      this.tokens.verify(token, customerId);
    }

    const errors: Record<string, string[]> = {};
    const units = [...new Set(selection.units)];
    const resources = await this.directory.listResources(customerId);

    if (!resources.some((r) => r.id === selection.resourceId)) {
      errors['resourceId'] = [`resource ${String(selection.resourceId)} is not available`];
    } else if (units.length === 0) {
      errors['units'] = ['select at least one unit'];
    } else {
      const available = new Set((await this.directory.listUnits(customerId, selection.resourceId)).map((u) => u.id));
      const missing = units.filter((id) => !available.has(id));
      if (missing.length > 0) {
        errors['units'] = [`units not available: ${missing.join(', ')}`];
      }
    }

    if (Object.keys(errors).length > 0) {
      return {
        state: 'SelectUnits',
        token: this.tokens.issue({ step: 'SelectUnits', customerId }),
        resources,
        errors,
      };
    }

    return this.selectTriggerKindView({
      step: 'SelectTriggerKind',
      customerId,
      resourceId: selection.resourceId,
      units,
    });
  }

  /**
   * Picks the trigger kind.
   *
   * @param customerId - The customer.
   * @param token - A token that has passed unit selection.
   * @param kind - Untrusted trigger kind.
   * @throws UnknownTriggerKindError if `kind` is not a trigger kind.
   * @throws WorkflowError if the token is rejected.
   */
  async selectTriggerKind(customerId: number, token: string, kind: string): Promise<WorkflowView> {
    const selection = unitSelectionOf(this.tokens.verify(token, customerId));
    if (selection === null) {
      throw outOfSequence('SelectTriggerKind');
    }
    if (!isTriggerKind(kind)) {
      throw new UnknownTriggerKindError(kind);
    }
    return this.configureParametersView({ step: 'ConfigureParameters', customerId, ...selection, kind }, {}, NO_ERRORS);
  }

  /**
   * Submits trigger parameters. Invalid input stays at
   * `ConfigureParameters` with the errors of every failing field.
   *
   * @param customerId - The customer.
   * @param token - A token that has passed kind selection.
   * @param raw - Unvalidated parameter values.
   * @throws WorkflowError if the token is rejected.
   */
  async configureParameters(customerId: number, token: string, raw: RawParameters): Promise<WorkflowView> {
    const draft = this.tokens.verify(token, customerId);
    const selection = unitSelectionOf(draft);
    const kind = kindOf(draft);
    if (selection === null || kind === null) {
      throw outOfSequence('ConfigureParameters');
    }

    const result = validateTriggerParameters(kind, raw);
    if (!result.valid) {
      return this.configureParametersView(
        { step: 'ConfigureParameters', customerId, ...selection, kind },
        raw,
        errorsByField(result.errors)
      );
    }

    return this.reviewView(
      { step: 'ReviewAndCommit', customerId, ...selection, trigger: result.trigger, draftId: randomUUID() },
      undefined,
      NO_ERRORS,
      null
    );
  }

  /**
   * Creates the notification through the synchronizer.
   *
   * Invalid settings, remote failures and a missing credential keep the
   * workflow at `ReviewAndCommit` with the same token so that the operator
   * can retry. A token creates at most one notification: committing it again,
   * concurrently or after success, returns `Committed` with that record.
   *
   * @param customerId - The customer.
   * @param token - A `ReviewAndCommit` token.
   * @param review - Remaining notification fields.
   * @throws WorkflowError if the token is rejected.
   */
  async commit(customerId: number, token: string, review: ReviewInput): Promise<WorkflowView> {
    const draft = this.tokens.verify(token, customerId);
    if (draft.step !== 'ReviewAndCommit') {
      throw outOfSequence('commit');
    }

    const running = this.inFlight.get(draft.draftId);
    if (running !== undefined) {
      return running;
    }
    const run = this.commitDraft(draft, token, review);
    this.inFlight.set(draft.draftId, run);
    try {
      return await run;
    } finally {
      this.inFlight.delete(draft.draftId);
    }
  }

  private async commitDraft(
    draft: DraftAt<'ReviewAndCommit'>,
    token: string,
    review: ReviewInput
  ): Promise<WorkflowView> {
    const { customerId } = draft;
    const existing = await this.synchronizer.findByDraft(customerId, draft.draftId);
    if (existing !== null) {
      this.logger.info('workflow_already_committed', { customerId, id: existing.id });
      return { state: 'Committed', notification: existing };
    }

    const { label, ...fields } = review;
    const settings = createNotificationSettings(fields, this.defaults);
    const settingsErrors = validateNotificationSettings(settings);
    if (settingsErrors.length > 0) {
      return this.reviewView(draft, token, errorsByField(settingsErrors), null);
    }

    try {
      const notification = await this.synchronizer.create({
        customerId,
        resourceId: draft.resourceId,
        units: draft.units,
        trigger: draft.trigger,
        settings,
        label: label ?? null,
        draftId: draft.draftId,
      });
      this.logger.info('workflow_committed', { customerId, id: notification.id, remoteId: notification.remoteId });
      return { state: 'Committed', notification };
    } catch (error) {
      if (error instanceof InvalidNotificationError) {
        return this.reviewView(draft, token, errorsByField(error.errors), error.message);
      }
      if (error instanceof RemoteApiError || error instanceof MissingCredentialError) {
        this.logger.warn('workflow_commit_failed', { customerId, error: error.message });
        return this.reviewView(draft, token, NO_ERRORS, error.message);
      }
      throw error;
    }
  }

  /**
   * Abandons the workflow. Never touches the remote platform.
   *
   * @param customerId - The customer.
   * @param token - Any token of this customer's workflow.
   * @throws WorkflowError if the token is rejected.
   */
  abort(customerId: number, token: string): WorkflowView {
    const draft = this.tokens.verify(token, customerId);
    this.logger.debug('workflow_aborted', { customerId, step: draft.step });
    return { state: 'Aborted' };
  }

  /**
   * Rebuilds the view of the step a token is at.
   *
   * @param customerId - The customer.
   * @param token - Any token of this customer's workflow.
   * @throws WorkflowError if the token is rejected.
   */
  async describe(customerId: number, token: string): Promise<WorkflowView> {
    const draft = this.tokens.verify(token, customerId);
    switch (draft.step) {
      case 'SelectUnits':
        return this.selectUnitsView(draft, NO_ERRORS);
      case 'SelectTriggerKind':
        return this.selectTriggerKindView(draft);
      case 'ConfigureParameters':
        return this.configureParametersView(draft, {}, NO_ERRORS);
      case 'ReviewAndCommit':
        return this.reviewView(draft, token, NO_ERRORS, null);
    }
  }

  private async selectUnitsView(draft: DraftAt<'SelectUnits'>, errors: FieldErrors): Promise<WorkflowView> {
    return {
      state: 'SelectUnits',
      token: this.tokens.issue(draft),
      resources: await this.directory.listResources(draft.customerId),
      errors,
    };
  }

  private selectTriggerKindView(draft: DraftAt<'SelectTriggerKind'>): WorkflowView {
    return {
      state: 'SelectTriggerKind',
      token: this.tokens.issue(draft),
      resourceId: draft.resourceId,
      units: draft.units,
      kinds: listTriggerKinds(),
    };
  }

  private configureParametersView(
    draft: DraftAt<'ConfigureParameters'>,
    values: RawParameters,
    errors: FieldErrors
  ): WorkflowView {
    return {
      state: 'ConfigureParameters',
      token: this.tokens.issue(draft),
      kind: draft.kind,
      fields: describeTriggerSchema(draft.kind),
      values,
      errors,
    };
  }

  private reviewView(
    draft: DraftAt<'ReviewAndCommit'>,
    token: string | undefined,
    errors: FieldErrors,
    failure: string | null
  ): WorkflowView {
    return {
      state: 'ReviewAndCommit',
      token: token ?? this.tokens.issue(draft),
      resourceId: draft.resourceId,
      units: draft.units,
      trigger: draft.trigger,
      errors,
      failure,
    };
  }
}
