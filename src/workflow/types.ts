/**
 * Workflow drafts and step views.
 *
 * @packageDocumentation
 */

import type { Notification } from '../notifications/types.js';
import type { DirectoryItem } from '../remote/resources.js';
import type { FieldDescriptor } from '../triggers/fields.js';
import type { TriggerKindSummary } from '../triggers/registry.js';
import type { RawParameters, TriggerConfig, TriggerKind } from '../triggers/types.js';
import type { NotificationSettings } from '../wire/settings.js';

/** Steps that accept operator input. */
export type WorkflowStep = 'SelectUnits' | 'SelectTriggerKind' | 'ConfigureParameters' | 'ReviewAndCommit';

/** Every workflow state, including the terminal ones. */
export type WorkflowState = WorkflowStep | 'Committed' | 'Aborted';

/**
 * Selections accumulated up to a step. Carried only inside a continuation
 * token; never persisted.
 */
export type NotificationDraft =
  | { readonly step: 'SelectUnits'; readonly customerId: number }
  | {
      readonly step: 'SelectTriggerKind';
      readonly customerId: number;
      readonly resourceId: number;
      readonly units: readonly number[];
    }
  | {
      readonly step: 'ConfigureParameters';
      readonly customerId: number;
      readonly resourceId: number;
      readonly units: readonly number[];
      readonly kind: TriggerKind;
    }
  | {
      readonly step: 'ReviewAndCommit';
      readonly customerId: number;
      readonly resourceId: number;
      readonly units: readonly number[];
      readonly trigger: TriggerConfig;
      /** Random id of this submission; a commit stores it on the record it creates. */
      readonly draftId: string;
    };

/** Draft of a given step. */
export type DraftAt<S extends WorkflowStep> = Extract<NotificationDraft, { readonly step: S }>;

/** Field errors by field name. */
export type FieldErrors = Readonly<Record<string, readonly string[]>>;

/** Unit selection submitted at the first step. */
export interface UnitSelection {
  readonly resourceId: number;
  readonly units: readonly number[];
}

/**
 * Notification fields supplied at the review step. Omitted optional fields
 * take their defaults.
 */
export type ReviewInput = Pick<NotificationSettings, 'name' | 'message' | 'method'> &
  Partial<Omit<NotificationSettings, 'name' | 'message' | 'method'>> & {
    readonly label?: string | null;
  };

/**
 * What a step returns: the state reached and what is needed to continue.
 */
export type WorkflowView =
  | {
      readonly state: 'SelectUnits';
      readonly token: string;
      readonly resources: readonly DirectoryItem[];
      readonly errors: FieldErrors;
    }
  | {
      readonly state: 'SelectTriggerKind';
      readonly token: string;
      readonly resourceId: number;
      readonly units: readonly number[];
      readonly kinds: readonly TriggerKindSummary[];
    }
  | {
      readonly state: 'ConfigureParameters';
      readonly token: string;
      readonly kind: TriggerKind;
      readonly fields: readonly FieldDescriptor[];
      /** Submitted values, echoed back when they failed validation. */
      readonly values: RawParameters;
      readonly errors: FieldErrors;
    }
  | {
      readonly state: 'ReviewAndCommit';
      readonly token: string;
      readonly resourceId: number;
      readonly units: readonly number[];
      readonly trigger: TriggerConfig;
      readonly errors: FieldErrors;
      /** Failure of the last commit attempt, if any. */
      readonly failure: string | null;
    }
  | { readonly state: 'Committed'; readonly notification: Notification }
  | { readonly state: 'Aborted' };
