/**
 * Notification configuration workflow.
 *
 * @packageDocumentation
 */

export type {
  DraftAt,
  FieldErrors,
  NotificationDraft,
  ReviewInput,
  UnitSelection,
  WorkflowState,
  WorkflowStep,
  WorkflowView,
} from './types.js';
export {
  ContinuationTokenCodec,
  MIN_SECRET_LENGTH,
  TOKEN_VERSION,
  type ContinuationTokenOptions,
  type TokenEnvelope,
} from './token.js';
export { ConfigurationWorkflow, type ConfigurationWorkflowOptions } from './workflow.js';
