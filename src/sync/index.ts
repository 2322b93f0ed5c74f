/**
 * Local/remote notification synchronization.
 *
 * @packageDocumentation
 */

export {
  NotificationSynchronizer,
  sameRemoteState,
  type NotificationSynchronizerOptions,
} from './synchronizer.js';
