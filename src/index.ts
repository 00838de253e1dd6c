export { createTaskBoard, openTaskBoard, type TaskBoard } from './core/board.js';
export { buildBoardConfig, loadBoardConfig, resolveWorkspace } from './core/config.js';
export { TaskStore, isStatus, statusForRole, truncateMessage } from './core/task-store.js';
export { NotificationLedger, parseLedger, serializeLedger } from './core/notification-ledger.js';
export { SubscriptionIndex } from './core/subscriptions.js';
export { ActivityLog } from './core/activity-log.js';
export { encodeTask, decodeTask } from './core/record-codec.js';
export {
  TaskBoardError,
  NotFoundError,
  InvalidStatusError,
  MalformedRecordError,
  IOFailureError,
  InvalidFieldError,
  LockTimeoutError,
  type TaskBoardErrorCode,
} from './core/errors.js';
export { withLock } from './utils/lock.js';
export { STATUSES, PRIORITIES, AGENT_ROLES, ROLE_STATUS_MAP } from './constants.js';
export type * from './types/task.js';
export type * from './types/notification.js';
export type * from './types/config.js';
