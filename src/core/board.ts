import type { BoardConfig, BoardConfigOverrides } from '../types/config.js';
import { ActivityLog } from './activity-log.js';
import { loadBoardConfig } from './config.js';
import { NotificationLedger } from './notification-ledger.js';
import { SubscriptionIndex } from './subscriptions.js';
import { TaskStore } from './task-store.js';

export interface TaskBoard {
  config: BoardConfig;
  store: TaskStore;
  ledger: NotificationLedger;
  subscriptions: SubscriptionIndex;
  activity: ActivityLog;
}

/**
 * Wire up every component against one workspace.
 */
export function createTaskBoard(config: BoardConfig): TaskBoard {
  const activity = new ActivityLog(config.workspace, config.clock, config.retry);
  const ledger = new NotificationLedger(config.workspace, config.clock, config.lock, config.retry);
  const subscriptions = new SubscriptionIndex(config.workspace, config.clock, config.lock, config.retry);
  const store = new TaskStore(config, { activity, ledger, subscriptions });
  return { config, store, ledger, subscriptions, activity };
}

export async function openTaskBoard(overrides: BoardConfigOverrides = {}): Promise<TaskBoard> {
  return createTaskBoard(await loadBoardConfig(overrides));
}
