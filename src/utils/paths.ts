import { join } from 'node:path';
import type { Status } from '../types/task.js';

export function getTasksDir(workspace: string): string {
  return join(workspace, 'tasks');
}

export function getStatusDir(workspace: string, status: Status): string {
  return join(getTasksDir(workspace), status);
}

export function getTaskFilePath(workspace: string, status: Status, taskId: string): string {
  return join(getStatusDir(workspace, status), `${taskId}.md`);
}

/** High-water mark of allocated task numbers. */
export function getSequenceFilePath(workspace: string): string {
  return join(getTasksDir(workspace), '.sequence');
}

export function getActivityLogPath(workspace: string): string {
  return join(workspace, 'activity.log');
}

export function getNotificationsPath(workspace: string): string {
  return join(workspace, 'notifications.md');
}

export function getAgentDir(workspace: string, agent: string): string {
  return join(workspace, 'agents', agent);
}

export function getSubscriptionsPath(workspace: string, agent: string): string {
  return join(getAgentDir(workspace, agent), 'subscriptions.json');
}

export function getConfigFilePath(workspace: string, fileName: string): string {
  return join(workspace, fileName);
}

export function getTaskLockPath(workspace: string): string {
  return join(workspace, '.tasks.lock');
}

export function getLedgerLockPath(workspace: string): string {
  return join(workspace, '.notifications.lock');
}

export function getSubscriptionsLockPath(workspace: string, agent: string): string {
  return join(getAgentDir(workspace, agent), '.subscriptions.lock');
}

/**
 * Record file names in a status directory, e.g. `task-007.md` -> `task-007`.
 * Returns null for anything that is not a task record.
 */
export function taskIdFromFileName(fileName: string): string | null {
  const match = fileName.match(/^(task-\d+)\.md$/);
  return match ? match[1] : null;
}

export function taskNumber(taskId: string): number | null {
  const match = taskId.match(/^task-(\d+)$/);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function formatTaskId(num: number): string {
  return `task-${String(num).padStart(3, '0')}`;
}
