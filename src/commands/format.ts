import type { Notification } from '../types/notification.js';
import type { Task } from '../types/task.js';

// Width of the longest status name, ready-for-testing
const STATUS_WIDTH = 17;

export function formatAssignees(task: Task): string {
  return task.assigned.length > 0 ? task.assigned.join(', ') : 'unassigned';
}

export function formatTaskLine(task: Task): string {
  return `${task.id}  ${task.priority}  ${task.status.padEnd(STATUS_WIDTH)}  ${task.title} (${formatAssignees(task)})`;
}

export function formatTaskDetail(task: Task): string[] {
  const lines = [
    `${task.id}: ${task.title}`,
    `Status:      ${task.status}`,
    `Priority:    ${task.priority}`,
    `Assigned:    ${formatAssignees(task)}`,
    `Subscribers: ${task.subscribers.join(', ') || '-'}`,
    `Tags:        ${task.tags.join(', ') || '-'}`,
    `Created:     ${task.created}`,
    `Updated:     ${task.updated}`,
  ];
  if (task.prd) lines.push(`PRD:         ${task.prd}`);
  if (task.plan) lines.push(`Plan:        ${task.plan}`);
  if (task.pr) lines.push(`PR:          ${task.pr}`);
  lines.push('', task.description);
  if (task.thread.length > 0) {
    lines.push('', `Thread (${task.thread.length}):`);
    for (const comment of task.thread) {
      lines.push(`  ${comment.timestamp} ${comment.agent}: ${comment.message}`);
    }
  }
  return lines;
}

export function formatNotification(n: Notification): string {
  const task = n.taskId ? ` [${n.taskId}]` : '';
  return `${n.time} from ${n.from}${task}: ${n.message}`;
}
