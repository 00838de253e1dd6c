import type { AGENT_ROLES, PRIORITIES, STATUSES } from '../constants.js';

export type Status = (typeof STATUSES)[number];

export type Priority = (typeof PRIORITIES)[number];

export type AgentRole = (typeof AGENT_ROLES)[number];

export interface Comment {
  timestamp: string;
  agent: string;
  message: string;
}

export interface Task {
  id: string;
  title: string;
  description: string;
  status: Status;
  priority: Priority;
  assigned: string[];
  subscribers: string[];
  tags: string[];
  created: string;
  updated: string;
  prd?: string;
  plan?: string;
  pr?: string;
  thread: Comment[];
}

/** Fields `updateTask` is allowed to change. */
export type TaskFieldUpdates = Partial<
  Pick<Task, 'title' | 'description' | 'priority' | 'assigned' | 'subscribers' | 'tags' | 'prd' | 'plan' | 'pr'>
>;

export interface CreateTaskOptions {
  priority?: Priority;
  tags?: string[];
}
