import type { Priority } from '../types/task.js';
import { logger } from '../utils/logger.js';
import { runWithBoard, type GlobalOptions } from './context.js';
import { formatTaskDetail, formatTaskLine } from './format.js';

export async function createCommand(
  globals: GlobalOptions,
  title: string,
  options: { description?: string; priority?: Priority; tag?: string[] },
): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.createTask(title, options.description ?? '', {
      priority: options.priority,
      tags: options.tag,
    });
    logger.success(`Created ${task.id}: ${task.title}`);
  });
}

export async function showCommand(globals: GlobalOptions, taskId: string): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.getTask(taskId);
    for (const line of formatTaskDetail(task)) logger.info(line);
  });
}

export async function listCommand(globals: GlobalOptions, options: { status?: string }): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const tasks = await store.listTasks(options.status);
    if (tasks.length === 0) {
      logger.dim('No tasks.');
      return;
    }
    for (const task of tasks) logger.info(formatTaskLine(task));
  });
}

export interface UpdateCommandOptions {
  title?: string;
  description?: string;
  priority?: Priority;
  tag?: string[];
  prd?: string;
  plan?: string;
  pr?: string;
}

export async function updateCommand(globals: GlobalOptions, taskId: string, options: UpdateCommandOptions): Promise<void> {
  const { tag, ...rest } = options;
  const updates = tag ? { ...rest, tags: tag } : rest;
  if (Object.keys(updates).length === 0) {
    logger.warn('Nothing to update.');
    return;
  }
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.updateTask(taskId, updates);
    logger.success(`Updated ${task.id}`);
  });
}

export async function moveCommand(globals: GlobalOptions, taskId: string, status: string): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.moveTask(taskId, status);
    logger.success(`${task.id} is now ${task.status}`);
  });
}

export async function assignCommand(globals: GlobalOptions, taskId: string, agent: string): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.assignTask(taskId, agent);
    logger.success(`${task.id} assigned to ${task.assigned.join(', ')}`);
  });
}

export async function commentCommand(globals: GlobalOptions, taskId: string, agent: string, message: string): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.addComment(taskId, agent, message);
    logger.success(`Comment added to ${task.id} (${task.thread.length} in thread)`);
  });
}

export async function workCommand(globals: GlobalOptions, role: string): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const task = await store.findWork(role);
    if (!task) {
      logger.dim(`No work found for ${role}.`);
      return;
    }
    logger.info(formatTaskLine(task));
  });
}

export async function mentionsCommand(globals: GlobalOptions, agent: string): Promise<void> {
  await runWithBoard(globals, async ({ store }) => {
    const tasks = await store.findMentions(agent);
    if (tasks.length === 0) {
      logger.dim(`No mentions of @${agent}.`);
      return;
    }
    for (const task of tasks) logger.info(formatTaskLine(task));
  });
}
