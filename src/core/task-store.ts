import { z } from 'zod';
import { existsSync } from 'node:fs';
import {
  AGENT_ROLES,
  DEFAULT_PRIORITY,
  NOTIFICATION_MESSAGE_LIMIT,
  PRIORITIES,
  ROLE_STATUS_MAP,
  STATUSES,
  SYSTEM_AGENT,
} from '../constants.js';
import type { BoardConfig } from '../types/config.js';
import type { NotificationInput } from '../types/notification.js';
import type { AgentRole, CreateTaskOptions, Status, Task, TaskFieldUpdates } from '../types/task.js';
import { listDir, moveFile, readText, readTextIfExists, writeTextAtomic } from '../utils/fs-io.js';
import { withLock } from '../utils/lock.js';
import { logger } from '../utils/logger.js';
import {
  formatTaskId,
  getSequenceFilePath,
  getStatusDir,
  getTaskFilePath,
  getTaskLockPath,
  taskIdFromFileName,
  taskNumber,
} from '../utils/paths.js';
import { ActivityLog } from './activity-log.js';
import { InvalidFieldError, InvalidStatusError, NotFoundError } from './errors.js';
import { minuteStamp, NotificationLedger } from './notification-ledger.js';
import { decodeTask, encodeTask } from './record-codec.js';
import { SubscriptionIndex } from './subscriptions.js';

const agentName = z
  .string()
  .regex(/^[^\r\n]*$/, 'must be a single line')
  .refine(name => name.trim() !== '', 'must not be empty');

const agentList = z.array(agentName);

const fieldUpdatesSchema = z
  .object({
    title: z.string().trim().min(1).regex(/^[^\r\n]*$/, 'must be a single line'),
    description: z.string(),
    priority: z.enum(PRIORITIES),
    assigned: agentList,
    subscribers: agentList,
    tags: z.array(z.string()),
    prd: z.string().trim().optional(),
    plan: z.string().trim().optional(),
    pr: z.string().trim().optional(),
  })
  .partial();

const UPDATABLE_FIELDS: ReadonlySet<string> = new Set(Object.keys(fieldUpdatesSchema.shape));

export function isStatus(value: string): value is Status {
  return STATUSES.some(status => status === value);
}

function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some(role => role === value);
}

export function statusForRole(role: string): Status | undefined {
  return isAgentRole(role) ? ROLE_STATUS_MAP[role] : undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

function normalizeTitle(title: string): string {
  return title.replace(/\s*\r?\n\s*/g, ' ').trim();
}

export function truncateMessage(message: string, limit: number = NOTIFICATION_MESSAGE_LIMIT): string {
  // Count code points so a surrogate pair is never split
  const chars = Array.from(message);
  return chars.length > limit ? `${chars.slice(0, limit).join('')}...` : message;
}

function checkAgentName(agent: string): void {
  const result = agentName.safeParse(agent);
  if (!result.success) {
    throw new InvalidFieldError(['agent'], result.error.issues[0]?.message ?? 'invalid agent name');
  }
}

function byTaskNumber(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}

interface TaskStoreDeps {
  activity: ActivityLog;
  ledger: NotificationLedger;
  subscriptions: SubscriptionIndex;
}

interface LocatedTask {
  task: Task;
  filePath: string;
  raw: string;
}

/**
 * Tasks as markdown records under tasks/<status>/<id>.md. Every mutation holds
 * the workspace task lock and replaces the record atomically.
 */
export class TaskStore {
  private readonly workspace: string;
  private readonly activity: ActivityLog;
  private readonly ledger: NotificationLedger;
  private readonly subscriptions: SubscriptionIndex;

  constructor(
    private readonly config: BoardConfig,
    deps: TaskStoreDeps,
  ) {
    this.workspace = config.workspace;
    this.activity = deps.activity;
    this.ledger = deps.ledger;
    this.subscriptions = deps.subscriptions;
  }

  private now(): string {
    return this.config.clock().toISOString();
  }

  private mutate<T>(fn: () => Promise<T>): Promise<T> {
    return withLock(getTaskLockPath(this.workspace), fn, this.config.lock);
  }

  /**
   * Read one record. The directory it sits in is authoritative for its status.
   */
  private async readRecord(filePath: string, status: Status): Promise<LocatedTask> {
    const raw = await readText(filePath, this.config.retry);
    const task = decodeTask(raw, filePath);
    if (task.status !== status) {
      logger.debug(`${task.id} records status ${task.status} but lives in ${status}`);
      task.status = status;
    }
    return { task, filePath, raw };
  }

  private async writeRecord(filePath: string, task: Task): Promise<void> {
    await writeTextAtomic(filePath, encodeTask(task), this.config.retry);
  }

  private locateFile(taskId: string): { filePath: string; status: Status } | null {
    for (const status of STATUSES) {
      const filePath = getTaskFilePath(this.workspace, status, taskId);
      if (existsSync(filePath)) return { filePath, status };
    }
    return null;
  }

  private async locate(taskId: string): Promise<LocatedTask | null> {
    const found = this.locateFile(taskId);
    return found ? this.readRecord(found.filePath, found.status) : null;
  }

  private async locateOrThrow(taskId: string): Promise<LocatedTask> {
    const found = await this.locate(taskId);
    if (!found) throw new NotFoundError(taskId);
    return found;
  }

  /**
   * Record ids in one status directory, in task-number order.
   */
  private async idsIn(status: Status): Promise<string[]> {
    const entries = await listDir(getStatusDir(this.workspace, status), this.config.retry);
    const ids: string[] = [];
    for (const entry of entries) {
      const id = taskIdFromFileName(entry);
      if (id) ids.push(id);
    }
    return ids.sort(byTaskNumber);
  }

  /**
   * First record, in scan order, that satisfies `predicate`.
   */
  private async findFirst(statuses: readonly Status[], predicate: (found: LocatedTask) => boolean): Promise<Task | null> {
    for (const status of statuses) {
      for (const id of await this.idsIn(status)) {
        const found = await this.readRecord(getTaskFilePath(this.workspace, status, id), status);
        if (predicate(found)) return found.task;
      }
    }
    return null;
  }

  private async collect(statuses: readonly Status[], predicate: (found: LocatedTask) => boolean = () => true): Promise<Task[]> {
    const tasks: Task[] = [];
    for (const status of statuses) {
      for (const id of await this.idsIn(status)) {
        const found = await this.readRecord(getTaskFilePath(this.workspace, status, id), status);
        if (predicate(found)) tasks.push(found.task);
      }
    }
    return tasks;
  }

  private async nextTaskId(): Promise<string> {
    let max = 0;
    for (const status of STATUSES) {
      for (const id of await this.idsIn(status)) {
        max = Math.max(max, taskNumber(id) ?? 0);
      }
    }
    const sequencePath = getSequenceFilePath(this.workspace);
    const recorded = Number.parseInt((await readTextIfExists(sequencePath, this.config.retry)) ?? '', 10);
    if (Number.isFinite(recorded)) max = Math.max(max, recorded);

    const next = max + 1;
    await writeTextAtomic(sequencePath, `${next}\n`, this.config.retry);
    return formatTaskId(next);
  }

  async createTask(title: string, description: string, options: CreateTaskOptions = {}): Promise<Task> {
    return this.mutate(async () => {
      const id = await this.nextTaskId();
      const now = this.now();
      const task: Task = {
        id,
        title: normalizeTitle(title),
        description,
        status: 'inbox',
        priority: options.priority ?? DEFAULT_PRIORITY,
        assigned: [],
        subscribers: [],
        tags: [...(options.tags ?? [])],
        created: now,
        updated: now,
        thread: [],
      };

      await this.writeRecord(getTaskFilePath(this.workspace, task.status, id), task);
      await this.activity.log(SYSTEM_AGENT, `Created task ${id}: ${task.title}`);
      return task;
    });
  }

  /**
   * Find a task in any status directory, scanning in pipeline order.
   */
  async findTask(taskId: string): Promise<Task | null> {
    const found = await this.locate(taskId);
    return found ? found.task : null;
  }

  async getTask(taskId: string): Promise<Task> {
    return (await this.locateOrThrow(taskId)).task;
  }

  private applyUpdates(task: Task, updates: TaskFieldUpdates | Readonly<Record<string, unknown>>): Task {
    const ignored = Object.keys(updates).filter(key => !UPDATABLE_FIELDS.has(key));
    if (ignored.length > 0) {
      if (this.config.unknownFields === 'reject') {
        throw new InvalidFieldError(ignored, 'not an updatable task field');
      }
      logger.warn(`Ignoring unknown or protected task field(s) on ${task.id}: ${ignored.join(', ')}`);
    }

    const parsed = fieldUpdatesSchema.safeParse(updates);
    if (!parsed.success) {
      const fields = dedupe(parsed.error.issues.map(issue => issue.path.join('.')));
      throw new InvalidFieldError(fields, parsed.error.issues[0]?.message ?? 'invalid value');
    }
    const { prd, plan, pr, ...rest } = parsed.data;

    const next: Task = { ...task };
    if (rest.title !== undefined) next.title = rest.title;
    if (rest.description !== undefined) next.description = rest.description;
    if (rest.priority !== undefined) next.priority = rest.priority;
    if (rest.tags !== undefined) next.tags = rest.tags;
    if (rest.assigned !== undefined) next.assigned = dedupe(rest.assigned);
    if (rest.subscribers !== undefined) next.subscribers = dedupe(rest.subscribers);

    // An explicit empty link clears it
    const links = { prd, plan, pr };
    for (const key of ['prd', 'plan', 'pr'] as const) {
      if (!(key in updates)) continue;
      const value = links[key];
      if (value) next[key] = value;
      else delete next[key];
    }

    // Assignees and commenters always stay subscribed
    const subscribers = [...next.subscribers];
    for (const agent of [...next.assigned, ...next.thread.map(comment => comment.agent)]) {
      if (!subscribers.includes(agent)) subscribers.push(agent);
    }
    next.subscribers = subscribers;
    next.updated = this.now();
    return next;
  }

  /**
   * Apply field updates in place. Does not change status.
   */
  async updateTask(taskId: string, updates: TaskFieldUpdates | Readonly<Record<string, unknown>>): Promise<Task> {
    return this.mutate(async () => {
      const { task, filePath } = await this.locateOrThrow(taskId);
      const next = this.applyUpdates(task, updates);
      await this.writeRecord(filePath, next);
      return next;
    });
  }

  /**
   * Relocate a task to another status directory.
   */
  async moveTask(taskId: string, newStatus: string): Promise<Task> {
    if (!isStatus(newStatus)) {
      throw new InvalidStatusError(newStatus);
    }

    return this.mutate(async () => {
      const { task, filePath } = await this.locateOrThrow(taskId);
      const oldStatus = task.status;
      if (oldStatus === newStatus) {
        logger.debug(`${taskId} is already in ${newStatus}`);
        return task;
      }

      const moved: Task = { ...task, status: newStatus, updated: this.now() };
      const newPath = getTaskFilePath(this.workspace, newStatus, taskId);

      await moveFile(filePath, newPath, this.config.retry);
      try {
        await this.writeRecord(newPath, moved);
      } catch (err) {
        await moveFile(newPath, filePath, this.config.retry);
        throw err;
      }

      await this.activity.log(SYSTEM_AGENT, `Moved ${taskId} from ${oldStatus} to ${newStatus}`);
      return moved;
    });
  }

  /**
   * Append a comment, subscribe the author and notify every other subscriber.
   */
  async addComment(taskId: string, agent: string, message: string): Promise<Task> {
    checkAgentName(agent);
    return this.mutate(async () => {
      const { task, filePath } = await this.locateOrThrow(taskId);
      const now = this.config.clock();

      const next: Task = {
        ...task,
        thread: [...task.thread, { timestamp: minuteStamp(now), agent, message }],
        subscribers: task.subscribers.includes(agent) ? task.subscribers : [...task.subscribers, agent],
        updated: now.toISOString(),
      };
      await this.writeRecord(filePath, next);
      await this.activity.log(agent, `Commented on ${taskId}`);
      await this.subscriptions.subscribe(agent, taskId, 'comment');

      const notices = next.subscribers
        .filter(subscriber => subscriber !== agent)
        .map((subscriber): NotificationInput => ({
          to: subscriber,
          from: agent,
          message: truncateMessage(message),
          taskId,
          link: filePath,
        }));
      await this.ledger.addNotifications(notices);

      return next;
    });
  }

  /**
   * Add `agent` to the assignees (and subscribers). Assigning twice changes nothing
   * but the `updated` stamp.
   */
  async assignTask(taskId: string, agent: string): Promise<Task> {
    checkAgentName(agent);
    return this.mutate(async () => {
      const { task, filePath } = await this.locateOrThrow(taskId);
      const assigned = task.assigned.includes(agent) ? task.assigned : [...task.assigned, agent];
      const next = this.applyUpdates(task, { assigned, subscribers: task.subscribers });
      await this.writeRecord(filePath, next);
      await this.subscriptions.subscribe(agent, taskId, 'assigned');
      return next;
    });
  }

  private mentionPattern(agent: string): (raw: string) => boolean {
    const needle = `@${agent}`;
    if (this.config.mentionMatch === 'substring') {
      return raw => raw.includes(needle);
    }
    const pattern = new RegExp(`(^|[^\\w@])${escapeRegExp(needle)}(?![\\w-])`, 'm');
    return raw => pattern.test(raw);
  }

  async findMentions(agent: string): Promise<Task[]> {
    const matches = this.mentionPattern(agent);
    return this.collect(STATUSES, ({ raw }) => matches(raw));
  }

  /**
   * Pick the next task for a role: assigned work first, then mentions, then
   * unassigned work in the role's status.
   */
  async findWork(role: string): Promise<Task | null> {
    const assigned = await this.findFirst(STATUSES, ({ task }) => task.assigned.includes(role));
    if (assigned) return assigned;

    const [mention] = await this.findMentions(role);
    if (mention) return mention;

    const target = statusForRole(role);
    if (!target) return null;
    return this.findFirst([target], ({ task }) => task.assigned.length === 0);
  }

  async listTasks(status?: string): Promise<Task[]> {
    if (status === undefined) return this.collect(STATUSES);
    if (!isStatus(status)) throw new InvalidStatusError(status);
    return this.collect([status]);
  }
}
