import type { LockOptions, RetryOptions } from '../types/config.js';
import type {
  DeliveredNotification,
  LedgerDocument,
  Notification,
  NotificationInput,
} from '../types/notification.js';
import { readTextIfExists, writeTextAtomic } from '../utils/fs-io.js';
import { DEFAULT_LOCK, withLock } from '../utils/lock.js';
import { logger } from '../utils/logger.js';
import { getLedgerLockPath, getNotificationsPath } from '../utils/paths.js';
import { DEFAULT_RETRY } from '../utils/retry.js';
import { MalformedRecordError } from './errors.js';

const TITLE = '# Notifications';
const PENDING_HEADING = '## Pending';
const DELIVERED_HEADING = '## Delivered';
const ENTRY_PREFIX = '### @';

/** Minute-resolution stamp used for notification and comment times. */
export function minuteStamp(date: Date): string {
  return date.toISOString().slice(0, 16);
}

function singleLine(value: string): string {
  return value.replace(/\s*[\r\n]+\s*/g, ' ');
}

function serializeEntry(n: Notification): string[] {
  const lines = [
    `${ENTRY_PREFIX}${n.to}`,
    `From: ${n.from}${n.taskId ? ` (${n.taskId})` : ''}`,
    `Message: ${n.message}`,
    `Time: ${n.time}`,
  ];
  if (n.link) lines.push(`Link: ${n.link}`);
  return lines;
}

export function serializeLedger(ledger: LedgerDocument): string {
  const lines: string[] = [TITLE, '', PENDING_HEADING, ''];
  for (const n of ledger.pending) {
    lines.push(...serializeEntry(n), '');
  }
  lines.push(DELIVERED_HEADING, '');
  for (const n of ledger.delivered) {
    lines.push(...serializeEntry(n), `Delivered: ${n.delivered}`, '');
  }
  return lines.join('\n') + '\n';
}

interface DraftEntry {
  to: string;
  fields: Map<string, string>;
}

// Message is stored verbatim; every other field is trimmed
function field(draft: DraftEntry, key: string): string | undefined {
  return draft.fields.get(key)?.trim();
}

function toNotification(draft: DraftEntry): Notification | null {
  const from = field(draft, 'From');
  if (from === undefined) return null;

  const match = from.match(/^(.*?)(?:\s+\((task-\d+)\))?$/);
  const notification: Notification = {
    to: draft.to,
    from: match ? match[1] : from,
    message: draft.fields.get('Message') ?? '',
    time: field(draft, 'Time') ?? '',
  };
  if (match?.[2]) notification.taskId = match[2];
  const link = field(draft, 'Link');
  if (link) notification.link = link;
  return notification;
}

/**
 * Parse the ledger markdown. Blank lines and unrecognised lines are skipped.
 */
export function parseLedger(content: string, sourcePath: string): LedgerDocument {
  const ledger: LedgerDocument = { pending: [], delivered: [] };
  if (content.trim() === '') return ledger;

  let section: 'none' | 'pending' | 'delivered' = 'none';
  let sawPending = false;
  let draft: DraftEntry | null = null;

  const flush = () => {
    if (!draft) return;
    const notification = toNotification(draft);
    if (notification && section === 'pending') {
      ledger.pending.push(notification);
    } else if (notification && section === 'delivered') {
      ledger.delivered.push({ ...notification, delivered: field(draft, 'Delivered') ?? '' });
    }
    draft = null;
  };

  for (const rawLine of content.split('\n')) {
    const value = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const line = value.trimEnd();
    if (line === PENDING_HEADING) {
      flush();
      section = 'pending';
      sawPending = true;
    } else if (line === DELIVERED_HEADING) {
      flush();
      section = 'delivered';
    } else if (line.startsWith(ENTRY_PREFIX)) {
      flush();
      draft = { to: line.slice(ENTRY_PREFIX.length).trim(), fields: new Map() };
    } else if (draft) {
      const colon = value.indexOf(': ');
      if (colon > 0) draft.fields.set(value.slice(0, colon), value.slice(colon + 2));
    }
  }
  flush();

  if (!sawPending) {
    throw new MalformedRecordError(sourcePath, `no "${PENDING_HEADING}" section`);
  }
  return ledger;
}

/**
 * The shared notifications.md document: pending notices per agent, plus a
 * history of delivered ones.
 */
export class NotificationLedger {
  readonly filePath: string;
  private readonly lockPath: string;

  constructor(
    workspace: string,
    private readonly clock: () => Date = () => new Date(),
    private readonly lock: LockOptions = DEFAULT_LOCK,
    private readonly retry: RetryOptions = DEFAULT_RETRY,
  ) {
    this.filePath = getNotificationsPath(workspace);
    this.lockPath = getLedgerLockPath(workspace);
  }

  async readLedger(): Promise<LedgerDocument> {
    const content = await readTextIfExists(this.filePath, this.retry);
    return content === null ? { pending: [], delivered: [] } : parseLedger(content, this.filePath);
  }

  async addNotification(input: NotificationInput): Promise<Notification> {
    const [added] = await this.addNotifications([input]);
    return added;
  }

  /**
   * Insert each notification at the head of Pending, in order, in one write.
   */
  async addNotifications(inputs: NotificationInput[]): Promise<Notification[]> {
    if (inputs.length === 0) return [];
    return withLock(this.lockPath, async () => {
      const ledger = await this.readLedger();
      const time = minuteStamp(this.clock());
      const added = inputs.map((input): Notification => ({
        ...input,
        message: singleLine(input.message),
        time,
      }));
      for (const n of added) {
        ledger.pending.unshift(n);
      }
      await writeTextAtomic(this.filePath, serializeLedger(ledger), this.retry);
      logger.debug(`Queued ${added.length} notification(s): ${added.map(n => `@${n.to}`).join(', ')}`);
      return added;
    }, this.lock);
  }

  async getNotifications(agent: string): Promise<Notification[]> {
    const ledger = await this.readLedger();
    return ledger.pending.filter(n => n.to === agent);
  }

  /**
   * Move every pending notice for `agent` to Delivered. No-op when there are none.
   */
  async markDelivered(agent: string): Promise<DeliveredNotification[]> {
    return withLock(this.lockPath, async () => {
      const ledger = await this.readLedger();
      const mine = ledger.pending.filter(n => n.to === agent);
      if (mine.length === 0) return [];

      const delivered = minuteStamp(this.clock());
      const moved = mine.map((n): DeliveredNotification => ({ ...n, delivered }));
      ledger.pending = ledger.pending.filter(n => n.to !== agent);
      ledger.delivered.push(...moved);

      await writeTextAtomic(this.filePath, serializeLedger(ledger), this.retry);
      return moved;
    }, this.lock);
  }
}
