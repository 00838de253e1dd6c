import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MalformedRecordError } from '../src/core/errors.js';
import { minuteStamp, NotificationLedger, parseLedger, serializeLedger } from '../src/core/notification-ledger.js';
import type { LedgerDocument } from '../src/types/notification.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

const LOCK = { staleMs: 60_000, pollIntervalMs: 5, maxWaitMs: 5_000 };
const RETRY = { retries: 0, baseDelayMs: 1 };

let workspace: string;
let now: Date;
let ledger: NotificationLedger;

beforeEach(async () => {
  workspace = await mkdtemp(join(tmpdir(), 'taskboard-ledger-test-'));
  now = new Date('2026-10-18T09:30:00.000Z');
  ledger = new NotificationLedger(workspace, () => now, LOCK, RETRY);
});

afterEach(async () => {
  await rm(workspace, { recursive: true, force: true });
});

describe('minuteStamp', () => {
  it('should drop seconds and the zone suffix', () => {
    expect(minuteStamp(new Date('2026-10-18T09:30:59.999Z'))).toBe('2026-10-18T09:30');
  });
});

describe('serializeLedger', () => {
  it('should write the empty skeleton', () => {
    expect(serializeLedger({ pending: [], delivered: [] })).toBe('# Notifications\n\n## Pending\n\n## Delivered\n\n');
  });

  it('should be read back by parseLedger', () => {
    const doc: LedgerDocument = {
      pending: [
        { to: 'qa', from: 'engineer', message: 'Ready', time: '2026-10-18T09:30', taskId: 'task-002', link: 'tasks/in-qa/task-002.md' },
        { to: 'pm', from: 'system', message: 'Daily summary', time: '2026-10-18T08:00' },
      ],
      delivered: [
        { to: 'architect', from: 'pm', message: 'Plan it', time: '2026-10-17T10:00', taskId: 'task-001', delivered: '2026-10-17T10:05' },
      ],
    };
    expect(parseLedger(serializeLedger(doc), 'notifications.md')).toEqual(doc);
  });
});

describe('parseLedger', () => {
  it('should read a hand-written document', () => {
    const content = [
      '# Notifications',
      '',
      '## Pending',
      '',
      '### @engineer',
      'From: pm (task-007)',
      'Message: Please pick this up',
      'Time: 2026-10-01T08:00',
      'Link: workspace/tasks/inbox/task-007.md',
      'Note: ignored',
      '### @qa',
      'From: system',
      'Message: Nightly build finished',
      'Time: 2026-10-01T09:00',
      '',
      '## Delivered',
      '',
      '### @pm',
      'From: engineer (task-003)',
      'Message: Done',
      'Time: 2026-09-30T17:00',
      'Delivered: 2026-09-30T17:05',
    ].join('\n');

    expect(parseLedger(content, 'notifications.md')).toEqual({
      pending: [
        {
          to: 'engineer',
          from: 'pm',
          message: 'Please pick this up',
          time: '2026-10-01T08:00',
          taskId: 'task-007',
          link: 'workspace/tasks/inbox/task-007.md',
        },
        { to: 'qa', from: 'system', message: 'Nightly build finished', time: '2026-10-01T09:00' },
      ],
      delivered: [
        { to: 'pm', from: 'engineer', message: 'Done', time: '2026-09-30T17:00', taskId: 'task-003', delivered: '2026-09-30T17:05' },
      ],
    });
  });

  it('should only read a task id from a parenthesised task reference', () => {
    const content = [
      '## Pending',
      '### @qa',
      'From: release bot (nightly)',
      'Message:   indented summary',
      'Time: 2026-10-01T09:00',
    ].join('\n');

    expect(parseLedger(content, 'notifications.md').pending).toEqual([
      { to: 'qa', from: 'release bot (nightly)', message: '  indented summary', time: '2026-10-01T09:00' },
    ]);
  });

  it('should treat an empty document as an empty ledger', () => {
    expect(parseLedger('\n\n', 'notifications.md')).toEqual({ pending: [], delivered: [] });
  });

  it('should reject a document without a Pending section', () => {
    expect(() => parseLedger('# Notifications\n\nrandom text\n', 'notifications.md')).toThrow(MalformedRecordError);
    expect(() => parseLedger('# Notifications\n\nrandom text\n', 'notifications.md')).toThrow(
      'Malformed record notifications.md: no "## Pending" section',
    );
  });
});

describe('NotificationLedger', () => {
  it('should treat a missing file as an empty ledger', async () => {
    expect(await ledger.readLedger()).toEqual({ pending: [], delivered: [] });
    expect(await ledger.getNotifications('qa')).toEqual([]);
    expect(await ledger.markDelivered('qa')).toEqual([]);
    expect(existsSync(ledger.filePath)).toBe(false);
  });

  it('should write a notification with a single-line message', async () => {
    const added = await ledger.addNotification({ to: 'qa', from: 'engineer', message: 'Ready\n  for test', taskId: 'task-001' });

    expect(added).toEqual({ to: 'qa', from: 'engineer', message: 'Ready for test', taskId: 'task-001', time: '2026-10-18T09:30' });
    expect(await readFile(join(workspace, 'notifications.md'), 'utf-8')).toBe(
      [
        '# Notifications',
        '',
        '## Pending',
        '',
        '### @qa',
        'From: engineer (task-001)',
        'Message: Ready for test',
        'Time: 2026-10-18T09:30',
        '',
        '## Delivered',
        '',
        '',
      ].join('\n'),
    );
  });

  it('should keep a direct notification intact when read back', async () => {
    const added = await ledger.addNotification({ to: 'pm', from: 'ops (on call)', message: '  leading spaces\rand a CR' });

    expect(added.message).toBe('  leading spaces and a CR');
    expect(await ledger.getNotifications('pm')).toEqual([added]);
  });

  it('should insert new notifications at the head of Pending', async () => {
    await ledger.addNotification({ to: 'qa', from: 'pm', message: 'first' });
    await ledger.addNotifications([
      { to: 'qa', from: 'pm', message: 'second' },
      { to: 'engineer', from: 'pm', message: 'third' },
    ]);

    const { pending } = await ledger.readLedger();
    expect(pending.map(n => n.message)).toEqual(['third', 'second', 'first']);
    expect((await ledger.getNotifications('qa')).map(n => n.message)).toEqual(['second', 'first']);
  });

  it('should move only the agent\'s notices to Delivered', async () => {
    await ledger.addNotification({ to: 'qa', from: 'pm', message: 'first' });
    await ledger.addNotification({ to: 'pm', from: 'qa', message: 'other' });
    await ledger.addNotification({ to: 'qa', from: 'engineer', message: 'second' });
    now = new Date('2026-10-18T09:45:10.000Z');

    const delivered = await ledger.markDelivered('qa');

    expect(delivered.map(n => [n.message, n.delivered])).toEqual([
      ['second', '2026-10-18T09:45'],
      ['first', '2026-10-18T09:45'],
    ]);
    const doc = await ledger.readLedger();
    expect(doc.pending.map(n => n.message)).toEqual(['other']);
    expect(doc.delivered.map(n => n.message)).toEqual(['second', 'first']);
  });

  it('should append later deliveries after earlier ones', async () => {
    await ledger.addNotification({ to: 'qa', from: 'pm', message: 'for qa' });
    await ledger.addNotification({ to: 'pm', from: 'qa', message: 'for pm' });

    await ledger.markDelivered('qa');
    await ledger.markDelivered('pm');

    const doc = await ledger.readLedger();
    expect(doc.pending).toEqual([]);
    expect(doc.delivered.map(n => n.to)).toEqual(['qa', 'pm']);
  });

  it('should leave the file untouched when nothing is pending', async () => {
    await ledger.addNotification({ to: 'qa', from: 'pm', message: 'hello' });
    await ledger.markDelivered('qa');
    const before = await readFile(ledger.filePath, 'utf-8');

    expect(await ledger.markDelivered('qa')).toEqual([]);
    expect(await readFile(ledger.filePath, 'utf-8')).toBe(before);
  });

  it('should refuse to overwrite a malformed ledger', async () => {
    await writeFile(ledger.filePath, 'this is not a ledger\n');
    await expect(ledger.addNotification({ to: 'qa', from: 'pm', message: 'hello' })).rejects.toBeInstanceOf(MalformedRecordError);
    expect(await readFile(ledger.filePath, 'utf-8')).toBe('this is not a ledger\n');
  });

  it('should keep every notification added concurrently', async () => {
    await Promise.all(
      ['a', 'b', 'c', 'd'].map(message => ledger.addNotification({ to: 'qa', from: 'pm', message })),
    );
    const pending = await ledger.getNotifications('qa');
    expect(pending.map(n => n.message).sort()).toEqual(['a', 'b', 'c', 'd']);
  });
});
