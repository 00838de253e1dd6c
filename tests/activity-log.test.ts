import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ActivityLog } from '../src/core/activity-log.js';

let workspace: string;

beforeEach(async () => {
  workspace = await mkdtemp(join(tmpdir(), 'taskboard-activity-test-'));
});

afterEach(async () => {
  await rm(workspace, { recursive: true, force: true });
});

describe('ActivityLog', () => {
  it('should append one line per event with newlines folded', async () => {
    const activity = new ActivityLog(workspace, () => new Date('2026-10-18T09:30:00.000Z'), { retries: 0, baseDelayMs: 1 });

    await activity.log('system', 'Created task task-001: Add login');
    await activity.log('qa', 'Found\r\ntwo issues');

    expect(activity.filePath).toBe(join(workspace, 'activity.log'));
    expect(await readFile(activity.filePath, 'utf-8')).toBe(
      '2026-10-18T09:30:00.000Z | system | Created task task-001: Add login\n' +
        '2026-10-18T09:30:00.000Z | qa | Found two issues\n',
    );
  });
});
