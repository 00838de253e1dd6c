import type { RetryOptions } from '../types/config.js';
import { appendText } from '../utils/fs-io.js';
import { getActivityLogPath } from '../utils/paths.js';
import { DEFAULT_RETRY } from '../utils/retry.js';

/**
 * Append-only activity feed: one `<timestamp> | <agent> | <message>` line per event.
 */
export class ActivityLog {
  readonly filePath: string;

  constructor(
    workspace: string,
    private readonly clock: () => Date = () => new Date(),
    private readonly retry: RetryOptions = DEFAULT_RETRY,
  ) {
    this.filePath = getActivityLogPath(workspace);
  }

  async log(agent: string, message: string): Promise<void> {
    const line = `${this.clock().toISOString()} | ${agent} | ${message.replace(/\r?\n/g, ' ')}\n`;
    await appendText(this.filePath, line, this.retry);
  }
}
