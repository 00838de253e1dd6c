import { z } from 'zod';
import type { LockOptions, RetryOptions } from '../types/config.js';
import type { SubscriptionMap } from '../types/notification.js';
import { readTextIfExists, writeTextAtomic } from '../utils/fs-io.js';
import { DEFAULT_LOCK, withLock } from '../utils/lock.js';
import { logger } from '../utils/logger.js';
import { getSubscriptionsLockPath, getSubscriptionsPath } from '../utils/paths.js';
import { DEFAULT_RETRY } from '../utils/retry.js';
import { MalformedRecordError } from './errors.js';

const subscriptionFileSchema = z.record(
  z.object({
    subscribed_at: z.string(),
    reason: z.string(),
  }),
);

export const DEFAULT_SUBSCRIPTION_REASON = 'interaction';

/**
 * Per-agent subscription records, stored in agents/<agent>/subscriptions.json.
 */
export class SubscriptionIndex {
  constructor(
    private readonly workspace: string,
    private readonly clock: () => Date = () => new Date(),
    private readonly lock: LockOptions = DEFAULT_LOCK,
    private readonly retry: RetryOptions = DEFAULT_RETRY,
  ) {}

  async getSubscriptions(agent: string): Promise<SubscriptionMap> {
    const filePath = getSubscriptionsPath(this.workspace, agent);
    const content = await readTextIfExists(filePath, this.retry);
    if (content === null) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new MalformedRecordError(filePath, 'not valid JSON');
    }
    const result = subscriptionFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedRecordError(filePath, result.error.issues[0]?.message ?? 'unexpected shape');
    }
    return result.data;
  }

  async isSubscribed(agent: string, taskId: string): Promise<boolean> {
    const subscriptions = await this.getSubscriptions(agent);
    return Object.hasOwn(subscriptions, taskId);
  }

  /**
   * Subscribe `agent` to `taskId`. An existing subscription is left untouched.
   * Returns true when a new entry was written.
   */
  async subscribe(agent: string, taskId: string, reason: string = DEFAULT_SUBSCRIPTION_REASON): Promise<boolean> {
    return withLock(getSubscriptionsLockPath(this.workspace, agent), async () => {
      const subscriptions = await this.getSubscriptions(agent);
      if (Object.hasOwn(subscriptions, taskId)) return false;

      subscriptions[taskId] = {
        subscribed_at: this.clock().toISOString(),
        reason,
      };
      const filePath = getSubscriptionsPath(this.workspace, agent);
      await writeTextAtomic(filePath, JSON.stringify(subscriptions, null, 2) + '\n', this.retry);
      logger.debug(`${agent} subscribed to ${taskId} (${reason})`);
      return true;
    }, this.lock);
  }
}
