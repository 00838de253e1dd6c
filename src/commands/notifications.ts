import { logger } from '../utils/logger.js';
import { runWithBoard, type GlobalOptions } from './context.js';
import { formatNotification } from './format.js';

export async function notificationsCommand(globals: GlobalOptions, agent: string, options: { ack?: boolean }): Promise<void> {
  await runWithBoard(globals, async ({ ledger }) => {
    const pending = options.ack ? await ledger.markDelivered(agent) : await ledger.getNotifications(agent);
    if (pending.length === 0) {
      logger.dim(`No pending notifications for @${agent}.`);
      return;
    }
    for (const n of pending) logger.info(formatNotification(n));

    if (options.ack) {
      logger.success(`Marked ${pending.length} notification(s) delivered.`);
    }
  });
}

export async function subscribeCommand(globals: GlobalOptions, agent: string, taskId: string, options: { reason?: string }): Promise<void> {
  await runWithBoard(globals, async ({ store, subscriptions }) => {
    // Only existing tasks can be subscribed to
    await store.getTask(taskId);
    const added = await subscriptions.subscribe(agent, taskId, options.reason);
    if (added) {
      logger.success(`${agent} subscribed to ${taskId}`);
    } else {
      logger.dim(`${agent} is already subscribed to ${taskId}`);
    }
  });
}
