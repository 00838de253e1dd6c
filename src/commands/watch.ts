import chokidar from 'chokidar';
import { DEFAULT_DEBOUNCE_MS } from '../constants.js';
import type { NotificationLedger } from '../core/notification-ledger.js';
import type { Notification } from '../types/notification.js';
import { logger } from '../utils/logger.js';
import { runWithBoard, type GlobalOptions } from './context.js';
import { formatNotification } from './format.js';

function notificationKey(n: Notification): string {
  return [n.time, n.from, n.taskId ?? '', n.message].join('\u0000');
}

/**
 * Report pending notifications for `agent` that have not been reported yet.
 * With `ack`, whatever gets marked delivered is what gets reported.
 * `seen` is updated in place.
 */
export async function reportNewNotifications(
  ledger: NotificationLedger,
  agent: string,
  seen: Set<string>,
  ack: boolean,
): Promise<Notification[]> {
  const pending = ack ? await ledger.markDelivered(agent) : await ledger.getNotifications(agent);
  const fresh = pending.filter(n => !seen.has(notificationKey(n)));
  for (const n of fresh) {
    seen.add(notificationKey(n));
    logger.info(formatNotification(n));
  }
  return fresh;
}

export async function watchCommand(
  globals: GlobalOptions,
  agent: string,
  options: { debounce?: number; ack?: boolean },
): Promise<void> {
  await runWithBoard(globals, async ({ ledger }) => {
    const debounceMs = options.debounce ?? DEFAULT_DEBOUNCE_MS;
    const ack = options.ack ?? false;
    const seen = new Set<string>();

    logger.info(`Watching notifications for @${agent}: ${ledger.filePath}`);
    logger.dim('Press Ctrl+C to stop.');
    await reportNewNotifications(ledger, agent, seen, ack);

    let debounceTimer: ReturnType<typeof setTimeout> | null = null;
    let isChecking = false;

    const check = async () => {
      if (isChecking) return;
      isChecking = true;
      try {
        await reportNewNotifications(ledger, agent, seen, ack);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Failed to read notifications: ${message}`);
      } finally {
        isChecking = false;
      }
    };

    const debouncedCheck = () => {
      if (debounceTimer) {
        clearTimeout(debounceTimer);
      }
      debounceTimer = setTimeout(() => void check(), debounceMs);
    };

    // The ledger is replaced by rename, so watch for add as well as change
    const watcher = chokidar.watch(ledger.filePath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 100 },
    });

    watcher.on('add', debouncedCheck);
    watcher.on('change', debouncedCheck);

    const shutdown = async () => {
      logger.info('Shutting down watcher...');
      if (debounceTimer) {
        clearTimeout(debounceTimer);
      }
      await watcher.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  });
}
