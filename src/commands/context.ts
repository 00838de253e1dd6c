import { openTaskBoard, type TaskBoard } from '../core/board.js';
import { TaskBoardError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export interface GlobalOptions {
  workspace?: string;
  verbose?: boolean;
}

/**
 * Open the board for a command. Board errors are reported and turn into a
 * non-zero exit code; anything else propagates.
 */
export async function runWithBoard(globals: GlobalOptions, fn: (board: TaskBoard) => Promise<void>): Promise<void> {
  if (globals.verbose) logger.setLevel('debug');
  try {
    const board = await openTaskBoard({ workspace: globals.workspace });
    await fn(board);
  } catch (err) {
    if (err instanceof TaskBoardError) {
      logger.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
