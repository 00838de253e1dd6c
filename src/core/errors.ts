export type TaskBoardErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATUS'
  | 'MALFORMED_RECORD'
  | 'IO_FAILURE'
  | 'INVALID_FIELD'
  | 'LOCK_TIMEOUT';

/**
 * Base class for every error the board raises on purpose.
 */
export class TaskBoardError extends Error {
  constructor(
    message: string,
    public readonly code: TaskBoardErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TaskBoardError';
    Object.setPrototypeOf(this, TaskBoardError.prototype);
  }
}

/**
 * No record for the task id exists under any status directory.
 */
export class NotFoundError extends TaskBoardError {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InvalidStatusError extends TaskBoardError {
  constructor(public readonly status: string) {
    super(`Invalid status: ${status}`, 'INVALID_STATUS');
    this.name = 'InvalidStatusError';
    Object.setPrototypeOf(this, InvalidStatusError.prototype);
  }
}

/**
 * A record, ledger or subscription file could not be parsed.
 */
export class MalformedRecordError extends TaskBoardError {
  constructor(
    public readonly filePath: string,
    public readonly reason: string,
  ) {
    super(`Malformed record ${filePath}: ${reason}`, 'MALFORMED_RECORD');
    this.name = 'MalformedRecordError';
    Object.setPrototypeOf(this, MalformedRecordError.prototype);
  }
}

export class IOFailureError extends TaskBoardError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly errno: string | undefined,
    cause?: unknown,
  ) {
    super(message, 'IO_FAILURE', { cause });
    this.name = 'IOFailureError';
    Object.setPrototypeOf(this, IOFailureError.prototype);
  }
}

export class InvalidFieldError extends TaskBoardError {
  constructor(
    public readonly fields: string[],
    detail: string,
  ) {
    super(`Invalid field update (${fields.join(', ')}): ${detail}`, 'INVALID_FIELD');
    this.name = 'InvalidFieldError';
    Object.setPrototypeOf(this, InvalidFieldError.prototype);
  }
}

export class LockTimeoutError extends TaskBoardError {
  constructor(
    public readonly lockPath: string,
    waitedMs: number,
  ) {
    super(
      `Could not acquire lock at ${lockPath} after ${waitedMs / 1000}s. ` +
        'Another taskboard process may be running. Remove the lock file manually if this is an error.',
      'LOCK_TIMEOUT',
    );
    this.name = 'LockTimeoutError';
    Object.setPrototypeOf(this, LockTimeoutError.prototype);
  }
}

export function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
