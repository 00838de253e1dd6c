// Pipeline order, followed by the blocked side-state. Also the directory scan order.
export const STATUSES = [
  'inbox',
  'in-discovery',
  'in-planning',
  'ready-to-build',
  'in-progress',
  'ready-for-testing',
  'in-qa',
  'ready-to-deploy',
  'deployed',
  'blocked',
] as const;

export const PRIORITIES = ['P0', 'P1', 'P2', 'P3'] as const;

export const DEFAULT_PRIORITY = 'P2';

export const AGENT_ROLES = ['pm', 'architect', 'engineer', 'qa', 'security', 'devops'] as const;

// Role -> status directory searched for unassigned work
export const ROLE_STATUS_MAP = {
  pm: 'inbox',
  architect: 'in-planning',
  engineer: 'ready-to-build',
  qa: 'ready-for-testing',
  security: 'in-progress', // reviews ongoing work
  devops: 'ready-to-deploy',
} as const;

// Actor recorded for store-initiated activity
export const SYSTEM_AGENT = 'system';

// Comment-sourced notification messages are cut to this many characters
export const NOTIFICATION_MESSAGE_LIMIT = 100;

export const DEFAULT_WORKSPACE = 'workspace';

export const WORKSPACE_ENV = 'TASKBOARD_WORKSPACE';

export const LOG_LEVEL_ENV = 'TASKBOARD_LOG_LEVEL';

export const CONFIG_FILE = 'taskboard.json';

// Lock file handling
export const LOCK_STALE_MS = 2 * 60 * 1000;
export const LOCK_POLL_INTERVAL_MS = 100;
export const LOCK_MAX_WAIT_MS = 30 * 1000;

// Max retry attempts for transient I/O failures
export const MAX_RETRIES = 3;

// Base delay for exponential backoff (ms)
export const BASE_RETRY_DELAY_MS = 50;

export const TRANSIENT_IO_CODES: ReadonlySet<string> = new Set([
  'EAGAIN',
  'EBUSY',
  'EMFILE',
  'ENFILE',
  'ETIMEDOUT',
]);

// Default debounce interval for watch mode (ms)
export const DEFAULT_DEBOUNCE_MS = 300;
