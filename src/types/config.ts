export type MentionMatch = 'substring' | 'token';

export type UnknownFieldPolicy = 'ignore' | 'reject';

export interface LockOptions {
  staleMs: number;
  pollIntervalMs: number;
  maxWaitMs: number;
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
}

export interface BoardConfig {
  workspace: string;
  mentionMatch: MentionMatch;
  unknownFields: UnknownFieldPolicy;
  lock: LockOptions;
  retry: RetryOptions;
  clock: () => Date;
}

/** Everything a caller may override; nested option groups merge field by field. */
export interface BoardConfigOverrides {
  workspace?: string;
  mentionMatch?: MentionMatch;
  unknownFields?: UnknownFieldPolicy;
  lock?: Partial<LockOptions>;
  retry?: Partial<RetryOptions>;
  clock?: () => Date;
}
