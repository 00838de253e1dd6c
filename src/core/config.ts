import { z } from 'zod';
import { CONFIG_FILE, DEFAULT_WORKSPACE, WORKSPACE_ENV } from '../constants.js';
import type { BoardConfig, BoardConfigOverrides } from '../types/config.js';
import { readTextIfExists } from '../utils/fs-io.js';
import { DEFAULT_LOCK } from '../utils/lock.js';
import { logger } from '../utils/logger.js';
import { getConfigFilePath } from '../utils/paths.js';
import { DEFAULT_RETRY } from '../utils/retry.js';
import { MalformedRecordError } from './errors.js';

const configFileSchema = z
  .object({
    mentionMatch: z.enum(['substring', 'token']),
    unknownFields: z.enum(['ignore', 'reject']),
    lock: z
      .object({
        staleMs: z.number().int().positive(),
        pollIntervalMs: z.number().int().positive(),
        maxWaitMs: z.number().int().nonnegative(),
      })
      .strict()
      .partial(),
    retry: z
      .object({
        retries: z.number().int().nonnegative(),
        baseDelayMs: z.number().int().nonnegative(),
      })
      .strict()
      .partial(),
  })
  .strict()
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

export function resolveWorkspace(explicit?: string): string {
  return explicit ?? process.env[WORKSPACE_ENV] ?? DEFAULT_WORKSPACE;
}

/**
 * Merge defaults, a config file's settings and explicit overrides (in that order).
 */
export function buildBoardConfig(workspace: string, ...layers: Array<ConfigFile | BoardConfigOverrides>): BoardConfig {
  const config: BoardConfig = {
    workspace,
    mentionMatch: 'substring',
    unknownFields: 'ignore',
    lock: { ...DEFAULT_LOCK },
    retry: { ...DEFAULT_RETRY },
    clock: () => new Date(),
  };
  for (const layer of layers) {
    if (layer.mentionMatch) config.mentionMatch = layer.mentionMatch;
    if (layer.unknownFields) config.unknownFields = layer.unknownFields;
    if (layer.lock) config.lock = { ...config.lock, ...layer.lock };
    if (layer.retry) config.retry = { ...config.retry, ...layer.retry };
    if ('clock' in layer && layer.clock) config.clock = layer.clock;
  }
  return config;
}

/**
 * Read <workspace>/taskboard.json, if present.
 */
export async function readConfigFile(workspace: string): Promise<ConfigFile> {
  const filePath = getConfigFilePath(workspace, CONFIG_FILE);
  const content = await readTextIfExists(filePath);
  if (content === null) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new MalformedRecordError(filePath, 'not valid JSON');
  }
  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MalformedRecordError(filePath, issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid config');
  }
  logger.debug(`Loaded config from ${filePath}`);
  return result.data;
}

export async function loadBoardConfig(overrides: BoardConfigOverrides = {}): Promise<BoardConfig> {
  const workspace = resolveWorkspace(overrides.workspace);
  const fromFile = await readConfigFile(workspace);
  return buildBoardConfig(workspace, fromFile, overrides);
}
