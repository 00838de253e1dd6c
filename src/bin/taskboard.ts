#!/usr/bin/env node
import { main } from '../cli.js';
import { logger } from '../utils/logger.js';

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
