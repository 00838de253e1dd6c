import chalk from 'chalk';
import { LOG_LEVEL_ENV } from '../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env[LOG_LEVEL_ENV];
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

let currentLevel: LogLevel = initialLevel();

function enabled(level: LogLevel): boolean {
  return currentLevel !== 'silent' && LEVELS.indexOf(level) >= LEVELS.indexOf(currentLevel);
}

export const logger = {
  info(message: string): void {
    if (enabled('info')) console.log(message);
  },

  success(message: string): void {
    if (enabled('info')) console.log(chalk.green(`✓ ${message}`));
  },

  warn(message: string): void {
    if (enabled('warn')) console.error(chalk.yellow(`⚠ ${message}`));
  },

  error(message: string): void {
    if (enabled('error')) console.error(chalk.red(`✗ ${message}`));
  },

  debug(message: string): void {
    if (enabled('debug')) console.log(chalk.gray(`[debug] ${message}`));
  },

  dim(message: string): void {
    if (enabled('info')) console.log(chalk.dim(message));
  },

  setLevel(level: LogLevel): void {
    currentLevel = level;
  },
};
