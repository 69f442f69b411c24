import chalk from 'chalk';
import { LogLevel } from './types';
import {
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV_VAR,
  LOG_PREFIX,
} from './constants';

export type LogEntry = {
  title: string;
  level: LogLevel;
  details?: string[];
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

/**
 * Reads the threshold on every call so tests can flip
 * GRAPHQL_TEST_LOG_LEVEL without reloading the module.
 */
export const getLogLevel = (): LogLevel => {
  const configured = process.env[LOG_LEVEL_ENV_VAR];
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return DEFAULT_LOG_LEVEL;
};

export const isLevelEnabled = (level: LogLevel) =>
  LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(getLogLevel());

const colorTitle = (level: LogLevel, title: string) => {
  switch (level) {
    case 'error':
      return chalk.red(title);
    case 'warn':
      return chalk.yellow(title);
    case 'info':
      return chalk.cyan(title);
    default:
      return chalk.gray(title);
  }
};

export const log = ({ title, level, details = [] }: LogEntry) => {
  if (!isLevelEnabled(level)) {
    return;
  }

  const message = [
    colorTitle(level, `${LOG_PREFIX} ${title}`),
    ...details.map(detail => chalk.gray(detail)),
  ].join('\n');

  switch (level) {
    case 'error':
      console.error(message);
      break;
    case 'warn':
      console.warn(message);
      break;
    case 'info':
      console.info(message);
      break;
    default:
      console.debug(message);
  }
};
