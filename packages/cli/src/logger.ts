import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'info' | 'debug' | 'trace';

const LEVEL_VERBOSITY: Record<LogLevel, number> = {
  info: 1,
  debug: 2,
  trace: 3,
};

const LEVEL_COLOR: Record<LogLevel, ChalkInstance> = {
  info: chalk.cyan,
  debug: chalk.magenta,
  trace: chalk.gray,
};

let verbosity = 0;

/**
 * 0 logs nothing, 1 adds info, 2 adds debug and 3 or more adds trace.
 */
export function setVerbosity(level: number): void {
  verbosity = level;
}

export function getVerbosity(): number {
  return verbosity;
}

export function isLogEnabled(level: LogLevel): boolean {
  return verbosity >= LEVEL_VERBOSITY[level];
}

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  const label = LEVEL_COLOR[level](level.toUpperCase().padEnd(5));
  return `${chalk.gray(now.toISOString())} ${label} ${message}`;
}

function log(level: LogLevel, message: string): void {
  if (isLogEnabled(level)) {
    console.error(formatLogLine(level, message));
  }
}

export const logger = {
  info: (message: string): void => log('info', message),
  debug: (message: string): void => log('debug', message),
  trace: (message: string): void => log('trace', message),
};
