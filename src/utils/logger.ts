import fs from 'fs';

import chalk from 'chalk';
import { format } from 'date-fns';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface RunLogger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

export interface RunLoggerOptions {
  // Echo debug lines to the console too (the file always gets them)
  debug?: boolean;
  now?: () => Date;
}

export const formatLogLine = (level: LogLevel, message: string, at: Date): string =>
  `${format(at, 'yyyy-MM-dd HH:mm:ss')} | ${level.toUpperCase().padEnd(8)} | ${message}`;

/**
 * Logger for a single run: every line goes to `logFilePath` (truncated on
 * creation), INFO and above are echoed to stderr.
 */
export const createRunLogger = (logFilePath: string, options: RunLoggerOptions = {}): RunLogger => {
  const now = options.now ?? (() => new Date());
  const consoleThreshold = options.debug ? LEVEL_ORDER.debug : LEVEL_ORDER.info;

  fs.writeFileSync(logFilePath, '', 'utf8');

  const write = (level: LogLevel, message: string) => {
    const line = formatLogLine(level, message, now());
    fs.appendFileSync(logFilePath, `${line}\n`, 'utf8');
    if (LEVEL_ORDER[level] >= consoleThreshold) {
      console.error(LEVEL_COLORS[level](line));
    }
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: (message, error) => {
      write('error', message);
      if (error instanceof Error && error.stack) {
        fs.appendFileSync(logFilePath, `${error.stack}\n`, 'utf8');
      }
    },
  };
};
