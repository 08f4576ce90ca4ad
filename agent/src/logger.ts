/**
 * Module logger for agent runs, tool dispatch and transports.
 * Console lines are colored with chalk; a bounded history is kept in memory
 * so callers can inspect what happened during a run.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console threshold; `silent` suppresses console output but keeps history.
 */
export type ConsoleLogLevel = LogLevel | 'silent';

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  stage: string;
  message: string;
  data?: unknown;
};

const logLevels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
const consoleLevels: ConsoleLogLevel[] = [...logLevels, 'silent'];
const logs: LogEntry[] = [];
let maxLogs = 1000;
let minLogLevelIndex = 0;
let consoleMinLogLevelIndex = consoleLevels.indexOf('info');

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.blue,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

function formatLogMessage(
  level: LogLevel,
  stage: string,
  message: string,
  timestamp: string,
): string {
  const levelFormatted = levelColors[level](`[${level.toUpperCase()}]`);
  return `${chalk.gray(timestamp)} ${chalk.cyan(`[${stage}]`)} ${levelFormatted} ${message}`;
}

/**
 * Log a message at the specified level.
 */
export function log(
  level: LogLevel,
  stage: string,
  message: string,
  data?: unknown,
): void {
  const levelIndex = logLevels.indexOf(level);
  const timestamp = new Date().toISOString();

  if (levelIndex >= minLogLevelIndex) {
    logs.push({ timestamp, level, stage, message, data });
    if (logs.length > maxLogs) {
      logs.shift();
    }
  }

  if (levelIndex < consoleMinLogLevelIndex) {
    return;
  }

  const formattedMessage = formatLogMessage(level, stage, message, timestamp);
  if (data !== undefined) {
    console[level](formattedMessage, data);
  } else {
    console[level](formattedMessage);
  }
}

/**
 * Configure history size and thresholds.
 */
export function configureLogger(options: {
  maxHistorySize?: number;
  minLevel?: LogLevel;
  consoleLevel?: ConsoleLogLevel;
} = {}): void {
  if (options.maxHistorySize !== undefined && options.maxHistorySize > 0) {
    maxLogs = options.maxHistorySize;
    while (logs.length > maxLogs) {
      logs.shift();
    }
  }
  if (options.minLevel !== undefined) {
    minLogLevelIndex = logLevels.indexOf(options.minLevel);
  }
  if (options.consoleLevel !== undefined) {
    consoleMinLogLevelIndex = consoleLevels.indexOf(options.consoleLevel);
  }
}

export const Logger = {
  debug: (stage: string, message: string, data?: unknown) =>
    log('debug', stage, message, data),
  info: (stage: string, message: string, data?: unknown) =>
    log('info', stage, message, data),
  warn: (stage: string, message: string, data?: unknown) =>
    log('warn', stage, message, data),
  error: (stage: string, message: string, data?: unknown) =>
    log('error', stage, message, data),
};

export function getLogs(): LogEntry[] {
  return [...logs];
}

export function clearLogs(): void {
  logs.length = 0;
}
