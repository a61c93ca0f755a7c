import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.TRACEGRAPH_LOG_LEVEL?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

const TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('debug'),
  info: chalk.cyan('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
};

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  // stdout carries command output (e.g. `export --format json`); logs go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  const line = `${TAGS[level]} ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
