// Console logging for the command-line tool
// Library modules report through warnings and thrown errors instead of logging.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

export function logInfo(...args: unknown[]): void {
  if (enabled('info')) console.log(colors.green + '[info]', ...args, colors.reset);
}

export function logWarn(...args: unknown[]): void {
  if (enabled('warn')) console.warn(colors.yellow + '[warn]', ...args, colors.reset);
}

export function logError(...args: unknown[]): void {
  if (enabled('error')) console.error(colors.red + '[error]', ...args, colors.reset);
}

export function logDebug(...args: unknown[]): void {
  if (enabled('debug')) console.log(colors.cyan + '[debug]', ...args, colors.reset);
}
