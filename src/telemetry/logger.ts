type LogContext = Record<string, unknown>;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

type LoggerFn = (message: string, context?: LogContext) => void;

let debugEnabled = process.env.DOCSHELF_DEBUG === '1';

/** Debug lines are dropped unless `--verbose` or `DOCSHELF_DEBUG=1` turned them on. */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (level === 'debug' && !debugEnabled) return;
  // stdout carries command output (including `--json` documents); logs go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  const line = `[docshelf] ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
