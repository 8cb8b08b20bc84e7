type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const emit = (level: 'info' | 'warn' | 'error' | 'debug', message: string, context?: LogContext): void => {
  // Hosts embed this engine in CLIs and servers that own stdout; every log line
  // goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

/**
 * Injectable logger. Components take one of these instead of calling the
 * module functions directly so hosts can redirect or silence them.
 */
export interface Logger {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
}

export const defaultLogger: Logger = {
  info: logInfo,
  warn: logWarning,
  error: logError,
  debug: logDebug,
};

const noop: LoggerFn = () => {};

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

export type { LogContext, LoggerFn };
