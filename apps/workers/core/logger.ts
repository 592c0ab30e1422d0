export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

function resolveLevel(raw: string | undefined): LogLevel {
  switch ((raw || '').toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);

// Structured logging interface
export interface LogContext {
  module?: string;
  scanId?: string;
  channel?: string;
  action?: string;
  duration?: number;
  error?: unknown;
  [key: string]: unknown;
}

export function formatMessage(level: string, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  let logLine = `[${timestamp}] [${level}]`;

  if (context?.module) {
    logLine += ` [${context.module}]`;
  }

  if (context?.scanId) {
    logLine += ` [scan:${context.scanId}]`;
  }

  if (context?.channel) {
    logLine += ` [channel:${context.channel}]`;
  }

  logLine += ` ${message}`;

  if (context?.duration !== undefined) {
    logLine += ` (${context.duration}ms)`;
  }

  return logLine;
}

export function debug(message: string, context?: LogContext) {
  if (LOG_LEVEL <= LogLevel.DEBUG) {
    console.log(formatMessage('DEBUG', message, context));
  }
}

export function info(message: string, context?: LogContext) {
  if (LOG_LEVEL <= LogLevel.INFO) {
    console.log(formatMessage('INFO', message, context));
  }
}

export function warn(message: string, context?: LogContext) {
  if (LOG_LEVEL <= LogLevel.WARN) {
    console.warn(formatMessage('WARN', message, context));
  }
}

export function error(message: string, context?: LogContext) {
  console.error(formatMessage('ERROR', message, context));

  if (context?.error instanceof Error) {
    console.error(context.error.stack || context.error.message);
  } else if (context?.error !== undefined) {
    console.error(String(context.error));
  }
}

/**
 * Binds a module name so call sites only pass what varies.
 */
export function moduleLogger(module: string) {
  return {
    debug: (message: string, context?: LogContext) => debug(message, { module, ...context }),
    info: (message: string, context?: LogContext) => info(message, { module, ...context }),
    warn: (message: string, context?: LogContext) => warn(message, { module, ...context }),
    error: (message: string, context?: LogContext) => error(message, { module, ...context }),
  };
}

export type ModuleLogger = ReturnType<typeof moduleLogger>;
