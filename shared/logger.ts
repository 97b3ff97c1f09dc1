import dotenv from 'dotenv';
import pino from 'pino';

dotenv.config({ path: '.env.local' });

// Pretty printing only in development; crawl logs are otherwise newline-delimited JSON
const baseLogger = pino({
  name: 'shorts-crawler',
  level: process.env.LOG_LEVEL || 'info',
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname,name',
          },
        }
      : undefined,
});

type LogData = Record<string, unknown>;

export function formatErrorMessage(message: string, error?: unknown): string {
  if (error === undefined || error === null) {
    return message;
  }

  if (error instanceof Error) {
    return `${message} ${error.message}`;
  }

  if (typeof error === 'string') {
    return `${message} ${error}`;
  }

  return `${message} ${String(error)}`;
}

function isLogData(value: unknown): value is LogData {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error)
  );
}

function emit(
  level: 'debug' | 'info' | 'warn' | 'error' | 'fatal',
  message: string,
  detail?: unknown
): void {
  if (isLogData(detail)) {
    baseLogger[level](detail, message);
  } else {
    baseLogger[level](formatErrorMessage(message, detail));
  }
}

// Message-first wrapper: structured data goes in the second argument, errors are folded into the message
const logger = {
  trace: (message: string) => baseLogger.trace(message),
  debug: (message: string, data?: LogData) => emit('debug', message, data),
  info: (message: string, data?: LogData) => emit('info', message, data),
  warn: (message: string, detail?: unknown) => emit('warn', message, detail),
  error: (message: string, detail?: unknown) => emit('error', message, detail),
  fatal: (message: string, detail?: unknown) => emit('fatal', message, detail),
};

export { logger };
