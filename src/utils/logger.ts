/**
 * Console logging utility
 * Every line carries an ISO timestamp, level and optional JSON metadata
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

function resolveMinLevel(value: string | undefined): LogLevel {
  const upper = value?.trim().toUpperCase();
  return Object.values(LogLevel).find(level => level === upper) ?? LogLevel.INFO;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveMinLevel(process.env.LOG_LEVEL)];
}

export function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

function write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  if (!isEnabled(level)) return;

  const line = formatLog({
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  });

  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.DEBUG, message, metadata);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.INFO, message, metadata);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.WARN, message, metadata);
  },

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    write(LogLevel.ERROR, message, { ...metadata, error: serializeError(error) });
  },
};
