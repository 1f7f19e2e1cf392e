/**
 * Structured JSON logger: one JSON object per line on stdout/stderr.
 *
 * Every log line carries the same core fields so lines can be filtered by
 * operation or entity id downstream.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogFields {
  operation?: string;
  roomId?: string;
  guestId?: string;
  bookingId?: string;
  durationMs?: number;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Explicit override; when unset the level comes from LOG_LEVEL on every call.
let minLevel: LogLevel | null = null;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function resetLogLevel(): void {
  minLevel = null;
}

function levelFromEnv(): LogLevel {
  const value = process.env.LOG_LEVEL;
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel ?? levelFromEnv()];
}

function emit(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function log(level: LogLevel, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return;
  emit({
    ...fields,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}

/** Flatten an unknown thrown value into the `error` field of a log entry. */
export function errorFields(err: unknown): NonNullable<LogEntry['error']> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { code, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export const logger = {
  debug: (message: string, fields?: LogFields) => log('debug', message, fields),
  info: (message: string, fields?: LogFields) => log('info', message, fields),
  warn: (message: string, fields?: LogFields) => log('warn', message, fields),
  error: (message: string, fields?: LogFields) => log('error', message, fields),
};
