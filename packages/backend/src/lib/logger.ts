import { config, type LogLevel } from '../config.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  [key: string]: unknown;
}

function should_log(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.log_level];
}

// Metadata cannot overwrite the envelope fields
export function format_entry(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> = {},
  now: Date = new Date()
): string {
  const entry: LogEntry = {
    ...meta,
    timestamp: now.toISOString(),
    level,
    service: 'syncstate',
    message,
  };
  return JSON.stringify(entry);
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (!should_log(level)) {
    return;
  }

  const output = format_entry(level, message, meta);

  // stdout stays machine-readable for the CLI; diagnostics go to stderr
  if (level === 'warn' || level === 'error') {
    process.stderr.write(output + '\n');
  } else {
    process.stdout.write(output + '\n');
  }
}

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log('error', message, meta),
};
