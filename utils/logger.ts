// One JSON object per line on stderr; stdout carries only the report.

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogFields {
  dataset?: string;
  durationMs?: number;
  error?: { code?: string; message: string; stack?: string };
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const envLevel = process.env.LOG_LEVEL;
let threshold = LOG_LEVELS.indexOf(isLogLevel(envLevel) ? envLevel : 'info');
let sink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export const setLogLevel = (level: LogLevel): void => {
  threshold = LOG_LEVELS.indexOf(level);
};

/** Redirects output, returning the previous sink. */
export const setLogSink = (next: LogSink): LogSink => {
  const previous = sink;
  sink = next;
  return previous;
};

export const log = (level: LogLevel, message: string, fields: LogFields = {}): void => {
  if (LOG_LEVELS.indexOf(level) < threshold) return;
  sink(JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...fields }));
};

export const logger = {
  debug: (message: string, fields?: LogFields) => log('debug', message, fields),
  info: (message: string, fields?: LogFields) => log('info', message, fields),
  warn: (message: string, fields?: LogFields) => log('warn', message, fields),
  error: (message: string, fields?: LogFields) => log('error', message, fields),
};
