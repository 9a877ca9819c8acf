import type { LogLevel } from './config.ts';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type Logger = {
  debug: (module: string, message: string) => void;
  info: (module: string, message: string) => void;
  warn: (module: string, message: string) => void;
  error: (module: string, message: string) => void;
};

/** Destination for formatted lines; defaults to stdout/stderr. */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'warn') console.error(line);
  else console.log(line);
};

export function formatLogLine(level: LogLevel, module: string, message: string, at = new Date()): string {
  return `${at.toISOString()} | ${level} | ${module} | ${message}`;
}

export function createLogger(level: LogLevel, sink: LogSink = consoleSink): Logger {
  const threshold = LEVELS[level] ?? LEVELS.info;
  const log = (lvl: LogLevel, module: string, message: string) => {
    if (LEVELS[lvl] < threshold) return;
    sink(lvl, formatLogLine(lvl, module, message));
  };
  return {
    debug: (module, message) => log('debug', module, message),
    info: (module, message) => log('info', module, message),
    warn: (module, message) => log('warn', module, message),
    error: (module, message) => log('error', module, message)
  };
}

/** Logger that drops everything; used where a caller passes none. */
export const silentLogger: Logger = createLogger('error', () => {});

/**
 * Describe a caught value for a log line.
 * @param err - Thrown value.
 * @returns Error message or string form.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
