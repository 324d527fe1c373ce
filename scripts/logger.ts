export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogMethod = (message: string, data?: unknown) => void;

export interface Logger {
  debug: LogMethod;
  /** INFO line shown from verbosity 1 up */
  detail: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

const EMOJI: Record<LogLevel, string> = {
  DEBUG: '🔍',
  INFO: '✅',
  WARN: '⚠️',
  ERROR: '❌',
};

let verbosity = 0;

/** 0 = status lines only, 1 = per-post details, 2 = debug comparisons */
export function setVerbosity(level: number): void {
  verbosity = level;
}

export function getVerbosity(): number {
  return verbosity;
}

export function log(level: LogLevel, message: string, data?: unknown): void {
  if (level === 'DEBUG' && verbosity < 2) return;

  const line = `${EMOJI[level]} ${level}: ${message}`;
  const write = level === 'ERROR' ? console.error : console.log;
  if (data !== undefined) {
    write(line, data);
  } else {
    write(line);
  }
}

export function createLogger(prefix?: string): Logger {
  const withPrefix = (message: string) => (prefix ? `${prefix} ${message.trim()}` : message);
  return {
    debug: (message, data) => log('DEBUG', withPrefix(message), data),
    detail: (message, data) => {
      if (verbosity > 0) log('INFO', withPrefix(message), data);
    },
    info: (message, data) => log('INFO', withPrefix(message), data),
    warn: (message, data) => log('WARN', withPrefix(message), data),
    error: (message, data) => log('ERROR', withPrefix(message), data),
  };
}

export function createPostLogger(postId: string): Logger {
  return createLogger(`${postId.padEnd(7)} -`);
}

export function count(n: number | { length: number }, singular: string, plural = `${singular}s`): string {
  const total = typeof n === 'number' ? n : n.length;
  return `${total} ${total === 1 ? singular : plural}`;
}
