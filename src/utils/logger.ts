/**
 * Tagged logger with a short history.
 *
 * Every event is kept in a bounded history and handed to subscribers; the
 * display reads the recent warnings (dropped blocks, failed blocks, input
 * loss) from it. Console echo is on for development builds only, never under
 * the test runner.
 */

export type LogLevel = 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

export interface LogEvent {
  readonly seq: number;
  readonly level: LogLevel;
  readonly tag: string;
  readonly message: string;
  readonly timestamp: number;
  readonly data?: unknown;
}

export type LogListener = (event: LogEvent) => void;

export interface Logger {
  info(tag: string, message: string, data?: unknown): LogEvent;
  warn(tag: string, message: string, data?: unknown): LogEvent;
  error(tag: string, message: string, data?: unknown): LogEvent;
  /** Returns the unsubscribe function */
  subscribe(listener: LogListener): () => void;
  /** Up to `limit` of the newest events at `minLevel` or above, oldest first */
  recent(minLevel?: LogLevel, limit?: number): LogEvent[];
}

export interface LoggerOptions {
  /** Events kept in the history (default 50) */
  capacity?: number;
  echo?: boolean;
}

export function isAtLeast(event: LogEvent, level: LogLevel): boolean {
  return LEVEL_RANK[event.level] >= LEVEL_RANK[level];
}

function echo(event: LogEvent): void {
  const line = `${new Date(event.timestamp).toISOString()} [${event.tag}] ${event.message}`;
  const args = event.data === undefined ? [line] : [line, event.data];
  if (event.level === 'error') console.error(...args);
  else if (event.level === 'warn') console.warn(...args);
  else console.log(...args);
}

export function createLogger({ capacity = 50, echo: echoEnabled = false }: LoggerOptions = {}): Logger {
  const history: LogEvent[] = [];
  const listeners = new Set<LogListener>();
  let seq = 0;

  const record =
    (level: LogLevel) =>
    (tag: string, message: string, data?: unknown): LogEvent => {
      const event: LogEvent = Object.freeze({ seq: seq++, level, tag, message, timestamp: Date.now(), data });
      history.push(event);
      if (history.length > capacity) history.shift();
      if (echoEnabled) echo(event);
      listeners.forEach(listener => listener(event));
      return event;
    };

  return {
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    recent(minLevel = 'info', limit = capacity) {
      const matching = history.filter(event => isAtLeast(event, minLevel));
      return limit > 0 ? matching.slice(-limit) : [];
    },
  };
}

export const logger = createLogger({ echo: import.meta.env.DEV && import.meta.env.MODE !== 'test' });
