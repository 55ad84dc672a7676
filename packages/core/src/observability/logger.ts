/**
 * Structured logging for driftsync.
 *
 * Engines take a {@link Logger} through their options and default to
 * {@link noopLogger}, so nothing reaches the console unless the host
 * application opts in. Each engine derives a {@link Logger.child} named
 * after itself; the name travels in {@link LogEntry.context}.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  /** Dotted component path, e.g. `app.MultiDeviceSyncManager` */
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
  /** Logger for a named component below this one */
  child(component: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Component path stamped on every entry */
  context?: string;
  /** Receives every entry that passes the level filter */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function writeToConsole(entry: LogEntry): void {
  const tag = entry.context ? ` [${entry.context}]` : '';
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const line = `${new Date(entry.timestamp).toISOString()} ${entry.level.toUpperCase()}${tag} ${entry.message}${data}`;

  if (entry.level === 'error') {
    console.error(line, entry.error ?? '');
  } else {
    console[entry.level](line);
  }
}

function joinContext(parent: string | undefined, component: string): string {
  return parent ? `${parent}.${component}` : component;
}

/**
 * Create a structured logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', context: 'app' });
 * const engine = createDeltaSyncEngine({ replicaId: 'laptop', logger });
 * // engine entries carry context 'app.DeltaSyncEngine'
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = writeToConsole,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minRank = LEVEL_RANK[level];

  const emit = (
    entryLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void => {
    if (!enabled || LEVEL_RANK[entryLevel] < minRank) return;
    handler({ level: entryLevel, message, timestamp: Date.now(), context, data, error });
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, error, data) => emit('error', message, data, error),
    child: (component) =>
      createLogger({ level, handler, enabled, context: joinContext(context, component) }),
  };
}

/**
 * Logger that discards everything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
