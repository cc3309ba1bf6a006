/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface used by auth sessions and the Express helpers.
 * Implement this interface to use a custom logger.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: unknown): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEY = /token|secret|password|authorization|^code$/i;

/**
 * Replace credential-bearing fields of a metadata object with `[redacted]`.
 * Nested objects are redacted as well; cycles become `[circular]`.
 */
export function redactMeta(meta: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (typeof meta !== 'object' || meta === null) {
    return meta;
  }
  if (seen.has(meta)) {
    return '[circular]';
  }
  seen.add(meta);

  if (Array.isArray(meta)) {
    return meta.map((item: unknown) => redactMeta(item, seen));
  }

  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [
      key,
      SENSITIVE_KEY.test(key) ? '[redacted]' : redactMeta(value, seen),
    ])
  );
}

/**
 * Create a console logger with optional log level filtering.
 * Metadata is printed as JSON with credential fields redacted.
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @returns A Logger instance
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const shouldLog = (level: LogLevel): boolean => {
    return LEVELS[level] >= LEVELS[minLevel];
  };

  const formatMeta = (meta?: unknown): string => {
    if (!meta) return '';
    try {
      return ' ' + JSON.stringify(redactMeta(meta));
    } catch {
      return ' [unserializable]';
    }
  };

  return {
    debug(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('debug')) {
        console.debug(`[DEBUG] ${message}${formatMeta(meta)}`);
      }
    },
    info(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('info')) {
        console.info(`[INFO] ${message}${formatMeta(meta)}`);
      }
    },
    warn(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('warn')) {
        console.warn(`[WARN] ${message}${formatMeta(meta)}`);
      }
    },
    error(message: string, meta?: unknown): void {
      if (shouldLog('error')) {
        console.error(`[ERROR] ${message}${formatMeta(meta)}`);
      }
    },
  };
}

/**
 * Read the log level from `LOG_LEVEL`, falling back to `fallback` when unset or unknown.
 */
export function logLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = 'info'
): LogLevel {
  const value = env['LOG_LEVEL']?.toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
    ? value
    : fallback;
}

/**
 * No-op logger that discards all log messages.
 * Useful for testing or when logging is not desired.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
