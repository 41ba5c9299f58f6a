// Structured logging
//
// Log data carries tokens, session ids and analysis ids only. Never pass
// identity attributes, message bodies or snapshots.

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Default console logger
 */
export const consoleLogger: Logger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

/**
 * Error summary safe for log data: name and code only, no message text
 * (driver messages can echo parameter values).
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ? { errorName: error.name, errorCode: code } : { errorName: error.name };
  }
  return { errorName: typeof error };
}
