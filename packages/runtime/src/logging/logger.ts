// Structured logging for reconciliation

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type ReconcileLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Console logger that drops entries below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): ReconcileLogger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug(message, data) {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, data ?? '');
    },
    info(message, data) {
      if (enabled('info')) console.info(`[INFO] ${message}`, data ?? '');
    },
    warn(message, data) {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, data ?? '');
    },
    error(message, data) {
      if (enabled('error')) console.error(`[ERROR] ${message}`, data ?? '');
    },
  };
}

/**
 * Default console logger implementation
 */
export const consoleLogger: ReconcileLogger = createConsoleLogger('debug');

/**
 * Silent logger for testing
 */
export const silentLogger: ReconcileLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): ReconcileLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
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
 * Render an unknown thrown value for a log entry
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
