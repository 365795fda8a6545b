/**
 * Logger
 * Structured logging for the workflow and CLI
 *
 * Log levels: error, warn, info, debug
 * Output goes to stderr so stdout only carries command output
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  duration?: number;
}

// Lower = more important
const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getConfiguredLevel(): LogLevel {
  const level = process.env.COMMITWRIGHT_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.COMMITWRIGHT_DEBUG ? 'debug' : 'warn';
}

let configuredLevel = getConfiguredLevel();

/**
 * Set the minimum log level
 */
export function setLogLevel(level: LogLevel): void {
  configuredLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= LOG_LEVELS[configuredLevel];
}

function writeLog(entry: LogEntry): void {
  if (!shouldLog(entry.level)) return;

  if (process.env.COMMITWRIGHT_LOG_JSON === 'true') {
    console.error(JSON.stringify(entry));
  } else {
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const durationStr = entry.duration !== undefined ? ` (${entry.duration}ms)` : '';
    const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
    console.error(`[${entry.timestamp}] ${levelStr} [${entry.component}] ${entry.message}${durationStr}${dataStr}`);
  }
}

export interface Logger {
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  time<T>(operation: string, fn: () => Promise<T>, level?: LogLevel): Promise<T>;
  child(subComponent: string): Logger;
}

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    writeLog({
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      data,
    });
  };

  return {
    error: (message, data) => log('error', message, data),
    warn: (message, data) => log('warn', message, data),
    info: (message, data) => log('info', message, data),
    debug: (message, data) => log('debug', message, data),

    /**
     * Time an async operation
     */
    async time<T>(operation: string, fn: () => Promise<T>, level: LogLevel = 'debug'): Promise<T> {
      const start = Date.now();
      try {
        const result = await fn();
        writeLog({
          timestamp: new Date().toISOString(),
          level,
          component,
          message: `${operation} completed`,
          duration: Date.now() - start,
        });
        return result;
      } catch (error) {
        writeLog({
          timestamp: new Date().toISOString(),
          level: 'error',
          component,
          message: `${operation} failed`,
          duration: Date.now() - start,
          data: { error: error instanceof Error ? error.message : String(error) },
        });
        throw error;
      }
    },

    child(subComponent: string) {
      return createLogger(`${component}:${subComponent}`);
    },
  };
}
