/**
 * Structured logging.
 *
 * Writes JSON lines to stderr so stdout stays free for callers piping results.
 * Format: {"ts":"ISO","level":"warn","component":"Splitter","msg":"...","data":{}}
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

type EntryLevel = Exclude<LogLevel, 'silent'>;

/**
 * Log level priority (higher = more severe). 'silent' outranks everything.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let globalLogLevel: LogLevel = 'info';

/**
 * Set the global log level.
 */
export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

function shouldLog(level: EntryLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[globalLogLevel];
}

function writeLog(
  level: EntryLevel,
  component: string,
  msg: string,
  data?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) {
    return;
  }

  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
  };

  if (data !== undefined) {
    entry.data = data;
  }

  process.stderr.write(JSON.stringify(entry) + '\n');
}

/**
 * Create a logger for a specific component.
 *
 * @param component - The component name (e.g., 'Splitter', 'ExperimentRegistry')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, data) => writeLog('debug', component, msg, data),
    info: (msg, data) => writeLog('info', component, msg, data),
    warn: (msg, data) => writeLog('warn', component, msg, data),
    error: (msg, data) => writeLog('error', component, msg, data),
  };
}
