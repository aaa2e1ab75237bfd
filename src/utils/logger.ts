/**
 * Leveled JSON logger.
 *
 * Writes to stderr: stdout carries protocol frames when the server runs
 * over the stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let threshold: LogLevel = (() => {
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
})();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
  if (levelOrder[level] < levelOrder[threshold]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    msg,
    ...extra,
  };
  console.error(JSON.stringify(payload));
}

export const logger = {
  debug: (msg: string, extra?: Record<string, unknown>) => log('debug', msg, extra),
  info: (msg: string, extra?: Record<string, unknown>) => log('info', msg, extra),
  warn: (msg: string, extra?: Record<string, unknown>) => log('warn', msg, extra),
  error: (msg: string, extra?: Record<string, unknown>) => log('error', msg, extra),
};

/**
 * Message of an unknown thrown value, for log payloads
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
