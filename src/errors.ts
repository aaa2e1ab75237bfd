/**
 * Gateway error classes
 *
 * Every failure the gateway raises to the protocol layer is one of these.
 */

/** Longest driver message surfaced to callers */
export const MAX_ERROR_MESSAGE_LENGTH = 500;

/** Base error for all gateway errors */
export class GatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GatewayError';
  }
}

/** Database name does not match any configured target */
export class UnknownTargetError extends GatewayError {
  constructor(readonly target: string) {
    super(`Unknown database '${target}'`);
    this.name = 'UnknownTargetError';
  }
}

/** No pooled connection became free before the acquire timeout */
export class PoolExhaustedError extends GatewayError {
  constructor(target: string, maxSize: number, waitedMs: number) {
    super(`No free connection for '${target}' after ${waitedMs}ms (pool size ${maxSize})`);
    this.name = 'PoolExhaustedError';
  }
}

/** Write statement refused in read-only mode */
export class ReadOnlyViolationError extends GatewayError {
  constructor(message = 'Write statements are not allowed: the server is in read-only mode') {
    super(message);
    this.name = 'ReadOnlyViolationError';
  }
}

/** Parameters do not line up with the statement's placeholders */
export class ParameterBindingError extends GatewayError {
  constructor(message: string) {
    super(message);
    this.name = 'ParameterBindingError';
  }
}

/** Deadline exceeded while connecting or running a statement */
export class TimeoutError extends GatewayError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** Driver-reported failure, message sanitized */
export class ExecutionError extends GatewayError {
  constructor(
    message: string,
    readonly code?: string
  ) {
    super(message);
    this.name = 'ExecutionError';
  }

  static fromDriver(error: unknown, secrets: readonly string[] = []): ExecutionError {
    const code = sqlStateOf(error);
    return new ExecutionError(sanitizeMessage(describe(error), secrets), code);
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * SQLSTATE (or Node errno code) carried by a driver error
 */
export function sqlStateOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Mask credentials and cap the length of a driver message
 */
export function sanitizeMessage(message: string, secrets: readonly string[] = []): string {
  let clean = message.replace(/(\w+:\/\/)[^:@\s/]+:[^@\s]+@/g, '$1***:***@');
  for (const secret of secrets) {
    if (secret) clean = clean.split(secret).join('***');
  }
  clean = clean.replace(/\s+/g, ' ').trim();
  if (clean.length > MAX_ERROR_MESSAGE_LENGTH) {
    clean = `${clean.slice(0, MAX_ERROR_MESSAGE_LENGTH - 3)}...`;
  }
  return clean;
}
