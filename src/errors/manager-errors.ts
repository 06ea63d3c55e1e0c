/**
 * Manager Error Taxonomy
 *
 * Leaf components (downloader, supervisor, control-plane client) throw the
 * specific kind; composing managers add context with withContext() but keep
 * the kind so callers can branch on it.
 */

export type ErrorKind =
  | 'network'
  | 'not-found'
  | 'conflict'
  | 'validation'
  | 'auth'
  | 'process'
  | 'io';

export interface ManagerErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

export abstract class ManagerError extends Error {
  abstract readonly kind: ErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: ManagerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.context = options.context;
  }
}

/** Release host or control plane unreachable, timed out or answering 5xx */
export class NetworkError extends ManagerError {
  readonly kind = 'network' as const;
  readonly statusCode?: number;

  constructor(message: string, options: ManagerErrorOptions & { statusCode?: number } = {}) {
    super(message, options);
    this.statusCode = options.statusCode;
  }
}

/** Referenced version, profile, proxy or connection is absent */
export class NotFoundError extends ManagerError {
  readonly kind = 'not-found' as const;
}

/** Operation would violate an invariant (e.g. uninstalling the running version) */
export class ConflictError extends ManagerError {
  readonly kind = 'conflict' as const;
}

/** Malformed artifact, config document or argument */
export class ValidationError extends ManagerError {
  readonly kind = 'validation' as const;
  /** First missing or malformed key, when the failure is about a document */
  readonly key?: string;

  constructor(message: string, options: ManagerErrorOptions & { key?: string } = {}) {
    super(message, options);
    this.key = options.key;
  }
}

/** Control-plane secret missing or rejected */
export class AuthError extends ManagerError {
  readonly kind = 'auth' as const;
}

/** Spawn, stop or restart failure, including restart exhaustion */
export class ProcessError extends ManagerError {
  readonly kind = 'process' as const;
  readonly pid?: number;

  constructor(message: string, options: ManagerErrorOptions & { pid?: number } = {}) {
    super(message, options);
    this.pid = options.pid;
  }
}

/** Filesystem failure unrelated to the kinds above */
export class IOError extends ManagerError {
  readonly kind = 'io' as const;
  readonly path?: string;

  constructor(message: string, options: ManagerErrorOptions & { path?: string } = {}) {
    super(message, options);
    this.path = options.path;
  }
}

export function isManagerError(error: unknown): error is ManagerError {
  return error instanceof ManagerError;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/** Anything thrown, as an Error */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return asError(error).message;
}

/**
 * Build an error of the given kind.
 */
export function createError(
  kind: ErrorKind,
  message: string,
  options: ManagerErrorOptions = {}
): ManagerError {
  switch (kind) {
    case 'network':
      return new NetworkError(message, options);
    case 'not-found':
      return new NotFoundError(message, options);
    case 'conflict':
      return new ConflictError(message, options);
    case 'validation':
      return new ValidationError(message, options);
    case 'auth':
      return new AuthError(message, options);
    case 'process':
      return new ProcessError(message, options);
    case 'io':
      return new IOError(message, options);
  }
}

/**
 * Normalize anything thrown into a ManagerError.
 * Errno failures become IOError; other unknown errors take the fallback kind.
 */
export function toManagerError(error: unknown, fallback: ErrorKind = 'io'): ManagerError {
  if (isManagerError(error)) return error;
  if (isErrnoException(error)) {
    return new IOError(error.message, { cause: error, path: error.path });
  }
  const message = error instanceof Error ? error.message : String(error);
  return createError(fallback, message, { cause: error });
}

/**
 * Prefix an error with context while preserving its kind.
 * ValidationError keeps its key and ProcessError its pid.
 */
export function withContext(error: unknown, context: string): ManagerError {
  const base = toManagerError(error);
  const message = `${context}: ${base.message}`;

  if (base instanceof ValidationError) {
    return new ValidationError(message, { cause: base, key: base.key, context: base.context });
  }
  if (base instanceof ProcessError) {
    return new ProcessError(message, { cause: base, pid: base.pid, context: base.context });
  }
  if (base instanceof NetworkError) {
    return new NetworkError(message, {
      cause: base,
      statusCode: base.statusCode,
      context: base.context,
    });
  }
  return createError(base.kind, message, { cause: base, context: base.context });
}
