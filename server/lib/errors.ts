// =============================================================================
// Typed Error System for the inventory engine
// Base class + stage-specific subclasses with error codes. Fatal errors abort
// assembly; recoverable ones are turned into warnings by the assembler.
// =============================================================================

export class InventoryError extends Error {
  public code: string;
  public cause?: unknown;
  public readonly recoverable: boolean;

  constructor(code: string, message: string, recoverable = false, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.recoverable = recoverable;
    this.name = 'InventoryError';
  }

  toJSON(): { error: string; code: string; recoverable: boolean } {
    return { error: this.message, code: this.code, recoverable: this.recoverable };
  }
}

// --- Configuration Errors (inventory source, compose, group_by) ---

export class ConfigurationError extends InventoryError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, false, cause);
    this.issues = issues;
    this.name = 'ConfigurationError';
  }
}

// --- Transport Errors (login, retried reads) ---

export class AuthenticationError extends InventoryError {
  public readonly statusCode?: number;

  constructor(message: string = 'Authentication rejected by server', statusCode?: number, cause?: unknown) {
    super('AUTH_FAILED', message, false, cause);
    this.statusCode = statusCode;
    this.name = 'AuthenticationError';
  }
}

export class ConnectivityError extends InventoryError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      'CONNECTIVITY_EXHAUSTED',
      `${operation} failed after ${attempts} attempt(s): ${describeCause(cause)}`,
      false,
      cause
    );
    this.name = 'ConnectivityError';
  }
}

export class ApiRequestError extends InventoryError {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super('API_REQUEST_FAILED', `${operation}: ${message}`, false, cause);
    this.name = 'ApiRequestError';
  }
}

// --- Recoverable Errors (reported as warnings) ---

export class PerHostComposeError extends InventoryError {
  constructor(
    public readonly hostname: string,
    public readonly variable: string,
    public readonly expression: string,
    cause?: unknown
  ) {
    super(
      'COMPOSE_FAILED',
      `Could not compose '${variable}' for ${hostname} from "${expression}": ${describeCause(cause)}`,
      true,
      cause
    );
    this.name = 'PerHostComposeError';
  }
}

export class CacheCorruptionError extends InventoryError {
  constructor(public readonly path: string, cause?: unknown) {
    super('CACHE_CORRUPT', `Unreadable cache entry ${path}: ${describeCause(cause)}`, true, cause);
    this.name = 'CacheCorruptionError';
  }
}

// --- Utilities ---

export function isInventoryError(err: unknown): err is InventoryError {
  return err instanceof InventoryError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown cause';
  return String(cause);
}
