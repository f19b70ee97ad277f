/**
 * Error taxonomy for the ClickUp toolkit.
 *
 * Every failure the client or the config store can raise derives from
 * ClickUpError. Remote failures carry the HTTP status and the raw response
 * payload; ConfigurationError and NetworkError describe local problems.
 */

import { ExitCode } from '../types/exit-codes.js';

/** Stable machine-readable error codes used in JSON output. */
export type ErrorCode =
  | 'E_CLICKUP'
  | 'E_AUTHENTICATION'
  | 'E_AUTHORIZATION'
  | 'E_NOT_FOUND'
  | 'E_VALIDATION'
  | 'E_RATE_LIMIT'
  | 'E_SERVER'
  | 'E_NETWORK'
  | 'E_CONFIGURATION';

export interface ClickUpErrorOptions {
  statusCode?: number;
  responseData?: unknown;
  /** Command the user can run to fix the problem. */
  fix?: string;
  cause?: unknown;
}

/**
 * Base error for everything that can go wrong talking to ClickUp.
 */
export class ClickUpError extends Error {
  readonly statusCode?: number;
  readonly responseData?: unknown;
  readonly fix?: string;
  readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR;

  constructor(message: string, options?: ClickUpErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'ClickUpError';
    this.statusCode = options?.statusCode;
    this.responseData = options?.responseData;
    this.fix = options?.fix;
  }

  get code(): ErrorCode {
    return 'E_CLICKUP';
  }

  /** Structured JSON representation for --json output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: this.name,
        message: this.message,
        ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
        ...(this.fix ? { fix: this.fix } : {}),
      },
    };
  }
}

/** 401: the token was rejected. */
export class AuthenticationError extends ClickUpError {
  constructor(message = 'Invalid API token', options?: ClickUpErrorOptions) {
    super(message, { statusCode: 401, fix: 'clickup config set-token', ...options });
    this.name = 'AuthenticationError';
  }

  override get code(): ErrorCode {
    return 'E_AUTHENTICATION';
  }
}

/** 403: the token is valid but lacks access. */
export class AuthorizationError extends ClickUpError {
  constructor(message = 'Insufficient permissions', options?: ClickUpErrorOptions) {
    super(message, { statusCode: 403, ...options });
    this.name = 'AuthorizationError';
  }

  override get code(): ErrorCode {
    return 'E_AUTHORIZATION';
  }
}

export class NotFoundError extends ClickUpError {
  constructor(message = 'Resource not found', options?: ClickUpErrorOptions) {
    super(message, { statusCode: 404, ...options });
    this.name = 'NotFoundError';
  }

  override get code(): ErrorCode {
    return 'E_NOT_FOUND';
  }
}

/** 400: the remote API rejected the request body or parameters. */
export class ValidationError extends ClickUpError {
  constructor(message = 'Bad request', options?: ClickUpErrorOptions) {
    super(message, { statusCode: 400, ...options });
    this.name = 'ValidationError';
  }

  override get code(): ErrorCode {
    return 'E_VALIDATION';
  }
}

/** 429: throttled. `retryAfter` is in seconds. */
export class RateLimitError extends ClickUpError {
  readonly retryAfter: number;

  constructor(message = 'Rate limit exceeded', retryAfter = 60, options?: ClickUpErrorOptions) {
    super(message, { statusCode: 429, ...options });
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }

  override get code(): ErrorCode {
    return 'E_RATE_LIMIT';
  }
}

export class ServerError extends ClickUpError {
  constructor(message: string, options?: ClickUpErrorOptions) {
    super(message, options);
    this.name = 'ServerError';
  }

  override get code(): ErrorCode {
    return 'E_SERVER';
  }
}

/** The request could not reach ClickUp, or timed out. */
export class NetworkError extends ClickUpError {
  constructor(message: string, options?: ClickUpErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
  }

  override get code(): ErrorCode {
    return 'E_NETWORK';
  }
}

/** Local settings problem: missing credentials, denied key, unknown alias. */
export class ConfigurationError extends ClickUpError {
  constructor(message: string, options?: ClickUpErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }

  override get code(): ErrorCode {
    return 'E_CONFIGURATION';
  }
}

/** True for errors caused by local configuration rather than the remote service. */
export function isLocalError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}

const REMOTE_ERRORS = [
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
  RateLimitError,
  ServerError,
  NetworkError,
] as const;

/** True for failures reported by, or on the way to, the ClickUp API. */
export function isRemoteError(err: unknown): err is ClickUpError {
  if (!(err instanceof ClickUpError)) return false;
  if (REMOTE_ERRORS.some((kind) => err instanceof kind)) return true;
  return err.statusCode !== undefined && !isLocalError(err);
}

/** Best-effort message extraction for anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
