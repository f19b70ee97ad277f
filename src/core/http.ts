/**
 * HTTP plumbing for the ClickUp client: URL joining, query encoding,
 * status-to-error mapping and transport failure classification.
 */

import {
  AuthenticationError,
  AuthorizationError,
  ClickUpError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
} from './errors.js';
import { isJsonObject } from '../store/json.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Methods that may be replayed after a failure that happened mid-flight. */
export const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT', 'DELETE']);

export type QueryValue = string | number | boolean | readonly (string | number)[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/** Retry-After fallback in seconds. */
export const DEFAULT_RETRY_AFTER = 60;

/**
 * Join a base URL and a relative path with exactly one slash between them.
 */
export function joinUrl(base: string, path: string): string {
  const left = base.replace(/\/+$/, '');
  const right = path.replace(/^\/+/, '');
  return right === '' ? left : `${left}/${right}`;
}

/**
 * Encode query parameters. Null and undefined are skipped, arrays become
 * repeated `key[]=value` pairs the way ClickUp expects them.
 */
export function buildQuery(params: QueryParams | undefined): string {
  if (!params) return '';
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(`${key}[]`, String(item));
    } else {
      search.append(key, String(value));
    }
  }
  const encoded = search.toString();
  return encoded === '' ? '' : `?${encoded}`;
}

function parseRetryAfter(header: string | null): number {
  if (header === null || !/^\s*\d+\s*$/.test(header)) return DEFAULT_RETRY_AFTER;
  return Number.parseInt(header, 10);
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return {};
  return JSON.parse(text);
}

/** Error bodies are not always JSON; fall back to the raw text. */
function errorPayload(text: string): unknown {
  try {
    return parseBody(text);
  } catch {
    return text;
  }
}

/** Error message carried by a 400 body, if any. */
function remoteMessage(payload: unknown): string | undefined {
  if (!isJsonObject(payload)) return undefined;
  const err = payload['err'];
  return typeof err === 'string' && err !== '' ? err : undefined;
}

/**
 * Map a status code and body to a result or a typed error.
 *
 * 2xx bodies are decoded as JSON (empty body gives `{}`); everything else
 * throws the matching ClickUpError subclass.
 */
export function interpretResponse(status: number, headers: Headers, text: string): unknown {
  if (status >= 200 && status < 300) {
    try {
      return parseBody(text);
    } catch (err) {
      throw new ClickUpError(`Invalid JSON response: ${text}`, { statusCode: status, cause: err });
    }
  }

  const payload = errorPayload(text);

  switch (status) {
    case 401:
      throw new AuthenticationError('Invalid API token', { responseData: payload });
    case 403:
      throw new AuthorizationError('Insufficient permissions', { responseData: payload });
    case 404:
      throw new NotFoundError('Resource not found', { responseData: payload });
    case 400:
      throw new ValidationError(remoteMessage(payload) ?? 'Bad request', { responseData: payload });
    case 429:
      throw new RateLimitError('Rate limit exceeded', parseRetryAfter(headers.get('Retry-After')), {
        responseData: payload,
      });
    default:
      if (status >= 500) {
        throw new ServerError(`Server error: ${status}`, { statusCode: status, responseData: payload });
      }
      throw new ClickUpError(`Unexpected status code: ${status}`, { statusCode: status, responseData: payload });
  }
}

/**
 * Read a fetch Response and interpret it.
 */
export async function handleResponse(response: Response): Promise<unknown> {
  const text = await response.text();
  return interpretResponse(response.status, response.headers, text);
}

// ---------------------------------------------------------------------------
// Transport failures
// ---------------------------------------------------------------------------

/**
 * connect: the request never left (DNS, refused, unreachable).
 * timeout: the configured timeout fired.
 * transport: the connection broke after the request may have been sent.
 */
export type TransportFailureKind = 'connect' | 'timeout' | 'transport';

const CONNECT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/** Error code from an error or anywhere along its cause chain. */
export function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = current.cause;
  }
  return undefined;
}

export class TransportFailure extends Error {
  constructor(
    readonly kind: TransportFailureKind,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'TransportFailure';
  }
}

export function classifyTransportFailure(err: unknown, timedOut: boolean): TransportFailureKind {
  if (timedOut) return 'timeout';
  const code = errorCode(err);
  return code !== undefined && CONNECT_ERROR_CODES.has(code) ? 'connect' : 'transport';
}
