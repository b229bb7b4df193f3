/**
 * Error taxonomy surfaced by the resource client and the watch engine.
 *
 * Every server response outside 2xx is mapped to one class by HTTP status;
 * the decoded `Status` body, when there is one, rides along on `status`.
 */

import { statusSchema, type Status } from './schemas.js';

export type ErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'Invalid'
  | 'Unauthorized'
  | 'Forbidden'
  | 'Decode'
  | 'Gone'
  | 'Transport'
  | 'Cancelled'
  | 'Server'
  | 'Usage';

const MAX_SNIPPET_LENGTH = 1024;

export class KubeClientError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code?: number,
    public readonly status?: Status,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'KubeClientError';
  }
}

export class NotFoundError extends KubeClientError {
  constructor(message: string, status?: Status) {
    super(message, 'NotFound', 404, status);
    this.name = 'NotFoundError';
  }
}

/** Already exists on create, or a stale resourceVersion on update. */
export class ConflictError extends KubeClientError {
  constructor(message: string, status?: Status) {
    super(message, 'Conflict', 409, status);
    this.name = 'ConflictError';
  }
}

export class InvalidError extends KubeClientError {
  constructor(message: string, status?: Status) {
    super(message, 'Invalid', 422, status);
    this.name = 'InvalidError';
  }
}

export class UnauthorizedError extends KubeClientError {
  constructor(message: string, status?: Status) {
    super(message, 'Unauthorized', 401, status);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends KubeClientError {
  constructor(message: string, status?: Status) {
    super(message, 'Forbidden', 403, status);
    this.name = 'ForbiddenError';
  }
}

/** The server no longer holds history for the requested resourceVersion. */
export class GoneError extends KubeClientError {
  constructor(message: string, status?: Status) {
    super(message, 'Gone', 410, status);
    this.name = 'GoneError';
  }
}

/** Any other non-2xx response (400, 429, 5xx, ...). */
export class ServerError extends KubeClientError {
  constructor(message: string, code: number, status?: Status) {
    super(message, 'Server', code, status);
    this.name = 'ServerError';
  }
}

export class DecodeError extends KubeClientError {
  /** Up to 1024 characters of input leading up to the failure. */
  public readonly snippet: string;

  constructor(what: string, reason: string, input?: string, position?: number, options?: { cause?: unknown }) {
    const snippet = input === undefined ? '' : snippetBefore(input, position ?? input.length);
    super(
      snippet ? `unable to parse ${what}: ${snippet} (${reason})` : `unable to parse ${what}: ${reason}`,
      'Decode',
      undefined,
      undefined,
      options,
    );
    this.name = 'DecodeError';
    this.snippet = snippet;
  }
}

export class TransportError extends KubeClientError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Transport', undefined, undefined, { cause });
    this.name = 'TransportError';
  }
}

export class CancelledError extends KubeClientError {
  constructor(message = 'request cancelled') {
    super(message, 'Cancelled');
    this.name = 'CancelledError';
  }
}

/** Misuse detected before any request is sent. */
export class UsageError extends KubeClientError {
  constructor(message: string) {
    super(message, 'Usage');
    this.name = 'UsageError';
  }
}

function snippetBefore(input: string, position: number): string {
  const end = Math.min(Math.max(position, 0), input.length);
  const lineStart = input.lastIndexOf('\n', end - 1) + 1;
  return input.slice(Math.max(lineStart, end - MAX_SNIPPET_LENGTH), end);
}

/**
 * Renders a Status the way the API server phrases it:
 * `<reason>: <message>, caused by <cause>...`
 */
export function describeStatus(status: Status): string {
  let text = status.reason ?? status.status ?? 'Failure';
  if (status.message) {
    text += `: ${status.message}`;
  }
  for (const cause of status.details?.causes ?? []) {
    if (cause.message) {
      text += `, caused by ${cause.message}`;
    } else if (cause.reason) {
      text += `, caused by ${cause.reason}`;
    }
  }
  return text;
}

export function parseStatus(body: string): Status | undefined {
  if (!body.trim()) {
    return undefined;
  }
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = statusSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function errorFromStatus(code: number, status?: Status): KubeClientError {
  const message = status ? describeStatus(status) : `HTTP ${code}`;
  switch (code) {
    case 401:
      return new UnauthorizedError(message, status);
    case 403:
      return new ForbiddenError(message, status);
    case 404:
      return new NotFoundError(message, status);
    case 409:
      return new ConflictError(message, status);
    case 410:
      return new GoneError(message, status);
    case 422:
      return new InvalidError(message, status);
    default:
      return new ServerError(message, code, status);
  }
}

export function errorFromResponse(code: number, body: string): KubeClientError {
  return errorFromStatus(code, parseStatus(body));
}

/**
 * Normalizes anything thrown by an executor. Aborts become
 * `CancelledError`, everything that is not already classified becomes
 * `TransportError`.
 */
export function toClientError(error: unknown): KubeClientError {
  if (error instanceof KubeClientError) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new CancelledError();
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, error);
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isConflict(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/** 410 responses, and Status bodies whose reason says the history expired. */
export function isGone(error: unknown): boolean {
  if (!(error instanceof KubeClientError)) {
    return false;
  }
  const reason = error.status?.reason;
  return error.kind === 'Gone' || reason === 'Expired' || reason === 'Gone';
}

export function isAuthError(error: unknown): boolean {
  return error instanceof UnauthorizedError || error instanceof ForbiddenError;
}

/**
 * Conditions a long-lived watch recovers from by reconnecting at its last
 * resourceVersion.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TransportError) {
    return true;
  }
  return error instanceof ServerError && error.code !== undefined && (error.code === 429 || error.code >= 500);
}
