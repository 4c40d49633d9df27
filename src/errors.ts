/**
 * Coordination error taxonomy
 *
 * Every failure a handler can surface is one of these classes. Each carries
 * the HTTP status, a stable machine-readable code, and structured details
 * that callers can act on without re-querying.
 */

import { ZodError } from 'zod';

export type ErrorDetails = Record<string, unknown>;

export class CoordinationError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details: ErrorDetails;
  /** Extra response headers, such as Retry-After. */
  readonly headers: Record<string, string>;

  constructor(status: number, code: string, message: string, details: ErrorDetails = {}, headers: Record<string, string> = {}) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
    this.headers = headers;
  }

  toJSON(): ErrorDetails {
    return { error: this.code, detail: this.message, ...this.details };
  }
}

export class UnauthenticatedError extends CoordinationError {
  constructor(message = 'Authentication required') {
    super(401, 'unauthenticated', message);
  }
}

export class ForbiddenError extends CoordinationError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(403, 'forbidden', message, details);
  }
}

export class BadRequestError extends CoordinationError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(400, 'bad_request', message, details);
  }
}

export class NotFoundError extends CoordinationError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(404, 'not_found', message, details);
  }
}

export class ConflictError extends CoordinationError {
  constructor(message: string, details: ErrorDetails = {}, code = 'conflict') {
    super(409, code, message, details);
  }
}

export class PolicyConflictError extends ConflictError {
  readonly activePolicyId: string | null;
  readonly activeVersion: number | null;

  constructor(activePolicyId: string | null, activeVersion: number | null) {
    super(
      `Policy conflict: active policy is now ${activePolicyId ?? 'none'} (version ${activeVersion ?? 0})`,
      { active_policy_id: activePolicyId, active_version: activeVersion },
      'policy_conflict'
    );
    this.activePolicyId = activePolicyId;
    this.activeVersion = activeVersion;
  }
}

export class GoneError extends CoordinationError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(410, 'gone', message, details);
  }
}

export class ValidationError extends CoordinationError {
  constructor(message: string, details: ErrorDetails = {}, code = 'validation_error') {
    super(422, code, message, details);
  }
}

export class RateLimitedError extends CoordinationError {
  readonly retryAfterSeconds: number;

  constructor(message: string, retryAfterSeconds: number) {
    super(429, 'rate_limited', message, { retry_after: retryAfterSeconds }, { 'Retry-After': String(retryAfterSeconds) });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ServiceUnavailableError extends CoordinationError {
  constructor(message: string, cause?: unknown) {
    super(503, 'service_unavailable', message, { retryable: true });
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * A transaction that had to be rolled back for operational reasons.
 * Nothing it touched was committed, so the caller may retry as-is.
 */
export class TransactionError extends CoordinationError {
  constructor(message: string, cause?: unknown) {
    super(503, 'transaction_failed', message, { retryable: true });
    if (cause !== undefined) this.cause = cause;
  }
}

export function fromZodError(error: ZodError): ValidationError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = issues[0];
  const summary = first ? `${first.path || 'body'}: ${first.message}` : 'Invalid request';
  return new ValidationError(summary, { issues });
}

/** Normalize anything thrown by a handler into a CoordinationError, or null for unexpected failures. */
export function toCoordinationError(error: unknown): CoordinationError | null {
  if (error instanceof CoordinationError) return error;
  if (error instanceof ZodError) return fromZodError(error);
  return null;
}

/** Postgres SQLSTATE of a driver error, when there is one. */
export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return pgErrorCode(error.cause);
  return undefined;
}

export const UNIQUE_VIOLATION = '23505';
