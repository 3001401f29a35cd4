import axios from 'axios';

/**
 * Coarse failure categories of an external call.
 *
 * - `auth`: missing or rejected credential (401, 403)
 * - `client`: the request itself was rejected, e.g. a malformed query (other 4xx)
 * - `rate_limit`: 429
 * - `server`: 5xx
 * - `network`: no status at all (refused connection, DNS, timeout)
 */
export type ServiceErrorCategory = 'auth' | 'client' | 'rate_limit' | 'server' | 'network';

export interface ServiceErrorOptions {
  status?: number;
  category?: ServiceErrorCategory;
  details?: unknown;
  cause?: unknown;
}

export function classifyStatus(status: number | undefined): ServiceErrorCategory {
  if (status === undefined) {
    return 'network';
  }
  if (status === 401 || status === 403) {
    return 'auth';
  }
  if (status === 429) {
    return 'rate_limit';
  }
  if (status >= 400 && status < 500) {
    return 'client';
  }
  return 'server';
}

/**
 * Raised when an external service answers with a non-success status or cannot be reached.
 * Nothing in the cookbook retries on it; callers surface it as is.
 */
export class ServiceError extends Error {
  readonly service: string;
  readonly status?: number;
  readonly category: ServiceErrorCategory;
  readonly details?: unknown;

  constructor(service: string, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ServiceError';
    this.service = service;
    this.status = options.status;
    this.category = options.category || classifyStatus(options.status);
    this.details = options.details;
  }

  get isAuthError(): boolean {
    return this.category === 'auth';
  }

  get isClientError(): boolean {
    return this.category === 'client';
  }
}

/**
 * Raised by a request composer when its input lacks a required field or is malformed.
 * Always thrown before any network call is attempted.
 */
export class RequestValidationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'RequestValidationError';
    this.field = field;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull a human readable message out of an error body such as
 * `{ error: "..." }`, `{ error: { message: "..." } }` or `{ message: "..." }`.
 */
function messageFromBody(body: unknown): string | undefined {
  if (typeof body === 'string' && body.trim() !== '') {
    return body;
  }
  if (!isRecord(body)) {
    return undefined;
  }
  const { error, message } = body;
  if (typeof error === 'string') {
    return error;
  }
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  if (typeof message === 'string') {
    return message;
  }
  return undefined;
}

/**
 * Convert whatever an HTTP client or service SDK threw into a ServiceError.
 *
 * Handles axios errors, SDK errors that carry a numeric `status` (the OpenAI client's APIError does),
 * and plain errors, which are treated as network failures unless `fallbackCategory` says otherwise.
 */
export function toServiceError(error: unknown, service: string, fallbackCategory?: ServiceErrorCategory): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const body: unknown = error.response?.data;
    const message = messageFromBody(body) || error.message;
    return new ServiceError(service, `${service} request failed${status ? ` with status ${status}` : ''}: ${message}`, {
      status,
      category: status === undefined ? fallbackCategory : undefined,
      details: body,
      cause: error
    });
  }

  if (error instanceof Error) {
    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    const details = 'error' in error ? error.error : undefined;
    return new ServiceError(service, `${service} request failed${status ? ` with status ${status}` : ''}: ${error.message}`, {
      status,
      category: status === undefined ? fallbackCategory : undefined,
      details,
      cause: error
    });
  }

  return new ServiceError(service, `${service} request failed: ${String(error)}`, {
    category: fallbackCategory,
    cause: error
  });
}
