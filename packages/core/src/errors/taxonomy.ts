import type { ValidationIssue } from '../validation/validator';

export type ApiErrorKind = 'client' | 'server' | 'auth_required';

/**
 * Why a request ended up as a {@link ServerError}.
 *
 * - `http`: the service answered with a 5xx (or another unexpected status)
 * - `timeout`: no answer within the per-attempt timeout
 * - `network`: the connection failed before any status arrived
 * - `parse`: a success status carried a body that could not be reconciled
 */
export type ServerErrorReason = 'http' | 'timeout' | 'network' | 'parse';

export const DEFAULT_ERROR_MESSAGE = 'Request failed';
export const DEFAULT_AUTH_FEATURE = 'access this feature';

export abstract class ApiError extends Error {
  abstract readonly kind: ApiErrorKind;
  abstract readonly retryable: boolean;
  abstract readonly status: number | null;
}

export class ClientError extends ApiError {
  readonly kind = 'client' as const;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

export class ServerError extends ApiError {
  readonly kind = 'server' as const;
  readonly retryable = true;

  constructor(
    message: string,
    public readonly status: number | null,
    public readonly body: string | null,
    public readonly reason: ServerErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServerError';
  }
}

/** A 2xx response whose body does not have the shape the endpoint promises. */
export class ReconciliationError extends ServerError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message, null, null, 'parse');
    this.name = 'ReconciliationError';
  }
}

export class AuthRequiredError extends ApiError {
  readonly kind = 'auth_required' as const;
  readonly retryable = false;

  constructor(
    public readonly feature: string = DEFAULT_AUTH_FEATURE,
    public readonly status: number | null = null
  ) {
    super(`Sign in to ${feature.trim()}.`);
    this.name = 'AuthRequiredError';
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export interface ClassifyContext {
  /** Shown when the response body carries no usable message. */
  fallbackMessage?: string;
  /** Feature named in the sign-in prompt when the service answers 401. */
  feature?: string;
}

export function classify(
  rawStatus: number | null,
  rawBody: string | null,
  transportError: Error | null,
  context: ClassifyContext = {}
): ApiError {
  const fallbackMessage = context.fallbackMessage ?? DEFAULT_ERROR_MESSAGE;

  if (transportError) {
    if (isApiError(transportError)) {
      return transportError;
    }
    const reason = isTimeoutError(transportError) ? 'timeout' : 'network';
    return new ServerError(transportError.message || fallbackMessage, rawStatus, rawBody, reason, {
      cause: transportError,
    });
  }

  if (rawStatus === null) {
    return new ServerError(fallbackMessage, null, rawBody, 'network');
  }

  if (rawStatus === 401) {
    return new AuthRequiredError(context.feature ?? DEFAULT_AUTH_FEATURE, rawStatus);
  }

  const message = extractErrorMessage(rawBody) ?? fallbackMessage;

  if (rawStatus >= 400 && rawStatus < 500) {
    return new ClientError(message, rawStatus, rawBody ?? '');
  }

  return new ServerError(message, rawStatus, rawBody, 'http');
}

/**
 * Pulls the human-readable message out of an error body.
 * Looks at `detail`, then `message`, then `error.message`.
 */
export function extractErrorMessage(body: string | null): string | null {
  if (!body) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  return (
    detailMessage(parsed.detail) ??
    nonEmptyString(parsed.message) ??
    (isRecord(parsed.error) ? nonEmptyString(parsed.error.message) : null)
  );
}

// Validation failures arrive as `detail: [{ loc, msg, type }, ...]`.
function detailMessage(detail: unknown): string | null {
  if (!Array.isArray(detail)) {
    return nonEmptyString(detail);
  }
  const messages = detail
    .map((item) => (isRecord(item) ? nonEmptyString(item.msg) : null))
    .filter((msg): msg is string => msg !== null);
  return messages.length > 0 ? messages.join('; ') : null;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeoutError(error: Error): boolean {
  if (error.name === 'TimeoutError') {
    return true;
  }
  const code = 'code' in error ? error.code : undefined;
  return code === 'ETIMEDOUT' || code === 'ECONNABORTED';
}

export function toApiError(error: unknown, context: ClassifyContext = {}): ApiError {
  if (isApiError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return classify(null, null, error, context);
  }
  return classify(null, null, new Error(String(error)), context);
}

export function shouldRetry(error: unknown): boolean {
  return toApiError(error).retryable;
}

export function getUserFacingMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return 'An unexpected error occurred';
}
