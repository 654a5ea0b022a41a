/**
 * Domain errors for the indicators module.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Fetch Errors
// ─────────────────────────────────────────────────────────────────────────────

export type FetchErrorKind = 'transport' | 'malformed-response' | 'timeout';

export interface TransportError {
  readonly type: 'TransportError';
  readonly kind: 'transport';
  readonly message: string;
  readonly retryable: boolean;
  /** HTTP status, when the server answered */
  readonly status?: number;
  readonly cause?: unknown;
}

export interface MalformedResponseError {
  readonly type: 'MalformedResponseError';
  readonly kind: 'malformed-response';
  readonly message: string;
  readonly retryable: false;
  readonly cause?: unknown;
}

export interface TimeoutError {
  readonly type: 'TimeoutError';
  readonly kind: 'timeout';
  readonly message: string;
  readonly retryable: true;
  readonly cause?: unknown;
}

export type FetchError = TransportError | MalformedResponseError | TimeoutError;

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type IndicatorsError = FetchError | InvalidInputError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/** HTTP 429 and 5xx are worth retrying; other statuses are not. */
const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

export const createTransportError = (
  message: string,
  options: { status?: number; cause?: unknown } = {}
): TransportError => ({
  type: 'TransportError',
  kind: 'transport',
  message,
  retryable: options.status === undefined || isRetryableStatus(options.status),
  ...(options.status !== undefined && { status: options.status }),
  ...(options.cause !== undefined && { cause: options.cause }),
});

export const createMalformedResponseError = (
  message: string,
  cause?: unknown
): MalformedResponseError => ({
  type: 'MalformedResponseError',
  kind: 'malformed-response',
  message,
  retryable: false,
  ...(cause !== undefined && { cause }),
});

export const createTimeoutError = (message: string, cause?: unknown): TimeoutError => ({
  type: 'TimeoutError',
  kind: 'timeout',
  message,
  retryable: true,
  ...(cause !== undefined && { cause }),
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

export const isFetchError = (error: IndicatorsError): error is FetchError =>
  error.type !== 'InvalidInputError';

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const INDICATORS_ERROR_HTTP_STATUS: Record<IndicatorsError['type'], number> = {
  InvalidInputError: 400,
  TransportError: 502,
  MalformedResponseError: 502,
  TimeoutError: 504,
};

export const getHttpStatusForError = (error: IndicatorsError): number => {
  return INDICATORS_ERROR_HTTP_STATUS[error.type];
};
