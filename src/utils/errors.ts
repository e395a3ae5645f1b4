/**
 * Error handling utilities and error types
 */
import type { Stage } from '../types';

export enum ErrorType {
  // Transient errors - should retry
  NETWORK_ERROR = 'NETWORK_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  TIMEOUT = 'TIMEOUT',
  SERVER_ERROR = 'SERVER_ERROR', // 5xx errors

  // Permanent errors - don't retry
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  PARSING_ERROR = 'PARSING_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorDetails {
  type: ErrorType;
  message: string;
  originalError?: unknown;
  context?: Record<string, unknown>;
  retryable: boolean;
  httpStatus?: number;
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly httpStatus?: number;
  public readonly originalError?: unknown;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'AppError';
    this.type = details.type;
    this.retryable = details.retryable;
    this.context = details.context;
    this.httpStatus = details.httpStatus;
    this.originalError = details.originalError;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      httpStatus: this.httpStatus,
    };
  }
}

export function configurationError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError({ type: ErrorType.CONFIGURATION_ERROR, message, retryable: false, context });
}

/**
 * A failure scoped to one candidate. Never aborts a run.
 */
export class StageError extends Error {
  constructor(
    public readonly stage: Stage,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'StageError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readStatus(error: Record<string, unknown>): number | undefined {
  const response = error.response;
  if (isRecord(response)) {
    const status = response.status ?? response.statusCode;
    if (typeof status === 'number') return status;
  }
  // gaxios and @google/genai both expose the HTTP status at the top level
  if (typeof error.status === 'number') return error.status;
  if (typeof error.code === 'number' && error.code >= 400 && error.code < 600) return error.code;
  return undefined;
}

function readDetail(error: Record<string, unknown>, fallback: string): string {
  const response = error.response;
  if (isRecord(response) && isRecord(response.data) && isRecord(response.data.error)) {
    const detail = response.data.error.message ?? response.data.error.detail;
    if (typeof detail === 'string') return detail;
  }
  return fallback;
}

/**
 * Classify an error and create an AppError
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): AppError {
  // If it's already an AppError, return it
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const fields = isRecord(error) ? error : {};
  const status = readStatus(fields);

  if (status !== undefined) {
    const detail = readDetail(fields, message);

    // Rate limiting (429)
    if (status === 429) {
      const response = fields.response;
      const headers = isRecord(response) && isRecord(response.headers) ? response.headers : {};
      return new AppError({
        type: ErrorType.RATE_LIMIT,
        message: `Rate limit exceeded: ${detail}`,
        retryable: true,
        httpStatus: status,
        context: {
          ...context,
          retryAfter: headers['retry-after'],
        },
        originalError: error,
      });
    }

    // Authentication errors (401, 403)
    if (status === 401 || status === 403) {
      return new AppError({
        type: ErrorType.AUTHENTICATION_ERROR,
        message: `Authentication failed: ${detail}`,
        retryable: false,
        httpStatus: status,
        context,
        originalError: error,
      });
    }

    // Not found (404)
    if (status === 404) {
      return new AppError({
        type: ErrorType.NOT_FOUND,
        message: `Resource not found: ${detail}`,
        retryable: false,
        httpStatus: status,
        context,
        originalError: error,
      });
    }

    // Request timeout (408)
    if (status === 408) {
      return new AppError({
        type: ErrorType.TIMEOUT,
        message: `Request timeout: ${detail}`,
        retryable: true,
        httpStatus: status,
        context,
        originalError: error,
      });
    }

    // Server errors (5xx) - retryable
    if (status >= 500) {
      return new AppError({
        type: ErrorType.SERVER_ERROR,
        message: `Server error (${status}): ${detail}`,
        retryable: true,
        httpStatus: status,
        context,
        originalError: error,
      });
    }

    // Remaining 4xx
    return new AppError({
      type: ErrorType.VALIDATION_ERROR,
      message: `Request rejected (${status}): ${detail}`,
      retryable: false,
      httpStatus: status,
      context,
      originalError: error,
    });
  }

  // Network/timeout errors
  const code = fields.code;
  if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'EAI_AGAIN') {
    return new AppError({
      type: ErrorType.NETWORK_ERROR,
      message: `Network error: ${message}`,
      retryable: true,
      context,
      originalError: error,
    });
  }

  if (/timeout/i.test(message)) {
    return new AppError({
      type: ErrorType.TIMEOUT,
      message: `Request timeout: ${message}`,
      retryable: true,
      context,
      originalError: error,
    });
  }

  // Unknown error
  return new AppError({
    type: ErrorType.UNKNOWN_ERROR,
    message: message || 'Unknown error occurred',
    retryable: false,
    context,
    originalError: error,
  });
}

/**
 * Sleep utility for retry delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  isRetryable(error: AppError): boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  isRetryable: error => error.retryable,
};

export interface RetryHooks {
  onRetry?: (error: AppError, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  context?: Record<string, unknown>;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1), policy.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or the policy runs out of attempts.
 * Whatever escapes is an AppError.
 */
export async function retryWithPolicy<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const appError = classifyError(error, hooks.context);

      if (!policy.isRetryable(appError) || attempt >= attempts) {
        throw appError;
      }

      const delay = backoffDelay(policy, attempt);
      if (hooks.onRetry) {
        hooks.onRetry(appError, attempt, delay);
      }

      await wait(delay);
    }
  }
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [
      `[${error.type}] ${error.message}`,
      error.context ? `Context: ${JSON.stringify(error.context)}` : '',
      error.httpStatus ? `HTTP ${error.httpStatus}` : '',
    ].filter(Boolean);
    return parts.join(' | ');
  }

  if (error instanceof StageError) {
    return `[${error.stage}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
