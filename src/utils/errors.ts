/**
 * Error handling utilities and error types
 */

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

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * HTTP status from the client error shapes we talk to:
 * gaxios (`response.status`), Notion (`status`), Telegram (`response.error_code`)
 */
function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
    if ('error_code' in response && typeof response.error_code === 'number') return response.error_code;
  }
  if ('status' in error && typeof error.status === 'number') return error.status;

  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

interface StatusRule {
  matches: (status: number) => boolean;
  type: ErrorType;
  retryable: boolean;
  describe: (status: number) => string;
}

// First matching rule wins; statuses matched by none fall through to the code checks
const STATUS_RULES: StatusRule[] = [
  { matches: s => s === 429, type: ErrorType.RATE_LIMIT, retryable: true, describe: () => 'Rate limit exceeded' },
  { matches: s => s === 401 || s === 403, type: ErrorType.AUTHENTICATION_ERROR, retryable: false, describe: () => 'Authentication failed' },
  { matches: s => s === 404, type: ErrorType.NOT_FOUND, retryable: false, describe: () => 'Resource not found' },
  { matches: s => s === 400 || s === 422, type: ErrorType.VALIDATION_ERROR, retryable: false, describe: () => 'Validation error' },
  { matches: s => s >= 500, type: ErrorType.SERVER_ERROR, retryable: true, describe: s => `Server error (${s})` },
];

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED']);

/**
 * Classify an error and create an AppError
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = messageOf(error);
  const status = httpStatusOf(error);

  if (status !== undefined) {
    const rule = STATUS_RULES.find(candidate => candidate.matches(status));
    if (rule) {
      return new AppError({
        type: rule.type,
        message: `${rule.describe(status)}: ${message}`,
        retryable: rule.retryable,
        httpStatus: status,
        context,
        originalError: error,
      });
    }
  }

  const code = codeOf(error);
  if (code !== undefined && NETWORK_CODES.has(code)) {
    return new AppError({ type: ErrorType.NETWORK_ERROR, message: `Network error: ${message}`, retryable: true, context, originalError: error });
  }

  if (/time(d)?\s?out/i.test(message) || code?.toLowerCase().includes('timeout')) {
    return new AppError({ type: ErrorType.TIMEOUT, message: `Request timeout: ${message}`, retryable: true, context, originalError: error });
  }

  // Missing settings and files surface as plain errors
  if (message.includes('not found') || message.includes('required')) {
    return new AppError({ type: ErrorType.CONFIGURATION_ERROR, message, retryable: false, context, originalError: error });
  }

  return new AppError({
    type: ErrorType.UNKNOWN_ERROR,
    message: message || 'Unknown error occurred',
    retryable: false,
    httpStatus: status,
    context,
    originalError: error,
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    onRetry?: (error: AppError, attempt: number) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 1000,
    maxDelay = 30000,
    backoffMultiplier = 2,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const appError = classifyError(error);

      if (!appError.retryable || attempt >= maxRetries) {
        throw appError;
      }

      const delay = Math.min(
        initialDelay * Math.pow(backoffMultiplier, attempt),
        maxDelay
      );

      if (onRetry) {
        onRetry(appError, attempt + 1);
      }

      await sleep(delay);
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

  const status = httpStatusOf(error);
  if (status !== undefined) {
    return `HTTP ${status}: ${messageOf(error)}`;
  }

  return messageOf(error);
}
