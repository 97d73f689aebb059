/**
 * Custom error types for the application
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    // Only capture stack trace if Error.captureStackTrace is available (Node.js)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error related to configuration
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error related to validation of caller-supplied arguments
 */
export class ValidationError extends AppError {
  public data?: unknown;

  constructor(message: string, data?: unknown) {
    super(`Validation Error: ${message}`);
    this.data = data;
  }
}

/**
 * The input PDF cannot be opened or is structurally invalid.
 * Fatal for an extraction run.
 */
export class DocumentReadError extends AppError {
  public filePath: string;
  public reason: string;

  constructor(filePath: string, reason: string) {
    super(`Document Read Error: cannot open "${filePath}": ${reason}`);
    this.filePath = filePath;
    this.reason = reason;
  }
}

/**
 * A single product sheet could not be written. Caught per sheet by the
 * materializer; the batch continues.
 */
export class SheetWriteFailure extends AppError {
  public product: string;
  public outputPath: string;

  constructor(message: string, product: string, outputPath: string) {
    super(`Sheet Write Failure (${product}): ${message}`);
    this.product = product;
    this.outputPath = outputPath;
  }
}

/**
 * Error related to API calls
 */
export class ApiError extends AppError {
  public status?: number;
  public service: string;
  public endpoint: string;

  constructor(message: string, service: string, endpoint: string, status?: number) {
    super(`API Error (${service}/${endpoint}): ${message}`);
    this.status = status;
    this.service = service;
    this.endpoint = endpoint;
  }
}

/**
 * Error related to Mistral API
 */
export class MistralApiError extends ApiError {
  constructor(message: string, endpoint: string, status?: number) {
    super(message, 'mistral', endpoint, status);
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'ENETUNREACH']);

/**
 * HTTP status carried by an error, if any. Covers our own ApiError and the
 * `statusCode` field the Mistral SDK puts on its errors.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof ApiError) {
    return error.status;
  }
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Determines if an error is retryable
 * @param error The error to check
 * @returns True if the error is retryable, false otherwise
 */
export function isRetryableError(error: unknown): boolean {
  // Network errors are generally retryable
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    if (RETRYABLE_CODES.has(error.code)) {
      return true;
    }
  }

  const status = getErrorStatus(error);
  if (status === undefined) {
    return false;
  }

  // Rate limits and 5xx server errors
  if (status === 429 || (status >= 500 && status < 600)) {
    return true;
  }

  // Don't retry 4xx client errors
  return false;
}

/**
 * Exponential backoff delay with ±25% jitter
 * @param attempt Current attempt number (0-indexed)
 */
export function getRetryDelayMs(
  attempt: number,
  baseDelayMs = 500,
  maxDelayMs = 30000
): number {
  const exponentialDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = exponentialDelay * 0.25 * (Math.random() - 0.5);

  return Math.max(baseDelayMs, Math.floor(exponentialDelay + jitter));
}

/**
 * Retry a function with exponential backoff while the error stays retryable
 * @param fn Function to retry
 * @param maxRetries Maximum number of retries after the first attempt
 * @param onRetry Called before each wait, with the attempt that failed (1-based)
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  baseDelayMs = 500,
  maxDelayMs = 30000,
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
): Promise<T> {
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt < maxRetries && isRetryableError(error)) {
        const delay = getRetryDelayMs(attempt, baseDelayMs, maxDelayMs);
        onRetry?.(attempt + 1, error, delay);
        await new Promise(resolve => setTimeout(resolve, delay));
      } else {
        break;
      }
    }
  }

  throw lastError;
}
