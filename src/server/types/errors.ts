/**
 * Centralized error type definitions for docsum
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  GENERATION_FAILED = 'GENERATION_FAILED',
  CANCELLED = 'CANCELLED',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when a component cannot be built from the given settings
 * (missing provider credentials, out-of-range chunk sizes, ...).
 * Not operational: the process cannot serve any run until it is fixed.
 */
export class ConfigurationError extends AppError {
  public readonly serviceName: string;
  public readonly missingConfig: string[];

  constructor(serviceName: string, missingConfig: string[], detail?: string) {
    const message = detail
      ? `${serviceName} misconfigured: ${detail}`
      : `${serviceName} not configured. Missing: ${missingConfig.join(', ')}`;
    super(message, ErrorCode.CONFIGURATION_ERROR, 500, false, { serviceName, missingConfig });
    this.serviceName = serviceName;
    this.missingConfig = missingConfig;
  }
}

/**
 * A single text-generation call failed (network, quota, provider rejection,
 * malformed or empty response). Aborts the run it belongs to.
 */
export class GenerationError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(
      `Generation failed (${provider}): ${message}`,
      ErrorCode.GENERATION_FAILED,
      502,
      true,
      { provider, ...context },
      cause
    );
    this.provider = provider;
  }
}

/**
 * The run, or a single waiter in the rate limiter, was cancelled.
 */
export class CancellationError extends AppError {
  constructor(message: string = 'Operation cancelled', context?: Record<string, unknown>) {
    super(message, ErrorCode.CANCELLED, 499, true, context);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false, undefined, error);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false, { value: String(error) });
}

/**
 * Render an unknown thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
