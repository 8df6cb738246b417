export type ErrorCode =
  | 'CAPABILITY_UNAVAILABLE'
  | 'CAPABILITY_TIMEOUT'
  | 'MALFORMED_CAPABILITY_RESPONSE'
  | 'FALLBACK_FAILURE'
  | 'RUN_CANCELLED'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

/** Capabilities the orchestrator calls out to; used to label failures. */
export type CapabilityName = 'router' | 'retriever' | 'grader' | 'rewriter' | 'generator';

export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class CapabilityUnavailableError extends AppError {
  constructor(
    public capability: CapabilityName,
    message: string = `${capability} capability is unavailable`,
    details?: Record<string, unknown>
  ) {
    super(message, 'CAPABILITY_UNAVAILABLE', 502, { capability, ...details });
    this.name = 'CapabilityUnavailableError';
  }
}

export class CapabilityTimeoutError extends AppError {
  constructor(public capability: CapabilityName, public timeoutMs: number) {
    super(`${capability} capability timed out after ${timeoutMs}ms`, 'CAPABILITY_TIMEOUT', 504, {
      capability,
      timeoutMs,
    });
    this.name = 'CapabilityTimeoutError';
  }
}

export class MalformedCapabilityResponseError extends AppError {
  constructor(
    public capability: CapabilityName,
    message: string = `${capability} capability returned an unusable response`,
    details?: Record<string, unknown>
  ) {
    super(message, 'MALFORMED_CAPABILITY_RESPONSE', 502, { capability, ...details });
    this.name = 'MalformedCapabilityResponseError';
  }
}

/** The single-pass pipeline could not produce an answer either. Terminal for the run. */
export class FallbackFailureError extends AppError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Unable to answer the question: ${reason}`, 'FALLBACK_FAILURE', 502, details);
    this.name = 'FallbackFailureError';
  }
}

export class RunCancelledError extends AppError {
  constructor(message: string = 'Run was cancelled by the caller') {
    super(message, 'RUN_CANCELLED', 499);
    this.name = 'RunCancelledError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
