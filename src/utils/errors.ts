// Standardized error handling utilities
// AppError maps onto HTTP responses; the remaining classes describe tool and
// inference failures that are reported back into the transcript.

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  BAD_REQUEST = 'bad_request',
  CONFLICT = 'conflict',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static conflict(message: string = 'Conflict', details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

/** The inference backend failed on every attempt. */
export class InferenceError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InferenceError';
  }
}

/** No progress was reported within the configured window. */
export class ToolTimeoutError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly timeoutSeconds: number
  ) {
    super(`Tool "${toolName}" timed out: no progress within timeoutSeconds=${timeoutSeconds}`);
    this.name = 'ToolTimeoutError';
  }
}

export class ToolCancelledError extends Error {
  constructor(public readonly toolName: string) {
    super('Cancelled by user');
    this.name = 'ToolCancelledError';
  }
}

export class ToolExecutionCrashError extends Error {
  constructor(public readonly toolName: string) {
    super('Tool returned an empty response. Treat this as a crash.');
    this.name = 'ToolExecutionCrashError';
  }
}

export class ToolNotFoundError extends Error {
  constructor(public readonly toolName: string) {
    super('Tool not found');
    this.name = 'ToolNotFoundError';
  }
}

export class CommandNotAllowedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandNotAllowedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
