// Base error interface
export interface BaseError extends Error {
  code: string;
  statusCode: number;
  details?: unknown;
  isOperational?: boolean;
}

export class AppError extends Error implements BaseError {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: unknown,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication failed', code: string = 'AUTHENTICATION_ERROR') {
    super(message, code, 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Insufficient permissions', code: string = 'AUTHORIZATION_ERROR') {
    super(message, code, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 'NOT_FOUND', 404);
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfter: number;
  public readonly limit: number;

  constructor(message: string = 'Rate limit exceeded', retryAfter: number = 0, limit: number = 0) {
    super(message, 'RATE_LIMIT_EXCEEDED', 429, { retryAfter, limit });
    this.retryAfter = retryAfter;
    this.limit = limit;
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message?: string) {
    super(
      message || `External service ${service} is unavailable`,
      'EXTERNAL_SERVICE_ERROR',
      503,
      { service }
    );
  }
}

// Error response interface
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    timestamp: string;
    requestId: string;
    path?: string;
  };
}

interface PgErrorLike {
  code?: unknown;
  errno?: unknown;
  message?: unknown;
  constraint?: unknown;
  detail?: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

// Database error mapping
export function mapDatabaseError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const pgError: PgErrorLike = isRecord(error) ? error : {};

  switch (pgError.code) {
    case '42P01': // Undefined table
    case '42703': // Undefined column
      return new DatabaseError('Allocation schema is not available', {
        code: pgError.code,
        detail: pgError.detail
      });

    case '22P02': // Invalid text representation
    case '22007': // Invalid datetime format
      return new ValidationError('Invalid filter value', {
        code: pgError.code
      });

    case 'ECONNREFUSED':
    case 'ENOTFOUND':
    case 'ETIMEDOUT':
      return new DatabaseError('Database connection failed', {
        code: pgError.code,
        errno: pgError.errno
      });

    default:
      return new DatabaseError('Database operation failed', {
        code: pgError.code,
        message: pgError.message
      });
  }
}
