import type { ErrorCode, MethodNotAllowedDetails } from '@usersvc/contracts';

// Operational errors. Only the error middleware turns them into HTTP responses.

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: string[]) {
    super(message, 'validation_failed', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'resource not found', details?: unknown) {
    super(message, 'not_found', 404, details);
  }
}

export class PathError extends AppError {
  constructor(message: string) {
    super(message, 'invalid_path', 400);
  }
}

export class MethodError extends AppError {
  public readonly allow: string[];

  constructor(method: string, allow: string[]) {
    const details: MethodNotAllowedDetails = { method, allow };
    super('method not allowed', 'method_not_allowed', 405, details);
    this.allow = allow;
  }
}

export class BodyError extends AppError {
  constructor(message: string) {
    super(message, 'invalid_json', 400);
  }
}

export class InternalError extends AppError {
  constructor(message = 'unexpected error') {
    super(message, 'internal_error', 500);
  }
}
