export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class AuthError extends AppError {
  constructor(message = 'Unauthenticated') {
    super(message, 401, 'UNAUTHENTICATED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(message, 403, 'FORBIDDEN');
  }
}

/**
 * Raised when the sequence generator keeps issuing identifiers that already
 * exist. Points at a counter that is behind the data and needs an operator.
 */
export class IdentifierCollisionError extends AppError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Identifier ${identifier} already exists after retry`, 500, 'IDENTIFIER_COLLISION');
    this.identifier = identifier;
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, 'STORE_UNAVAILABLE', { cause });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
