export enum ErrorCode {
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_STATE = 'INVALID_STATE',
  NO_WINNER = 'NO_WINNER',
  REENTRANT_CALL = 'REENTRANT_CALL',
  STALE_PRICE = 'STALE_PRICE',
  ORACLE_ERROR = 'ORACLE_ERROR',
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401);
  }

  /** Caller is not the authority, not a bettor, or not the winner. */
  static forbidden(message = 'Forbidden'): AppError {
    return new AppError(ErrorCode.FORBIDDEN, message, 403);
  }

  static notFound(message = 'Not found'): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  /** Operation is not allowed in the current lifecycle stage. */
  static invalidState(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.INVALID_STATE, message, 409, details);
  }

  static noWinner(message = 'No winner yet'): AppError {
    return new AppError(ErrorCode.NO_WINNER, message, 409);
  }

  static reentrantCall(message: string): AppError {
    return new AppError(ErrorCode.REENTRANT_CALL, message, 409);
  }

  static stalePrice(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.STALE_PRICE, message, 400, details);
  }

  static oracleError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.ORACLE_ERROR, message, 502, details);
  }

  static invariantViolation(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.INVARIANT_VIOLATION, message, 409, details);
  }

  static insufficientFunds(message = 'Insufficient funds', details?: unknown): AppError {
    return new AppError(ErrorCode.INSUFFICIENT_FUNDS, message, 400, details);
  }

  static internalError(message = 'Internal server error'): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500);
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): AppError {
    return new AppError(ErrorCode.RATE_LIMIT_EXCEEDED, message, 429);
  }

  static badRequest(message = 'Bad request'): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400);
  }
}
