import type { Request, Response, NextFunction } from 'express';
import { getLogger } from '../logging';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  TIMEOUT = 'TIMEOUT',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  DATABASE_ERROR = 'DATABASE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, cause, code);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

export interface ServiceErrorCodes<T extends string> {
  INTERNAL_ERROR: T;
  NOT_FOUND: T;
  VALIDATION_ERROR: T;
  UNAUTHORIZED: T;
  FORBIDDEN: T;
  SERVICE_UNAVAILABLE: T;
}

export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: ServiceErrorCodes<T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static unauthorized(message = 'Unauthorized') {
      return new ServiceError(message, 401, domainErrorCodes.UNAUTHORIZED);
    }

    static forbidden(message = 'Forbidden') {
      return new ServiceError(message, 403, domainErrorCodes.FORBIDDEN);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
    return new DomainError(error.message, statusCode, error, code);
  }
  return new DomainError(String(error) || fallbackMessage, 500);
}

function statusCodeToErrorCode(statusCode: number): DomainErrorCode {
  switch (statusCode) {
    case 400:
      return DomainErrorCode.BAD_REQUEST;
    case 401:
      return DomainErrorCode.UNAUTHORIZED;
    case 403:
      return DomainErrorCode.FORBIDDEN;
    case 404:
      return DomainErrorCode.NOT_FOUND;
    case 409:
      return DomainErrorCode.CONFLICT;
    case 503:
      return DomainErrorCode.SERVICE_UNAVAILABLE;
    case 504:
      return DomainErrorCode.TIMEOUT;
    default:
      return statusCode >= 500 ? DomainErrorCode.INTERNAL_ERROR : DomainErrorCode.UNKNOWN;
  }
}

function resolveCorrelationId(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options?: {
    code?: string;
    details?: Record<string, unknown>;
    correlationId?: string;
  }
): void {
  res.status(statusCode).json({
    success: false,
    error: {
      code: options?.code || statusCodeToErrorCode(statusCode),
      message,
      ...(options?.details && { details: options.details }),
      ...(options?.correlationId && { correlationId: options.correlationId }),
    },
  });
}

export function errorHandler() {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) return next(error);

    const correlationId = resolveCorrelationId(req);

    if (error instanceof DomainError) {
      const level = error.statusCode >= 500 ? 'error' : 'warn';
      middlewareLogger.log(level, 'DomainError caught', {
        error: error.message,
        statusCode: error.statusCode,
        code: error.code,
        correlationId,
        url: req.url,
        method: req.method,
      });

      sendErrorResponse(res, error.statusCode, error.message, {
        code: error.code,
        details: error.details,
        correlationId,
      });
      return;
    }

    // Library errors such as body-parser's carry their own statusCode
    const wrapped = wrapError(error, 'Unknown error occurred');
    const statusCode = wrapped.statusCode >= 400 && wrapped.statusCode < 600 ? wrapped.statusCode : 500;
    const message =
      process.env.NODE_ENV === 'production' && statusCode >= 500
        ? 'Internal Server Error'
        : wrapped.message || 'Unknown error occurred';

    middlewareLogger.log(statusCode >= 500 ? 'error' : 'warn', 'Unhandled error', {
      error: wrapped.message,
      statusCode,
      stack: error instanceof Error ? error.stack : undefined,
      correlationId,
      url: req.url,
      method: req.method,
    });

    sendErrorResponse(res, statusCode, message, { correlationId });
  };
}

/**
 * Wraps an async express handler so rejections reach the error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
