import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger, getRequestId } from '../util/gateway.logger.utils';

export interface ErrorDetail {
  field: string;
  message: string;
}

export class GatewayError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: ErrorDetail[]
  ) {
    super(message);
    this.name = 'GatewayError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// Specific error classes for better error handling
export class ValidationError extends GatewayError {
  constructor(message: string, details?: ErrorDetail[]) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message: string = 'Invalid token') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class GenerationError extends GatewayError {
  constructor(message: string = 'Response generation failed', public readonly originalError?: unknown) {
    super(message, 502, 'GENERATION_FAILED');
    this.name = 'GenerationError';
  }
}

interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId: string;
    details?: ErrorDetail[];
    stack?: string;
  };
}

export const errorHandlerMiddleware = (
  error: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument functions as error handlers
  _next: NextFunction
): void => {
  const requestId = getRequestId(req);
  const logger = createLogger('error-handler', requestId);

  let statusCode = 500;
  let errorCode = 'INTERNAL_ERROR';
  let message = 'Internal server error';
  let details: ErrorDetail[] | undefined;

  if (error instanceof GatewayError) {
    statusCode = error.statusCode;
    errorCode = error.code || 'GATEWAY_ERROR';
    message = error.message;
    details = error.details;

    if (statusCode >= 500) {
      logger.error('Server error occurred', {
        error: message,
        code: errorCode,
        stack: error.stack,
        path: req.path,
        method: req.method
      });
    } else {
      logger.warn('Client error occurred', {
        error: message,
        code: errorCode,
        path: req.path,
        method: req.method,
        ip: req.ip
      });
    }
  }
  // Malformed JSON body from express.json()
  else if (error instanceof SyntaxError && 'body' in error) {
    statusCode = 400;
    errorCode = 'VALIDATION_ERROR';
    message = 'Malformed JSON body';

    logger.warn('Malformed JSON body', { path: req.path });
  }
  // Handle MongoDB/Mongoose errors
  else if (error.name === 'MongoError' || error.name === 'MongoServerError') {
    errorCode = 'DATABASE_ERROR';
    message = 'Database operation failed';

    logger.error('Database error', {
      error: error.message,
      stack: error.stack,
      path: req.path
    });
  }
  else {
    logger.error('Unhandled error occurred', {
      error: error.message,
      name: error.name,
      stack: error.stack,
      path: req.path,
      method: req.method
    });
  }

  const body: ErrorResponseBody = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      requestId
    }
  };

  if (details && details.length > 0) {
    body.error.details = details;
  }

  // Stack traces only leave the process in development
  if (process.env.NODE_ENV === 'development' && statusCode >= 500) {
    body.error.stack = error.stack;
  }

  res.status(statusCode).json(body);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
};

// Async error wrapper to avoid try-catch in every route
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};
