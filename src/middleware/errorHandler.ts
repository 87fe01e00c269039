import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorResponse, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getRequestCorrelationId } from './correlationId';

interface BodyParserError {
  type: string;
}

const isBodyParserError = (error: unknown): error is BodyParserError =>
  typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string';

const buildResponse = (
  req: Request,
  code: string,
  message: string,
  details?: unknown
): ErrorResponse => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
    timestamp: new Date().toISOString(),
    requestId: getRequestCorrelationId(req),
    path: req.originalUrl
  }
});

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl}`));
};

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = getRequestCorrelationId(req);

  if (error instanceof AppError) {
    const context = {
      code: error.code,
      error: error.message,
      requestId,
      method: req.method,
      url: req.originalUrl
    };
    if (error.statusCode >= 500) {
      logger.error('Request failed', context);
    } else {
      logger.warn('Request failed', context);
    }
    res.status(error.statusCode).json(buildResponse(req, error.code, error.message, error.details));
    return;
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.parse.failed') {
      res.status(400).json(buildResponse(req, 'INVALID_JSON', 'Invalid JSON in request body'));
      return;
    }
    if (error.type === 'entity.too.large') {
      res.status(413).json(buildResponse(req, 'PAYLOAD_TOO_LARGE', 'Request payload is too large'));
      return;
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  logger.error('Unhandled request error', {
    error: message,
    stack: error instanceof Error ? error.stack : undefined,
    requestId,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip
  });

  const response = buildResponse(
    req,
    'INTERNAL_SERVER_ERROR',
    process.env.NODE_ENV === 'production' ? 'An unexpected error occurred' : message
  );

  if (process.env.NODE_ENV === 'development' && error instanceof Error) {
    response.error.details = { stack: error.stack, name: error.name };
  }

  res.status(500).json(response);
};
