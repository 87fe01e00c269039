import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import '../types/express';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();
  const requestId = req.correlationId;

  logger.http('Request started', {
    method: req.method,
    url: req.originalUrl,
    userAgent: req.headers['user-agent'],
    ip: req.ip,
    requestId
  });

  res.on('finish', () => {
    logger.http('Request completed', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      requestId,
      username: req.principal?.identity.username
    });
  });

  next();
};
