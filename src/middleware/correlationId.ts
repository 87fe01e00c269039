import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../types/express';

const INCOMING_ID = /^[A-Za-z0-9._:-]{1,128}$/;

const headerValue = (req: Request, name: string): string | undefined => {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && INCOMING_ID.test(value) ? value : undefined;
};

export function generateCorrelationId(): string {
  return `req_${uuidv4()}`;
}

/**
 * Caller-supplied request id when it is well formed, otherwise a new one.
 */
export function getCorrelationId(req: Request): string {
  return headerValue(req, 'x-request-id') ?? headerValue(req, 'x-correlation-id') ?? generateCorrelationId();
}

/**
 * Middleware to ensure every request has a correlation ID for tracking.
 * Must run before the logger and the session so both can tag their output.
 */
export const correlationIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = getCorrelationId(req);

  req.correlationId = correlationId;

  res.setHeader('x-request-id', correlationId);
  res.setHeader('x-correlation-id', correlationId);

  next();
};

export const getRequestCorrelationId = (req: Request): string => {
  return req.correlationId ?? getCorrelationId(req);
};
