import { Request, Response, NextFunction } from 'express';
import { errorHandler, notFoundHandler } from '../../middleware/errorHandler';
import { logger } from '../../utils/logger';
import {
  AppError,
  AuthenticationError,
  DatabaseError,
  ExternalServiceError,
  NotFoundError,
  ValidationError
} from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    http: jest.fn(),
    debug: jest.fn()
  }
}));

describe('Error Handler Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;
  let jsonSpy: jest.Mock;
  let statusSpy: jest.Mock;
  const originalEnv = process.env.NODE_ENV;

  beforeEach(() => {
    jsonSpy = jest.fn();
    statusSpy = jest.fn().mockReturnValue({ json: jsonSpy });

    mockRequest = {
      method: 'GET',
      originalUrl: '/api/dashboard/team',
      headers: {},
      correlationId: 'test-request-id',
      ip: '127.0.0.1'
    };

    mockResponse = {
      status: statusSpy,
      json: jsonSpy
    };

    mockNext = jest.fn();
  });

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  const body = () => jsonSpy.mock.calls[0][0];

  describe('AppError handling', () => {
    it('should render a ValidationError with its details', () => {
      const error = new ValidationError('Validation failed', [{ field: 'month', message: 'must be <= 12' }]);

      errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

      expect(statusSpy).toHaveBeenCalledWith(400);
      expect(body()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: [{ field: 'month', message: 'must be <= 12' }],
          timestamp: expect.any(String),
          requestId: 'test-request-id',
          path: '/api/dashboard/team'
        }
      });
      expect(logger.warn).toHaveBeenCalled();
    });

    it('should render an AuthenticationError with its code', () => {
      errorHandler(
        new AuthenticationError('Invalid username or password.', 'INVALID_CREDENTIALS'),
        mockRequest as Request,
        mockResponse as Response,
        mockNext
      );

      expect(statusSpy).toHaveBeenCalledWith(401);
      expect(body().error.code).toBe('INVALID_CREDENTIALS');
      expect(body().error.message).toBe('Invalid username or password.');
      expect(body().error).not.toHaveProperty('details');
    });

    it('should log server-side AppErrors at error level', () => {
      errorHandler(new DatabaseError('Database operation failed'), mockRequest as Request, mockResponse as Response, mockNext);

      expect(statusSpy).toHaveBeenCalledWith(500);
      expect(logger.error).toHaveBeenCalled();
    });

    it('should render an ExternalServiceError as 503', () => {
      errorHandler(
        new ExternalServiceError('directory', 'Directory lookup failed'),
        mockRequest as Request,
        mockResponse as Response,
        mockNext
      );

      expect(statusSpy).toHaveBeenCalledWith(503);
      expect(body().error.details).toEqual({ service: 'directory' });
    });

    it('should honour custom status codes', () => {
      errorHandler(
        new AppError('Unable to authenticate at this time.', 'AUTH_UNAVAILABLE', 503),
        mockRequest as Request,
        mockResponse as Response,
        mockNext
      );

      expect(statusSpy).toHaveBeenCalledWith(503);
      expect(body().error.code).toBe('AUTH_UNAVAILABLE');
    });
  });

  describe('body parser errors', () => {
    it('should answer malformed JSON with 400', () => {
      const error = Object.assign(new SyntaxError('Unexpected token'), { type: 'entity.parse.failed' });

      errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

      expect(statusSpy).toHaveBeenCalledWith(400);
      expect(body().error.code).toBe('INVALID_JSON');
    });

    it('should answer oversized bodies with 413', () => {
      const error = Object.assign(new Error('request entity too large'), { type: 'entity.too.large' });

      errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

      expect(statusSpy).toHaveBeenCalledWith(413);
    });
  });

  describe('unknown errors', () => {
    it('should hide the message in production', () => {
      process.env.NODE_ENV = 'production';

      errorHandler(new Error('pool exhausted'), mockRequest as Request, mockResponse as Response, mockNext);

      expect(statusSpy).toHaveBeenCalledWith(500);
      expect(body().error.code).toBe('INTERNAL_SERVER_ERROR');
      expect(body().error.message).toBe('An unexpected error occurred');
    });

    it('should show the message outside production', () => {
      process.env.NODE_ENV = 'test';

      errorHandler(new Error('pool exhausted'), mockRequest as Request, mockResponse as Response, mockNext);

      expect(body().error.message).toBe('pool exhausted');
      expect(body().error).not.toHaveProperty('details');
    });
  });

  describe('notFoundHandler', () => {
    it('should pass a NotFoundError naming the route', () => {
      notFoundHandler(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockNext).toHaveBeenCalledWith(expect.any(NotFoundError));
      expect(statusSpy).not.toHaveBeenCalled();
    });

    it('should render the NotFoundError as a 404', () => {
      const forward = (error?: unknown): void =>
        errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

      notFoundHandler(mockRequest as Request, mockResponse as Response, forward);

      expect(statusSpy).toHaveBeenCalledWith(404);
      expect(body().error.code).toBe('NOT_FOUND');
      expect(body().error.message).toBe('Route GET /api/dashboard/team not found');
    });
  });
});
