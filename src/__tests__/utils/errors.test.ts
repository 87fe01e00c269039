import {
  AppError,
  ValidationError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  DatabaseError,
  ExternalServiceError,
  mapDatabaseError
} from '../../utils/errors';

describe('Error Utilities', () => {
  describe('AppError', () => {
    it('should create AppError with all properties', () => {
      const error = new AppError('Test message', 'TEST_CODE', 400, { field: 'test' });

      expect(error.message).toBe('Test message');
      expect(error.code).toBe('TEST_CODE');
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual({ field: 'test' });
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });

    it('should set isOperational to false when specified', () => {
      const error = new AppError('Test message', 'TEST_CODE', 500, undefined, false);

      expect(error.isOperational).toBe(false);
    });
  });

  describe('Specific Error Types', () => {
    it('should create ValidationError correctly', () => {
      const error = new ValidationError('Invalid input', { field: 'month' });

      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual({ field: 'month' });
      expect(error).toBeInstanceOf(AppError);
    });

    it('should create AuthenticationError with a custom code', () => {
      const error = new AuthenticationError('Invalid username or password.', 'INVALID_CREDENTIALS');

      expect(error.code).toBe('INVALID_CREDENTIALS');
      expect(error.statusCode).toBe(401);
    });

    it('should create AuthenticationError with defaults', () => {
      const error = new AuthenticationError();

      expect(error.message).toBe('Authentication failed');
      expect(error.code).toBe('AUTHENTICATION_ERROR');
    });

    it('should create AuthorizationError correctly', () => {
      const error = new AuthorizationError();

      expect(error.code).toBe('AUTHORIZATION_ERROR');
      expect(error.statusCode).toBe(403);
    });

    it('should create NotFoundError correctly', () => {
      const error = new NotFoundError('Page');

      expect(error.message).toBe('Page not found');
      expect(error.statusCode).toBe(404);
    });

    it('should carry retry information on RateLimitError', () => {
      const error = new RateLimitError('Slow down', 60, 10);

      expect(error.statusCode).toBe(429);
      expect(error.retryAfter).toBe(60);
      expect(error.details).toEqual({ retryAfter: 60, limit: 10 });
    });

    it('should create ExternalServiceError with default message', () => {
      const error = new ExternalServiceError('directory');

      expect(error.message).toBe('External service directory is unavailable');
      expect(error.statusCode).toBe(503);
      expect(error.details).toEqual({ service: 'directory' });
    });
  });

  describe('mapDatabaseError', () => {
    it('should pass AppErrors through', () => {
      const original = new NotFoundError();

      expect(mapDatabaseError(original)).toBe(original);
    });

    it('should map a missing table to DatabaseError', () => {
      const mapped = mapDatabaseError({ code: '42P01', detail: 'relation "projects" does not exist' });

      expect(mapped).toBeInstanceOf(DatabaseError);
      expect(mapped.message).toBe('Allocation schema is not available');
    });

    it('should map invalid filter values to ValidationError', () => {
      const mapped = mapDatabaseError({ code: '22P02' });

      expect(mapped).toBeInstanceOf(ValidationError);
      expect(mapped.message).toBe('Invalid filter value');
    });

    it('should map connection errors', () => {
      const mapped = mapDatabaseError({ code: 'ECONNREFUSED', errno: -111 });

      expect(mapped.message).toBe('Database connection failed');
      expect(mapped.details).toEqual({ code: 'ECONNREFUSED', errno: -111 });
    });

    it('should map unknown values', () => {
      const mapped = mapDatabaseError('boom');

      expect(mapped).toBeInstanceOf(DatabaseError);
      expect(mapped.message).toBe('Database operation failed');
    });
  });
});
