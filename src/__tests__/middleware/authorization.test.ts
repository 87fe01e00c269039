import { Request, Response, NextFunction } from 'express';
import { requireApiAccess } from '../../middleware/authorization';
import { rolesAtLeast } from '../../models/Role';
import { AuthenticatedSession } from '../../models/Session';
import { AuthenticationError, AuthorizationError } from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    http: jest.fn(),
    debug: jest.fn()
  }
}));

const employee: AuthenticatedSession = {
  isAuthenticated: true,
  identity: {
    username: 'staff',
    displayName: 'Sam Staff',
    title: 'Engineer',
    distinguishedName: 'CN=Sam Staff,OU=People,DC=example,DC=com',
    email: 'staff@example.com'
  },
  role: 'EMPLOYEE',
  authenticatedAt: '2024-03-01T09:00:00.000Z'
};

describe('requireApiAccess', () => {
  let mockResponse: Partial<Response>;
  let mockNext: jest.Mock;

  const requestWith = (auth?: AuthenticatedSession): Request =>
    ({
      method: 'GET',
      originalUrl: '/api/dashboard/team',
      session: auth ? { auth } : {}
    }) as unknown as Request;

  beforeEach(() => {
    mockResponse = { status: jest.fn(), json: jest.fn() };
    mockNext = jest.fn();
  });

  it('should pass an AuthenticationError when signed out', () => {
    requireApiAccess(rolesAtLeast('TEAM_LEAD'))(requestWith(), mockResponse as Response, mockNext as NextFunction);

    const error = mockNext.mock.calls[0][0];
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.code).toBe('NOT_AUTHENTICATED');
    expect(error.statusCode).toBe(401);
    expect(mockResponse.status).not.toHaveBeenCalled();
  });

  it('should pass an AuthorizationError when the role is below the minimum', () => {
    requireApiAccess(rolesAtLeast('TEAM_LEAD'))(requestWith(employee), mockResponse as Response, mockNext as NextFunction);

    const error = mockNext.mock.calls[0][0];
    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error.code).toBe('FORBIDDEN');
    expect(error.statusCode).toBe(403);
  });

  it('should attach the principal and continue when allowed', () => {
    const req = requestWith(employee);

    requireApiAccess()(req, mockResponse as Response, mockNext as NextFunction);

    expect(mockNext).toHaveBeenCalledWith();
    expect(req.principal).toEqual(employee);
  });
});
