import { checkAccess } from './AuthorizationGate';
import { ROLES, Role, rolesAtLeast } from '../models/Role';
import { ANONYMOUS, AuthenticatedSession } from '../models/Session';

const sessionFor = (role: Role): AuthenticatedSession => ({
  isAuthenticated: true,
  identity: {
    username: 'jdoe',
    displayName: 'Jamie Doe',
    title: '',
    distinguishedName: '',
    email: ''
  },
  role,
  authenticatedAt: '2024-01-01T00:00:00.000Z'
});

describe('checkAccess', () => {
  it('should deny anonymous sessions with NOT_AUTHENTICATED', () => {
    expect(checkAccess(ANONYMOUS)).toEqual({ allowed: false, reason: 'NOT_AUTHENTICATED' });
  });

  it('should report NOT_AUTHENTICATED before FORBIDDEN', () => {
    expect(checkAccess(ANONYMOUS, rolesAtLeast('ADMIN'))).toEqual({
      allowed: false,
      reason: 'NOT_AUTHENTICATED'
    });
  });

  it('should allow any authenticated role when no role set is given', () => {
    for (const role of ROLES) {
      const session = sessionFor(role);
      expect(checkAccess(session)).toEqual({ allowed: true, principal: session });
    }
  });

  it('should deny EMPLOYEE with FORBIDDEN outside its allowed set', () => {
    expect(checkAccess(sessionFor('EMPLOYEE'), rolesAtLeast('TEAM_LEAD'))).toEqual({
      allowed: false,
      reason: 'FORBIDDEN'
    });
  });

  it('should allow roles at or above the minimum', () => {
    const allowed = rolesAtLeast('COE_LEADER');

    expect(checkAccess(sessionFor('COE_LEADER'), allowed).allowed).toBe(true);
    expect(checkAccess(sessionFor('PDL'), allowed).allowed).toBe(true);
    expect(checkAccess(sessionFor('ADMIN'), allowed).allowed).toBe(true);
    expect(checkAccess(sessionFor('TEAM_LEAD'), allowed).allowed).toBe(false);
  });
});
