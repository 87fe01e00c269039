import { Role } from '../models/Role';
import { AuthenticatedSession, SessionState } from '../models/Session';

export type DenialReason = 'NOT_AUTHENTICATED' | 'FORBIDDEN';

export type GateDecision =
  | { allowed: true; principal: AuthenticatedSession }
  | { allowed: false; reason: DenialReason };

/**
 * Decides whether a session may run a protected operation. Authentication is
 * checked before role, so a signed-out caller is never reported as FORBIDDEN.
 */
export function checkAccess(state: SessionState, allowedRoles?: ReadonlySet<Role>): GateDecision {
  if (!state.isAuthenticated) {
    return { allowed: false, reason: 'NOT_AUTHENTICATED' };
  }

  if (allowedRoles && !allowedRoles.has(state.role)) {
    return { allowed: false, reason: 'FORBIDDEN' };
  }

  return { allowed: true, principal: state };
}
