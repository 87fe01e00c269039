import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Role } from '../models/Role';
import { AuthenticatedSession, SessionState } from '../models/Session';
import { toPublicIdentity } from '../models/Identity';
import { DenialReason, GateDecision, checkAccess } from '../services/AuthorizationGate';
import { buildMenu } from '../services/MenuBuilder';
import { readSessionState } from '../services/SessionLifecycle';
import { AuthenticationError, AuthorizationError } from '../utils/errors';
import { logger } from '../utils/logger';
import '../types/express';

const DENIAL_MESSAGES: Record<DenialReason, string> = {
  NOT_AUTHENTICATED: 'Authentication required',
  FORBIDDEN: 'You do not have access to this resource'
};

const evaluate = (req: Request, state: SessionState, allowedRoles?: ReadonlySet<Role>): GateDecision => {
  const decision = checkAccess(state, allowedRoles);

  if (decision.allowed) {
    req.principal = decision.principal;
  } else {
    logger.warn('Access denied', {
      reason: decision.reason,
      method: req.method,
      url: req.originalUrl,
      username: state.isAuthenticated ? state.identity.username : undefined,
      requestId: req.correlationId
    });
  }

  return decision;
};

/**
 * Guard for JSON endpoints: 401 when signed out, 403 when the role is not allowed.
 */
export function requireApiAccess(allowedRoles?: ReadonlySet<Role>): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const decision = evaluate(req, readSessionState(req), allowedRoles);
    if (decision.allowed) {
      next();
      return;
    }

    const message = DENIAL_MESSAGES[decision.reason];
    next(
      decision.reason === 'NOT_AUTHENTICATED'
        ? new AuthenticationError(message, 'NOT_AUTHENTICATED')
        : new AuthorizationError(message, 'FORBIDDEN')
    );
  };
}

/**
 * Guard for page routes: signed-out callers go to the login page and come
 * back afterwards; signed-in callers without the role get an access-denied view.
 */
export function requirePageAccess(allowedRoles?: ReadonlySet<Role>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const state = readSessionState(req);
    const decision = evaluate(req, state, allowedRoles);
    if (decision.allowed) {
      next();
      return;
    }

    if (decision.reason === 'NOT_AUTHENTICATED') {
      res.redirect(302, `/auth/login?next=${encodeURIComponent(req.originalUrl)}`);
      return;
    }

    res.status(403).json({
      page: 'access_denied',
      title: 'Access denied',
      message: DENIAL_MESSAGES.FORBIDDEN,
      user: state.isAuthenticated ? { ...toPublicIdentity(state.identity), role: state.role } : null,
      menu: state.isAuthenticated ? buildMenu(state.role) : []
    });
  };
}

/**
 * The principal a guard attached to this request.
 */
export function principalOf(req: Request): AuthenticatedSession {
  if (!req.principal) {
    throw new AuthenticationError(DENIAL_MESSAGES.NOT_AUTHENTICATED, 'NOT_AUTHENTICATED');
  }
  return req.principal;
}
