import { Request } from 'express';
import { DirectoryCredential, Identity } from '../models/Identity';
import { Role } from '../models/Role';
import { ANONYMOUS, AuthenticatedSession, SessionState, parseSessionState } from '../models/Session';
import { logger } from '../utils/logger';
import '../types/express';

export interface SessionGrant {
  identity: Identity;
  role: Role;
  directoryCredential?: DirectoryCredential;
}

/**
 * Current session state of the request. Expired and logged-out sessions have
 * no stored record and read as anonymous.
 */
export function readSessionState(req: Request): SessionState {
  if (!req.session) {
    return ANONYMOUS;
  }

  const { state, malformed } = parseSessionState(req.session.auth);
  if (malformed) {
    logger.warn('Discarding malformed session record', {
      sessionId: req.sessionID,
      requestId: req.correlationId
    });
  }
  return state;
}

/**
 * ANONYMOUS -> AUTHENTICATED. Issues a fresh session id, then writes the
 * whole record in one assignment and persists it before returning. A failed
 * save discards the session, so nothing is stored or sent on the error
 * response.
 */
export async function establishSession(req: Request, grant: SessionGrant): Promise<AuthenticatedSession> {
  await new Promise<void>((resolve, reject) => {
    req.session.regenerate(error => (error ? reject(error) : resolve()));
  });

  const state: AuthenticatedSession = {
    isAuthenticated: true,
    identity: grant.identity,
    role: grant.role,
    authenticatedAt: new Date().toISOString(),
    ...(grant.directoryCredential ? { directoryCredential: grant.directoryCredential } : {})
  };
  req.session.auth = state;

  try {
    await new Promise<void>((resolve, reject) => {
      req.session.save(error => (error ? reject(error) : resolve()));
    });
  } catch (error) {
    // The response hook would otherwise retry the write and issue a cookie
    await endSession(req).catch((destroyError: unknown) => {
      logger.warn('Failed to discard unsaved session', {
        error: destroyError instanceof Error ? destroyError.message : String(destroyError),
        requestId: req.correlationId
      });
    });
    throw error;
  }

  return state;
}

/**
 * AUTHENTICATED -> LOGGED_OUT. The store entry is gone once this resolves.
 */
export async function endSession(req: Request): Promise<void> {
  if (!req.session) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    req.session.destroy(error => (error ? reject(error) : resolve()));
  });
}
