import Joi from 'joi';
import { ROLES, Role } from './Role';
import { DirectoryCredential, Identity } from './Identity';

export interface AuthenticatedSession {
  isAuthenticated: true;
  identity: Identity;
  role: Role;
  directoryCredential?: DirectoryCredential;
  authenticatedAt: string;
}

export interface AnonymousSession {
  isAuthenticated: false;
}

/**
 * A session is either fully anonymous or fully populated; there is no partial state.
 */
export type SessionState = AnonymousSession | AuthenticatedSession;

export const ANONYMOUS: AnonymousSession = Object.freeze({ isAuthenticated: false });

declare module 'express-session' {
  interface SessionData {
    auth: AuthenticatedSession;
  }
}

const identitySchema = Joi.object({
  username: Joi.string().min(1).required(),
  displayName: Joi.string().allow('').required(),
  title: Joi.string().allow('').required(),
  distinguishedName: Joi.string().allow('').required(),
  email: Joi.string().allow('').required()
});

const authenticatedSessionSchema = Joi.object({
  isAuthenticated: Joi.boolean().valid(true).required(),
  identity: identitySchema.required(),
  role: Joi.string().valid(...ROLES).required(),
  directoryCredential: Joi.object({
    bindUsername: Joi.string().min(1).required(),
    password: Joi.string().min(1).required()
  }).optional(),
  authenticatedAt: Joi.string().isoDate().required()
});

/**
 * Reads the stored value back into a SessionState. Anything that is not a
 * complete authenticated record (missing, tampered, or from an older shape)
 * reads as anonymous.
 */
export function parseSessionState(stored: unknown): { state: SessionState; malformed: boolean } {
  if (stored === undefined || stored === null) {
    return { state: ANONYMOUS, malformed: false };
  }

  const { error, value } = authenticatedSessionSchema.validate(stored, { stripUnknown: true });
  if (error) {
    return { state: ANONYMOUS, malformed: true };
  }

  const authenticated: AuthenticatedSession = value;
  return { state: authenticated, malformed: false };
}
