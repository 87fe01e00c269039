/**
 * Directory identity captured at login. Immutable for the lifetime of a session.
 */
export interface Identity {
  username: string;
  displayName: string;
  title: string;
  distinguishedName: string;
  email: string;
}

/**
 * Credentials kept in the session so later directory lookups (reportees,
 * people search) can bind as the signed-in user.
 */
export interface DirectoryCredential {
  bindUsername: string;
  password: string;
}

export const AUTH_FAILURE_REASONS = ['INVALID_CREDENTIALS', 'SERVICE_UNAVAILABLE', 'TIMEOUT'] as const;

export type AuthFailureReason = typeof AUTH_FAILURE_REASONS[number];

export interface AuthFailure {
  reason: AuthFailureReason;
}

export type DirectoryAuthResult =
  | {
      ok: true;
      identity: Identity;
      groups: string[];
      credential: DirectoryCredential;
    }
  | {
      ok: false;
      failure: AuthFailure;
    };

export function toPublicIdentity(identity: Identity): Identity {
  return {
    username: identity.username,
    displayName: identity.displayName,
    title: identity.title,
    distinguishedName: identity.distinguishedName,
    email: identity.email
  };
}
