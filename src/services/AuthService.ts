import { createHash, timingSafeEqual } from 'node:crypto';
import { SuperadminConfig } from '../config';
import { AuthFailure, Identity } from '../models/Identity';
import { logger } from '../utils/logger';
import { DirectoryService } from './DirectoryService';
import { RoleResolver } from './RoleResolver';
import { SessionGrant } from './SessionLifecycle';

export interface LoginRequest {
  username: string;
  password: string;
  domain?: string;
}

export type LoginOutcome =
  | { ok: true; grant: SessionGrant; via: 'superadmin' | 'directory' }
  | { ok: false; failure: AuthFailure };

const SUPERADMIN_IDENTITY: Omit<Identity, 'username'> = {
  displayName: 'Administrator',
  title: 'Administrator',
  distinguishedName: '',
  email: ''
};

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

function constantTimeEquals(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

/**
 * Turns submitted credentials into a session grant: superadmin bypass first,
 * then a directory bind followed by role resolution.
 */
export class AuthService {
  private readonly superadmin: SuperadminConfig;
  private readonly directory: DirectoryService;
  private readonly resolver: RoleResolver;

  constructor(superadmin: SuperadminConfig, directory: DirectoryService, resolver: RoleResolver) {
    this.superadmin = superadmin;
    this.directory = directory;
    this.resolver = resolver;
  }

  isSuperadmin(username: string, password: string): boolean {
    if (!this.superadmin.enabled) {
      return false;
    }
    // Evaluate both so timing does not reveal which half matched
    const userMatches = constantTimeEquals(username, this.superadmin.username);
    const passwordMatches = constantTimeEquals(password, this.superadmin.password);
    return userMatches && passwordMatches;
  }

  async login(request: LoginRequest): Promise<LoginOutcome> {
    const username = request.username.trim();

    if (this.isSuperadmin(username, request.password)) {
      const identity: Identity = { username, ...SUPERADMIN_IDENTITY };
      const role = this.resolver.resolveRole(identity, [], { superadmin: true });

      logger.info('Superadmin login', { username });
      return { ok: true, via: 'superadmin', grant: { identity, role } };
    }

    const result = await this.directory.authenticate(username, request.password, request.domain);
    if (!result.ok) {
      logger.warn('Login rejected', { username, reason: result.failure.reason });
      return result;
    }

    const resolution = this.resolver.resolve(result.identity, result.groups);

    logger.info('User logged in', {
      username: result.identity.username,
      role: resolution.role,
      matchedBy: resolution.matchedBy
    });

    return {
      ok: true,
      via: 'directory',
      grant: {
        identity: result.identity,
        role: resolution.role,
        directoryCredential: result.credential
      }
    };
  }
}
