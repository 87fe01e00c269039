import { Request, Response, NextFunction } from 'express';
import { AuthService } from '../services/AuthService';
import { endSession, establishSession, readSessionState } from '../services/SessionLifecycle';
import { AppError, AuthenticationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { loginSchema, safeRedirectPath, validateAndThrow } from '../utils/validation';

const DEFAULT_LANDING = '/dashboard';

export class AuthController {
  private readonly authService: AuthService;
  private readonly cookieName: string;

  constructor(authService: AuthService, cookieName: string) {
    this.authService = authService;
    this.cookieName = cookieName;
  }

  /**
   * GET /auth/login
   */
  public showLogin = (req: Request, res: Response): void => {
    if (readSessionState(req).isAuthenticated) {
      res.redirect(302, DEFAULT_LANDING);
      return;
    }

    const next = typeof req.query.next === 'string' ? safeRedirectPath(req.query.next) : null;
    res.json({ page: 'login', authenticated: false, next });
  };

  /**
   * POST /auth/login
   * Accepts JSON or form bodies. The session is only touched on success.
   */
  public login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = validateAndThrow(loginSchema, req.body);
      const outcome = await this.authService.login({
        username: body.username,
        password: body.password,
        domain: body.domain
      });

      if (!outcome.ok) {
        if (outcome.failure.reason === 'INVALID_CREDENTIALS') {
          throw new AuthenticationError('Invalid username or password.', 'INVALID_CREDENTIALS');
        }
        throw new AppError('Unable to authenticate at this time.', 'AUTH_UNAVAILABLE', 503);
      }

      await establishSession(req, outcome.grant);

      res.redirect(303, safeRedirectPath(body.next) ?? DEFAULT_LANDING);
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST|GET /auth/logout
   */
  public logout = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const state = readSessionState(req);
      await endSession(req);
      res.clearCookie(this.cookieName, { path: '/' });

      if (state.isAuthenticated) {
        logger.info('User logged out', { username: state.identity.username, requestId: req.correlationId });
      }

      res.redirect(303, '/auth/login');
    } catch (error) {
      next(error);
    }
  };
}
