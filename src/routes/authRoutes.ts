import { RequestHandler, Router } from 'express';
import { AuthController } from '../controllers/AuthController';

export function createAuthRoutes(controller: AuthController, loginRateLimit: RequestHandler): Router {
  const router = Router();

  router.get('/login', controller.showLogin);

  /**
   * POST /auth/login
   * Failed attempts count against the per-client limit
   */
  router.post('/login', loginRateLimit, controller.login);

  // GET serves plain navigation links
  router.post('/logout', controller.logout);
  router.get('/logout', controller.logout);

  return router;
}
