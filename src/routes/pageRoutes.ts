import { Router } from 'express';
import { PageController } from '../controllers/PageController';
import { requirePageAccess } from '../middleware/authorization';
import { rolesAtLeast } from '../models/Role';
import { listPageRoutes } from '../services/MenuBuilder';

/**
 * One guarded page per menu entry with a path, so navigation and access
 * control read from the same table.
 */
export function createPageRoutes(controller: PageController): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.redirect(302, '/dashboard');
  });

  for (const route of listPageRoutes()) {
    router.get(route.path, requirePageAccess(rolesAtLeast(route.minRole)), controller.render(route));
  }

  return router;
}
